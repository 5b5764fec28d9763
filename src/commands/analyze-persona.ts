/**
 * /analyze-persona command
 *
 * Fetch a user's activity, aggregate it and save the rendered persona report
 */

import { PersonaAggregator } from '../core/aggregator';
import type { AggregatorOptions } from '../core/aggregator';
import { ReportGenerator } from '../core/report';
import { PersonaError } from '../core/errors';
import { RedditClient, DEFAULT_ACTIVITY_LIMIT } from '../integrations/reddit';
import { getPersonaReportPath, parseUsername, REPORTS_DIR } from '../utils/paths';
import type { ActivitySource, PersonaReport } from '../types';

export interface AnalyzePersonaOptions {
  /** Data source (defaults to the public Reddit client) */
  source?: ActivitySource;
  /** Directory the report is written to */
  outputDir?: string;
  /** Maximum comments and maximum posts fetched */
  limit?: number;
  /** Skip writing the report file */
  dryRun?: boolean;
  aggregator?: AggregatorOptions;
  /** Clock used for the report file name */
  now?: () => Date;
}

export interface AnalyzePersonaResult {
  success: boolean;
  username: string;
  report?: PersonaReport;
  text?: string;
  reportPath?: string;
  message: string;
  error?: Error;
}

/**
 * Analyze a Reddit user from a profile URL or username
 */
export async function analyzePersona(
  input: string,
  options: AnalyzePersonaOptions = {}
): Promise<AnalyzePersonaResult> {
  const username = parseUsername(input);

  if (!username) {
    return {
      success: false,
      username,
      message: `Could not read a username from "${input}". Use a profile URL or a bare username.`,
    };
  }

  const source = options.source || new RedditClient();
  const aggregator = new PersonaAggregator(options.aggregator);
  const reportGenerator = new ReportGenerator();

  try {
    console.log(`Analyzing u/${username}...`);

    const [profile, activity] = await Promise.all([
      source.getUserProfile(username),
      source.getUserActivity(username, options.limit ?? DEFAULT_ACTIVITY_LIMIT),
    ]);

    const report = aggregator.aggregateRaw(profile, activity);
    const text = reportGenerator.toText(report);
    const summary = `Found ${report.sources.comment_count} comments and ${report.sources.post_count} posts`;

    if (options.dryRun) {
      return {
        success: true,
        username,
        report,
        text,
        message: summary,
      };
    }

    const now = options.now ? options.now() : new Date();
    const reportPath = reportGenerator.save(
      report,
      getPersonaReportPath(username, options.outputDir || REPORTS_DIR, now)
    );

    return {
      success: true,
      username,
      report,
      text,
      reportPath,
      message: `Analysis complete! Saved to ${reportPath}. ${summary}`,
    };
  } catch (error) {
    if (error instanceof PersonaError) {
      return {
        success: false,
        username,
        message: error.message,
        error,
      };
    }

    console.error(`Failed to analyze u/${username}:`, error);
    return {
      success: false,
      username,
      message: `Analysis failed: ${error instanceof Error ? error.message : String(error)}`,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
