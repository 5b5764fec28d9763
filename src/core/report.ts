/**
 * Report Generator
 *
 * Render persona reports as plain text with inline source citations
 */

import { writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Citation, PersonaReport } from '../types';
import { ensureDir, formatEpoch } from '../utils/paths';
import { charLength, truncateChars } from '../utils/text';

const REDDIT_URL = 'https://reddit.com';

/** Sample bodies are cut at this many characters */
const SAMPLE_LENGTH = 200;

export class ReportGenerator {
  /**
   * Convert report to text
   */
  toText(report: PersonaReport): string {
    const lines: string[] = [];

    lines.push(`Reddit User Persona Analysis for ${report.username}`);
    lines.push('='.repeat(50));
    lines.push('');

    this.renderBasicInfo(report, lines);
    this.renderInterests(report, lines);
    this.renderBehavior(report, lines);
    this.renderPersonality(report, lines);
    this.renderDemographics(report, lines);
    this.renderSources(report, lines);

    return lines.join('\n');
  }

  /**
   * Save report text to file
   */
  save(report: PersonaReport, filePath: string): string {
    ensureDir(dirname(filePath));
    writeFileSync(filePath, this.toText(report) + '\n', 'utf-8');
    return filePath;
  }

  /**
   * Citation line for a subreddit claim
   */
  formatCitation(citation: Citation): string {
    const type = citation.kind === 'comment' ? 'Comment' : 'Post';
    return `(Source: ${type} '${citation.snippet}...' in r/${citation.subreddit})`;
  }

  private renderBasicInfo(report: PersonaReport, lines: string[]): void {
    const { profile } = report;

    lines.push('BASIC INFORMATION:');
    lines.push(`- Username: ${profile.username}`);
    lines.push(`- Account created: ${formatEpoch(profile.account_created_at)}`);
    lines.push(`- Comment karma: ${profile.comment_karma}`);
    lines.push(`- Post karma: ${profile.post_karma}`);
    lines.push(`- Premium: ${profile.is_gold ? 'Yes' : 'No'}`);
    lines.push(`- Moderator: ${profile.is_mod ? 'Yes' : 'No'}`);
    lines.push('');
  }

  private renderInterests(report: PersonaReport, lines: string[]): void {
    const { top_subreddits: topSubreddits, common_keywords: keywords } = report.interests;

    lines.push('INTERESTS:');
    if (topSubreddits.length > 0) {
      lines.push(`- Top subreddits: ${topSubreddits.map((s) => s.subreddit).join(', ')}`);
      for (const interest of topSubreddits) {
        lines.push(`  ${this.formatCitation(interest.citation)}`);
      }
    }

    if (keywords.length > 0) {
      lines.push(`- Common keywords: ${keywords.map((k) => k.keyword).join(', ')}`);
      const cited = keywords[0].citation;
      if (cited) {
        lines.push(`  (Source: Comment in r/${cited.subreddit}: '${cited.snippet}...')`);
      }
    }
    lines.push('');
  }

  private renderBehavior(report: PersonaReport, lines: string[]): void {
    const { behavior } = report;
    const ratio = behavior.post_type_ratio;

    lines.push('BEHAVIOR PATTERNS:');
    lines.push(`- Average comment length: ${(behavior.avg_comment_length ?? 0).toFixed(1)} characters`);
    lines.push(
      `- Comment to post ratio: ${(ratio.comments * 100).toFixed(1)}% comments, ` +
        `${(ratio.posts * 100).toFixed(1)}% submissions`
    );
    if (behavior.active_hours.length > 0) {
      lines.push(`- Most active hours: ${behavior.active_hours.join(', ')}`);
    }
    lines.push(`- Engagement level: ${behavior.engagement_level}`);
    lines.push('');
  }

  private renderPersonality(report: PersonaReport, lines: string[]): void {
    lines.push('PERSONALITY TRAITS:');
    if (report.personality_traits.length > 0) {
      for (const trait of report.personality_traits) {
        lines.push(`- ${trait}`);
      }
    } else {
      lines.push('- Could not determine significant personality traits');
    }
    lines.push('');
  }

  private renderDemographics(report: PersonaReport, lines: string[]): void {
    const { likely_timezone: timezone, possible_location: location } = report.demographics;

    lines.push('POTENTIAL DEMOGRAPHICS:');
    if (timezone) {
      lines.push(`- Likely timezone: ${timezone}`);
    }
    if (location) {
      lines.push(`- Possible location: ${location}`);
    }
    if (!timezone && !location) {
      lines.push('- Could not infer demographics');
    }
    lines.push('');
  }

  private renderSources(report: PersonaReport, lines: string[]): void {
    const { sources } = report;

    lines.push('SOURCES:');
    lines.push(
      `- Analyzed ${sources.comment_count} comments and ${sources.post_count} submissions`
    );

    const comment = sources.sample_comment;
    if (comment) {
      lines.push('');
      lines.push('SAMPLE COMMENT:');
      lines.push(`From r/${comment.subreddit} (Score: ${comment.score}):`);
      lines.push(this.truncate(comment.body));
      lines.push(`Permalink: ${REDDIT_URL}${comment.permalink}`);
    }

    const post = sources.sample_post;
    if (post) {
      lines.push('');
      lines.push('SAMPLE POST:');
      lines.push(`From r/${post.subreddit} (Score: ${post.score}):`);
      lines.push(`Title: ${post.title}`);
      if (post.selftext) {
        lines.push(this.truncate(post.selftext));
      }
      lines.push(`Permalink: ${REDDIT_URL}${post.permalink}`);
    }
  }

  private truncate(text: string): string {
    return charLength(text) > SAMPLE_LENGTH ? truncateChars(text, SAMPLE_LENGTH) + '...' : text;
  }
}
