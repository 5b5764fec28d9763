/**
 * Command-line argument handling
 */

import { parseArgs } from 'util';
import { analyzePersona } from './analyze-persona';
import type { AnalyzePersonaOptions } from './analyze-persona';
import { showHelp, showVersion } from './persona-help';

export interface CliOutput {
  exitCode: number;
  output: string;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      limit: { type: 'string' },
      output: { type: 'string' },
      'dry-run': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });
}

/**
 * Run the CLI against an argument list (without node and script path)
 */
export async function runCli(
  argv: string[],
  options: Pick<AnalyzePersonaOptions, 'source' | 'now'> = {}
): Promise<CliOutput> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { exitCode: 2, output: `${message}\n\n${showHelp()}` };
  }

  const { values, positionals } = parsed;

  if (values.help) {
    return { exitCode: 0, output: showHelp() };
  }
  if (values.version) {
    return { exitCode: 0, output: showVersion() };
  }
  if (positionals.length !== 1) {
    return { exitCode: 2, output: showHelp() };
  }

  let limit: number | undefined;
  if (values.limit !== undefined) {
    limit = Number(values.limit);
    if (!Number.isInteger(limit) || limit <= 0) {
      return { exitCode: 2, output: `--limit must be a positive integer, got "${values.limit}"` };
    }
  }

  const dryRun = values['dry-run'] === true;
  const result = await analyzePersona(positionals[0], {
    ...options,
    limit,
    outputDir: values.output,
    dryRun,
  });

  if (!result.success) {
    return { exitCode: 1, output: result.message };
  }

  return {
    exitCode: 0,
    output: dryRun && result.text ? `${result.text}\n\n${result.message}` : result.message,
  };
}
