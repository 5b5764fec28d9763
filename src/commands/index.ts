/**
 * Command module exports
 */

export { analyzePersona } from './analyze-persona';
export type { AnalyzePersonaOptions, AnalyzePersonaResult } from './analyze-persona';

export { runCli } from './run-cli';
export type { CliOutput } from './run-cli';

export { showHelp, showVersion, HELP_TEXT, VERSION } from './persona-help';
