/**
 * /persona-help command
 *
 * Display help information
 */

export const VERSION = '0.1.0';

export const HELP_TEXT = `
Reddit Persona - Activity-Based User Persona Reports

Fetches a Reddit user's recent public comments and posts, derives interest and
behavior statistics, and writes a text report with source citations.

Commands:
  /analyze-persona <profile-url|username>  Analyze a user
  /persona-help                            Show this help

/analyze-persona options:
  --limit N           Maximum comments and posts fetched (default: 100 each)
  --output DIR        Report directory
  --dry-run           Print the report without saving it

Report sections:
  - Basic information: account age, karma, premium and moderator status
  - Interests: top subreddits and common keywords, each with a cited source
  - Behavior patterns: comment length, comment/post ratio, active hours, engagement
  - Personality traits and potential demographics
  - Sources: analyzed counts with a sample comment and post

Storage locations:
  ~/.reddit-persona/reports/        Persona reports
  ~/.reddit-persona/settings.json   Settings (REDDIT_USER_AGENT, REDDIT_BASE_URL)

Examples:
  /analyze-persona https://www.reddit.com/user/example_user/
  /analyze-persona example_user --limit 50
`.trim();

/**
 * Display help information
 */
export function showHelp(): string {
  return HELP_TEXT;
}

/**
 * Display version information
 */
export function showVersion(): string {
  return `Reddit Persona v${VERSION}`;
}
