/**
 * Reddit Persona
 *
 * Builds citation-annotated persona reports from a Reddit user's
 * public comments and posts.
 */

export * from './core';
export * from './integrations';
export * from './commands';
export { parseUsername, getPersonaReportPath, loadSettings } from './utils/paths';

export * from './types';
