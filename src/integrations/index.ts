/**
 * Integration exports
 */

export { RedditClient, DEFAULT_ACTIVITY_LIMIT } from './reddit';
export type { RedditClientOptions } from './reddit';
