/**
 * Core module exports
 */

export { PersonaAggregator, toSnippet, formatHourRange, SNIPPET_LENGTH } from './aggregator';
export type { AggregatorOptions } from './aggregator';

export { ActivityIngestor } from './ingest';

export { ReportGenerator } from './report';

export { PersonaError, InsufficientDataError, RedditApiError, UserNotFoundError } from './errors';
export type { PersonaErrorCode } from './errors';
