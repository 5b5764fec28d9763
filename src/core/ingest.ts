/**
 * Activity Ingestor
 *
 * Validate raw activity objects into tagged records.
 * Malformed entries are logged and set aside, never thrown.
 */

import type { ActivityRecord, IngestResult, RejectedRecord } from '../types';
import { isValidEpoch } from '../utils/paths';

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export class ActivityIngestor {
  /**
   * Validate every entry, keeping encounter order
   */
  ingest(raw: readonly unknown[]): IngestResult {
    const records: ActivityRecord[] = [];
    const rejected: RejectedRecord[] = [];

    raw.forEach((entry, index) => {
      const result = this.toRecord(entry);
      if (typeof result === 'string') {
        console.warn(`Skipping malformed activity record #${index}: ${result}`);
        rejected.push({ index, reason: result });
      } else {
        records.push(result);
      }
    });

    return { records, rejected };
  }

  /**
   * Convert one entry, or return the reason it was rejected
   */
  private toRecord(entry: unknown): ActivityRecord | string {
    if (!isObject(entry)) {
      return 'not an object';
    }

    const { kind, id, subreddit, created_utc: createdUtc } = entry;

    if (kind !== 'comment' && kind !== 'post') {
      return `unknown kind ${JSON.stringify(kind)}`;
    }
    if (!nonEmptyString(id)) {
      return 'missing id';
    }
    if (!nonEmptyString(subreddit)) {
      return `missing subreddit (${id})`;
    }
    if (typeof createdUtc !== 'number' || !Number.isFinite(createdUtc)) {
      return `missing created_utc (${id})`;
    }
    if (!isValidEpoch(createdUtc)) {
      return `created_utc out of range (${id})`;
    }

    const base = {
      id,
      subreddit,
      created_at: createdUtc,
      permalink: stringOr(entry.permalink, ''),
      score: numberOr(entry.score, 0),
    };

    if (kind === 'comment') {
      if (typeof entry.body !== 'string') {
        return `missing comment body (${id})`;
      }
      return { kind, ...base, body: entry.body };
    }

    if (typeof entry.title !== 'string') {
      return `missing post title (${id})`;
    }
    return {
      kind,
      ...base,
      title: entry.title,
      selftext: stringOr(entry.selftext, ''),
      url: stringOr(entry.url, ''),
    };
  }
}
