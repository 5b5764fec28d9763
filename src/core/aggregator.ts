/**
 * Persona Aggregator
 *
 * Turn a user's profile and activity records into a persona report,
 * with a citation behind every claim that names a source.
 */

import { ActivityIngestor } from './ingest';
import { InsufficientDataError } from './errors';
import { charLength, truncateChars } from '../utils/text';
import { isValidEpoch } from '../utils/paths';
import type {
  ActivityRecord,
  Citation,
  CommentRecord,
  EngagementLevel,
  KeywordInterest,
  PersonaReport,
  PostRecord,
  SubredditInterest,
  UserProfile,
} from '../types';

export interface AggregatorOptions {
  /** Number of subreddits reported as interests */
  topSubreddits?: number;
  /** Number of hour ranges reported as most active */
  topHours?: number;
  /** Number of keywords reported */
  keywordLimit?: number;
}

const DEFAULT_OPTIONS: Required<AggregatorOptions> = {
  topSubreddits: 3,
  topHours: 2,
  keywordLimit: 10,
};

/** Citation snippets keep this many characters */
export const SNIPPET_LENGTH = 30;

const STOP_WORDS = new Set(['the', 'and', 'but', 'are', 'is', 'i', 'you', 'me']);
const POSITIVE_WORDS = ['love', 'great', 'awesome', 'happy', 'nice'];
const NEGATIVE_WORDS = ['hate', 'awful', 'terrible', 'bad', 'angry'];

const LOCATION_INDICATORS: { location: string; pattern: RegExp }[] = [
  { location: 'United States', pattern: /\b(?:america|usa|united states)\b/ },
  { location: 'United Kingdom', pattern: /\b(?:uk|britain|england|london)\b/ },
];

/**
 * Build a citation snippet: whitespace collapsed, truncated
 */
export function toSnippet(text: string): string {
  return truncateChars(text.replace(/\s+/g, ' ').trim(), SNIPPET_LENGTH);
}

/**
 * Render an hour of day as "HH:00-HH:00"
 */
export function formatHourRange(hour: number): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(hour)}:00-${pad(hour + 1)}:00`;
}

function citationFor(record: ActivityRecord): Citation {
  return {
    kind: record.kind,
    record_id: record.id,
    subreddit: record.subreddit,
    snippet: toSnippet(record.kind === 'comment' ? record.body : record.title),
    permalink: record.permalink,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class PersonaAggregator {
  private options: Required<AggregatorOptions>;
  private ingestor: ActivityIngestor;

  constructor(options: AggregatorOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.ingestor = new ActivityIngestor();
  }

  /**
   * Validate raw entries, then aggregate whatever survived
   */
  aggregateRaw(profile: UserProfile, raw: readonly unknown[]): PersonaReport {
    const { records } = this.ingestor.ingest(raw);
    return this.aggregate(profile, records);
  }

  /**
   * Aggregate validated records into a frozen persona report
   */
  aggregate(profile: UserProfile, records: readonly ActivityRecord[]): PersonaReport {
    if (records.length === 0) {
      throw new InsufficientDataError(profile.username);
    }

    const comments = records.filter((r): r is CommentRecord => r.kind === 'comment');
    const posts = records.filter((r): r is PostRecord => r.kind === 'post');

    const { topSubreddits, subredditCounts } = this.rankSubreddits(records);
    const hourRanking = this.rankHours(records);
    const avgCommentLength = this.averageCommentLength(comments);

    const report: PersonaReport = {
      username: profile.username,
      profile: { ...profile },
      interests: {
        top_subreddits: topSubreddits,
        subreddit_counts: subredditCounts,
        common_keywords: this.extractKeywords(records, comments),
      },
      behavior: {
        avg_comment_length: avgCommentLength,
        active_hours: hourRanking
          .slice(0, this.options.topHours)
          .map(([hour]) => formatHourRange(hour)),
        hour_distribution: this.hourDistribution(hourRanking),
        post_type_ratio: {
          comments: comments.length / records.length,
          posts: posts.length / records.length,
        },
        engagement_level: this.engagementLevel(records),
      },
      personality_traits: this.extractPersonality(comments, avgCommentLength),
      demographics: {
        likely_timezone: this.guessTimezone(hourRanking),
        possible_location: this.guessLocation(comments),
      },
      sources: {
        comment_count: comments.length,
        post_count: posts.length,
        sample_comment: comments.length > 0 ? { ...comments[0] } : null,
        sample_post: posts.length > 0 ? { ...posts[0] } : null,
      },
    };

    return deepFreeze(report);
  }

  /**
   * Count subreddits; ties keep first-seen order
   */
  private rankSubreddits(records: readonly ActivityRecord[]): {
    topSubreddits: SubredditInterest[];
    subredditCounts: Record<string, number>;
  } {
    const seen = new Map<string, { count: number; first: ActivityRecord }>();

    for (const record of records) {
      const entry = seen.get(record.subreddit);
      if (entry) {
        entry.count++;
      } else {
        seen.set(record.subreddit, { count: 1, first: record });
      }
    }

    const subredditCounts: Record<string, number> = {};
    for (const [subreddit, { count }] of seen) {
      subredditCounts[subreddit] = count;
    }

    // Array.prototype.sort is stable, so insertion order breaks ties
    const topSubreddits = Array.from(seen.entries())
      .sort((a, b) => b[1].count - a[1].count)
      .slice(0, this.options.topSubreddits)
      .map(([subreddit, { count, first }]) => ({
        subreddit,
        count,
        citation: citationFor(first),
      }));

    return { topSubreddits, subredditCounts };
  }

  /**
   * Rank UTC hours of day by activity; ties go to the earlier hour
   */
  private rankHours(records: readonly ActivityRecord[]): [number, number][] {
    const counts = new Map<number, number>();

    for (const record of records) {
      if (!isValidEpoch(record.created_at)) {
        continue;
      }
      const hour = new Date(record.created_at * 1000).getUTCHours();
      counts.set(hour, (counts.get(hour) || 0) + 1);
    }

    return Array.from(counts.entries()).sort((a, b) => b[1] - a[1] || a[0] - b[0]);
  }

  private hourDistribution(ranking: [number, number][]): Record<number, number> {
    const distribution: Record<number, number> = {};
    for (const [hour, count] of [...ranking].sort((a, b) => a[0] - b[0])) {
      distribution[hour] = count;
    }
    return distribution;
  }

  private averageCommentLength(comments: readonly CommentRecord[]): number | null {
    if (comments.length === 0) {
      return null;
    }
    const total = comments.reduce((sum, c) => sum + charLength(c.body), 0);
    return total / comments.length;
  }

  /**
   * Most common words across comments, titles and self-texts
   */
  private extractKeywords(
    records: readonly ActivityRecord[],
    comments: readonly CommentRecord[]
  ): KeywordInterest[] {
    const counts = new Map<string, number>();

    for (const record of records) {
      const texts = record.kind === 'comment' ? [record.body] : [record.selftext, record.title];
      for (const text of texts) {
        for (const word of this.tokenize(text)) {
          counts.set(word, (counts.get(word) || 0) + 1);
        }
      }
    }

    return Array.from(counts.entries())
      .sort((a, b) => b[1] - a[1])
      .slice(0, this.options.keywordLimit)
      .map(([keyword, count]) => {
        const source = comments.find((c) => c.body.toLowerCase().includes(keyword));
        return {
          keyword,
          count,
          citation: source ? citationFor(source) : null,
        };
      });
  }

  private tokenize(text: string): string[] {
    return text
      .split(/\s+/)
      .filter((word) => /^\p{L}+$/u.test(word))
      .map((word) => word.toLowerCase())
      .filter((word) => word.length > 3 && !STOP_WORDS.has(word));
  }

  private engagementLevel(records: readonly ActivityRecord[]): EngagementLevel {
    const total = records.length;
    const avgScore = records.reduce((sum, r) => sum + r.score, 0) / total;

    if (total > 50 && avgScore > 10) {
      return 'Highly Engaged';
    }
    if (total > 20 || avgScore > 5) {
      return 'Active';
    }
    return 'Occasional';
  }

  private extractPersonality(
    comments: readonly CommentRecord[],
    avgCommentLength: number | null
  ): string[] {
    const traits: string[] = [];
    let positive = 0;
    let negative = 0;

    for (const comment of comments) {
      const body = comment.body.toLowerCase();
      positive += POSITIVE_WORDS.filter((word) => body.includes(word)).length;
      negative += NEGATIVE_WORDS.filter((word) => body.includes(word)).length;
    }

    if (positive > negative * 1.5) {
      traits.push('Positive');
    } else if (negative > positive * 1.5) {
      traits.push('Negative');
    }

    if (avgCommentLength !== null) {
      if (avgCommentLength > 150) {
        traits.push('Detailed/Thoughtful');
      } else if (avgCommentLength < 50) {
        traits.push('Concise');
      }
    }

    return traits;
  }

  /**
   * Rough timezone from the mean of the three busiest hours
   */
  private guessTimezone(ranking: [number, number][]): string | null {
    const busiest = ranking.slice(0, 3);
    if (busiest.length === 0) {
      return null;
    }

    const avg = busiest.reduce((sum, [hour]) => sum + hour, 0) / busiest.length;

    if (avg < 6) {
      return 'UTC-5 to UTC-8 (Americas night time)';
    }
    if (avg < 12) {
      return 'UTC+0 to UTC+5 (Europe morning)';
    }
    if (avg < 18) {
      return 'UTC+8 to UTC+10 (Asia afternoon)';
    }
    return 'UTC+1 to UTC+3 (Europe evening)';
  }

  private guessLocation(comments: readonly CommentRecord[]): string | null {
    for (const comment of comments) {
      const text = comment.body.toLowerCase();
      const match = LOCATION_INDICATORS.find(({ pattern }) => pattern.test(text));
      if (match) {
        return match.location;
      }
    }
    return null;
  }
}
