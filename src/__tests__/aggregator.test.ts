/**
 * PersonaAggregator unit tests
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { PersonaAggregator, formatHourRange, toSnippet } from '../core/aggregator';
import { InsufficientDataError } from '../core/errors';
import type { ActivityRecord } from '../types';
import { atHour, comment, createProfile, post } from './helpers';

describe('PersonaAggregator', () => {
  let aggregator: PersonaAggregator;
  const profile = createProfile();

  beforeEach(() => {
    aggregator = new PersonaAggregator();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('top subreddits', () => {
    const records: ActivityRecord[] = [
      comment('c1', 'typescript', 'Narrowing with type guards'),
      post('p1', 'node', 'Streams in Node twenty'),
      comment('c2', 'typescript', 'Second comment'),
      comment('c3', 'rust', 'Borrow checker'),
      comment('c4', 'node', 'Another node comment'),
      comment('c5', 'golang', 'Goroutines'),
    ];

    test('should rank by count and break ties by first-seen order', () => {
      const report = aggregator.aggregate(profile, records);

      expect(report.interests.top_subreddits.map((s) => [s.subreddit, s.count])).toEqual([
        ['typescript', 2],
        ['node', 2],
        ['rust', 1],
      ]);
    });

    test('should cite the first record of each subreddit', () => {
      const report = aggregator.aggregate(profile, records);
      const citations = report.interests.top_subreddits.map((s) => s.citation);

      expect(citations).toEqual([
        {
          kind: 'comment',
          record_id: 'c1',
          subreddit: 'typescript',
          snippet: 'Narrowing with type guards',
          permalink: '/r/typescript/comments/c1/',
        },
        {
          kind: 'post',
          record_id: 'p1',
          subreddit: 'node',
          snippet: 'Streams in Node twenty',
          permalink: '/r/node/comments/p1/',
        },
        {
          kind: 'comment',
          record_id: 'c3',
          subreddit: 'rust',
          snippet: 'Borrow checker',
          permalink: '/r/rust/comments/c3/',
        },
      ]);
    });

    test('should give every reported subreddit exactly one citation from that subreddit', () => {
      const report = aggregator.aggregate(profile, records);

      for (const interest of report.interests.top_subreddits) {
        const cited = records.find((r) => r.id === interest.citation.record_id);
        expect(cited?.subreddit).toBe(interest.subreddit);
      }
    });

    test('should count every subreddit', () => {
      const report = aggregator.aggregate(profile, records);

      expect(report.interests.subreddit_counts).toEqual({
        typescript: 2,
        node: 2,
        rust: 1,
        golang: 1,
      });
    });

    test('should respect the topSubreddits option', () => {
      const report = new PersonaAggregator({ topSubreddits: 1 }).aggregate(profile, records);

      expect(report.interests.top_subreddits.map((s) => s.subreddit)).toEqual(['typescript']);
    });
  });

  describe('average comment length', () => {
    test('should average comments only', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'a', 'x'.repeat(10)),
        post('p1', 'a', 'y'.repeat(500)),
        comment('c2', 'a', 'x'.repeat(20)),
        comment('c3', 'b', 'x'.repeat(30)),
        post('p2', 'b', 'short'),
      ]);

      expect(report.behavior.avg_comment_length).toBe(20);
    });

    test('should count characters, not UTF-16 units', () => {
      const report = aggregator.aggregate(profile, [comment('c1', 'a', '😀😀😀😀😀')]);

      expect(report.behavior.avg_comment_length).toBe(5);
    });

    test('should be null without comments', () => {
      const report = aggregator.aggregate(profile, [post('p1', 'a', 'Only a post')]);

      expect(report.behavior.avg_comment_length).toBeNull();
      expect(report.personality_traits).toEqual([]);
    });
  });

  describe('active hours', () => {
    test('should rank hours by count', () => {
      const hours = [9, 9, 9, 14, 14, 20];
      const records = hours.map((hour, i) => comment(`c${i}`, 'a', 'text', hour));

      const report = aggregator.aggregate(profile, records);

      expect(report.behavior.active_hours).toEqual(['09:00-10:00', '14:00-15:00']);
      expect(report.behavior.hour_distribution).toEqual({ 9: 3, 14: 2, 20: 1 });
    });

    test('should break ties by earlier hour', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'a', 'late', 20),
        comment('c2', 'a', 'early', 3),
        comment('c3', 'a', 'middle', 11),
      ]);

      expect(report.behavior.active_hours).toEqual(['03:00-04:00', '11:00-12:00']);
    });

    test('should use UTC hours across days', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'a', 'one', 0, { created_at: atHour(22, 1) }),
        comment('c2', 'a', 'two', 0, { created_at: atHour(22, 5) }),
      ]);

      expect(report.behavior.active_hours).toEqual(['22:00-23:00']);
    });

    test('should leave out records whose timestamp Date cannot represent', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'a', 'valid', 9),
        comment('c2', 'a', 'far future', 0, { created_at: 1e16 }),
      ]);

      expect(report.behavior.active_hours).toEqual(['09:00-10:00']);
      expect(report.behavior.hour_distribution).toEqual({ 9: 1 });
      expect(report.interests.subreddit_counts).toEqual({ a: 2 });
    });

    test('should format hour ranges with two digits', () => {
      expect(formatHourRange(0)).toBe('00:00-01:00');
      expect(formatHourRange(9)).toBe('09:00-10:00');
      expect(formatHourRange(23)).toBe('23:00-24:00');
    });
  });

  describe('errors and malformed input', () => {
    test('should throw InsufficientDataError for empty activity', () => {
      expect(() => aggregator.aggregate(profile, [])).toThrow(InsufficientDataError);
    });

    test('should throw InsufficientDataError when every raw record is malformed', () => {
      expect(() =>
        aggregator.aggregateRaw(profile, [{ kind: 'comment', id: 'c1', body: 'no subreddit' }])
      ).toThrow('No activity records available for u/test_user');
    });

    test('should skip a record without created_utc and keep going', () => {
      const report = aggregator.aggregateRaw(profile, [
        { kind: 'comment', id: 'c1', subreddit: 'a', body: 'valid', created_utc: atHour(9) },
        { kind: 'comment', id: 'c2', subreddit: 'b', body: 'no timestamp' },
        { kind: 'post', id: 'p1', subreddit: 'a', title: 'valid post', created_utc: atHour(9) },
      ]);

      expect(report.behavior.active_hours).toEqual(['09:00-10:00']);
      expect(report.behavior.hour_distribution).toEqual({ 9: 2 });
      expect(report.interests.subreddit_counts).toEqual({ a: 2 });
      expect(console.warn).toHaveBeenCalledWith(
        'Skipping malformed activity record #1: missing created_utc (c2)'
      );
    });
  });

  describe('determinism', () => {
    test('should produce identical reports for identical input', () => {
      const records = [
        comment('c1', 'a', 'I love this', 8),
        post('p1', 'b', 'Weekend project', 19),
        comment('c2', 'b', 'Great write-up', 19),
      ];

      const first = aggregator.aggregate(profile, records);
      const second = new PersonaAggregator().aggregate(profile, records);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    test('should freeze the report', () => {
      const report = aggregator.aggregate(profile, [comment('c1', 'a', 'text')]);

      expect(Object.isFrozen(report)).toBe(true);
      expect(Object.isFrozen(report.interests.top_subreddits[0].citation)).toBe(true);
      expect(Object.isFrozen(report.behavior.active_hours)).toBe(true);
    });

    test('should not freeze the input records', () => {
      const records = [comment('c1', 'a', 'text')];
      aggregator.aggregate(profile, records);

      expect(Object.isFrozen(records[0])).toBe(false);
    });
  });

  describe('keywords', () => {
    test('should rank words and cite the first comment containing them', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'typescript', 'TypeScript generics are great'),
        comment('c2', 'typescript', 'generics again'),
        post('p1', 'rust', 'ownership'),
      ]);

      const keywords = report.interests.common_keywords;
      expect(keywords.map((k) => [k.keyword, k.count])).toEqual([
        ['generics', 2],
        ['typescript', 1],
        ['great', 1],
        ['again', 1],
        ['ownership', 1],
      ]);
      expect(keywords[0].citation?.record_id).toBe('c1');
      expect(keywords[4].citation).toBeNull();
    });

    test('should ignore punctuated tokens, short words and stop words', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'a', 'hello, the cat sat with you'),
      ]);

      expect(report.interests.common_keywords.map((k) => k.keyword)).toEqual(['with']);
    });
  });

  describe('behavior and persona traits', () => {
    test('should compute the post type ratio', () => {
      const report = aggregator.aggregate(profile, [
        comment('c1', 'a', 'one'),
        comment('c2', 'a', 'two'),
        comment('c3', 'a', 'three'),
        post('p1', 'a', 'four'),
      ]);

      expect(report.behavior.post_type_ratio).toEqual({ comments: 0.75, posts: 0.25 });
    });

    test('should grade engagement by volume and score', () => {
      const quiet = aggregator.aggregate(profile, [comment('c1', 'a', 'text', 12, { score: 2 })]);
      const scored = aggregator.aggregate(profile, [comment('c1', 'a', 'text', 12, { score: 6 })]);
      const busy = aggregator.aggregate(
        profile,
        Array.from({ length: 51 }, (_, i) => comment(`c${i}`, 'a', 'text', 12, { score: 11 }))
      );
      const frequent = aggregator.aggregate(
        profile,
        Array.from({ length: 21 }, (_, i) => comment(`c${i}`, 'a', 'text', 12, { score: 0 }))
      );

      expect(quiet.behavior.engagement_level).toBe('Occasional');
      expect(frequent.behavior.engagement_level).toBe('Active');
      expect(scored.behavior.engagement_level).toBe('Active');
      expect(busy.behavior.engagement_level).toBe('Highly Engaged');
    });

    test('should detect positive and concise writing', () => {
      const report = aggregator.aggregate(profile, [comment('c1', 'a', 'I love this, great work')]);

      expect(report.personality_traits).toEqual(['Positive', 'Concise']);
    });

    test('should detect negative and detailed writing', () => {
      const body = 'I hate how awful this turned out. ' + 'x'.repeat(150);
      const report = aggregator.aggregate(profile, [comment('c1', 'a', body)]);

      expect(report.personality_traits).toEqual(['Negative', 'Detailed/Thoughtful']);
    });

    test('should guess a timezone from the busiest hours', () => {
      const hours = [9, 9, 9, 14, 14, 20];
      const report = aggregator.aggregate(
        profile,
        hours.map((hour, i) => comment(`c${i}`, 'a', 'text', hour))
      );

      // mean of 9, 14 and 20
      expect(report.demographics.likely_timezone).toBe('UTC+8 to UTC+10 (Asia afternoon)');
    });

    test('should guess a location from whole-word mentions', () => {
      const uk = aggregator.aggregate(profile, [comment('c1', 'a', 'Moved to London last year')]);
      const none = aggregator.aggregate(profile, [comment('c1', 'a', 'tell us more, thanks')]);
      const us = aggregator.aggregate(profile, [comment('c1', 'a', 'Shipping inside the USA only')]);
      const both = aggregator.aggregate(profile, [
        comment('c1', 'a', 'Flew from London back to America'),
      ]);

      expect(uk.demographics.possible_location).toBe('United Kingdom');
      expect(us.demographics.possible_location).toBe('United States');
      expect(both.demographics.possible_location).toBe('United States');
      expect(none.demographics.possible_location).toBeNull();
    });

    test('should keep the first comment and post as samples', () => {
      const report = aggregator.aggregate(profile, [
        post('p1', 'a', 'First post'),
        comment('c1', 'a', 'First comment'),
        comment('c2', 'a', 'Second comment'),
      ]);

      expect(report.sources.comment_count).toBe(2);
      expect(report.sources.post_count).toBe(1);
      expect(report.sources.sample_comment?.id).toBe('c1');
      expect(report.sources.sample_post?.id).toBe('p1');
    });
  });

  describe('toSnippet', () => {
    test('should collapse whitespace and keep 30 characters', () => {
      expect(toSnippet('Hello\n\nworld this is a long comment body that goes on')).toBe(
        'Hello world this is a long com'
      );
    });

    test('should not split a character made of two UTF-16 units', () => {
      expect(toSnippet('a'.repeat(29) + '😀 tail')).toBe('a'.repeat(29) + '😀');
    });

    test('should keep short text as is', () => {
      expect(toSnippet('  short  ')).toBe('short');
    });
  });
});
