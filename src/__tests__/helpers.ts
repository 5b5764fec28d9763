/**
 * Shared test fixtures
 */

import type { ActivitySource, CommentRecord, PostRecord, UserProfile } from '../types';

/** 2024-01-15T00:00:00Z */
export const BASE_EPOCH = 1705276800;

export function atHour(hour: number, dayOffset = 0): number {
  return BASE_EPOCH + dayOffset * 86400 + hour * 3600;
}

export function createProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    username: 'test_user',
    account_created_at: 1704067200,
    comment_karma: 120,
    post_karma: 45,
    is_gold: false,
    is_mod: true,
    ...overrides,
  };
}

export function comment(
  id: string,
  subreddit: string,
  body: string,
  hour = 12,
  overrides: Partial<CommentRecord> = {}
): CommentRecord {
  return {
    kind: 'comment',
    id,
    subreddit,
    body,
    created_at: atHour(hour),
    permalink: `/r/${subreddit}/comments/${id}/`,
    score: 1,
    ...overrides,
  };
}

export function post(
  id: string,
  subreddit: string,
  title: string,
  hour = 12,
  overrides: Partial<PostRecord> = {}
): PostRecord {
  return {
    kind: 'post',
    id,
    subreddit,
    title,
    selftext: '',
    url: '',
    created_at: atHour(hour),
    permalink: `/r/${subreddit}/comments/${id}/`,
    score: 1,
    ...overrides,
  };
}

/**
 * Activity source backed by in-memory data
 */
export class FakeActivitySource implements ActivitySource {
  requested: string[] = [];

  constructor(
    private profile: UserProfile,
    private activity: unknown[],
    private failure?: Error
  ) {}

  async getUserProfile(username: string): Promise<UserProfile> {
    this.requested.push(username);
    if (this.failure) {
      throw this.failure;
    }
    return { ...this.profile, username };
  }

  async getUserActivity(): Promise<unknown[]> {
    return this.activity;
  }
}
