/**
 * Reddit data client
 *
 * Reads a user's profile and recent activity from Reddit's public JSON
 * endpoints. Entries are returned raw (tagged with kind) for the ingestor.
 */

import type { ActivitySource, PersonaSettings, UserProfile } from '../types';
import { RedditApiError, UserNotFoundError } from '../core/errors';
import { DEFAULT_BASE_URL, DEFAULT_USER_AGENT, SETTINGS_PATH, isValidEpoch, loadSettings } from '../utils/paths';

export interface RedditClientOptions {
  baseUrl?: string;
  userAgent?: string;
  /** Settings file consulted for values not given here */
  settingsPath?: string;
}

/** Reddit caps listing pages at 100 items */
const PAGE_SIZE = 100;

export const DEFAULT_ACTIVITY_LIMIT = 100;

type ListingKind = 't1' | 't3';

interface ListingPage {
  children: Record<string, unknown>[];
  after: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function epochField(data: Record<string, unknown>, key: string): number {
  const value = numberField(data, key);
  return isValidEpoch(value) ? value : 0;
}

export class RedditClient implements ActivitySource {
  private baseUrl: string;
  private userAgent: string;

  constructor(options: RedditClientOptions = {}) {
    const settings: PersonaSettings = loadSettings(options.settingsPath ?? SETTINGS_PATH);
    this.baseUrl = (options.baseUrl || settings.REDDIT_BASE_URL || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent || settings.REDDIT_USER_AGENT || DEFAULT_USER_AGENT;
  }

  /**
   * Fetch basic user information
   */
  async getUserProfile(username: string): Promise<UserProfile> {
    const url = `${this.baseUrl}/user/${encodeURIComponent(username)}/about.json`;
    const body = await this.fetchJSON(url, username);

    const data = isRecord(body) ? body.data : undefined;
    if (!isRecord(data)) {
      throw new UserNotFoundError(username);
    }

    return {
      username: typeof data.name === 'string' ? data.name : username,
      account_created_at: epochField(data, 'created_utc'),
      comment_karma: numberField(data, 'comment_karma'),
      post_karma: numberField(data, 'link_karma'),
      is_gold: data.is_gold === true,
      is_mod: data.is_mod === true,
    };
  }

  /**
   * Fetch recent comments and posts, comments first
   */
  async getUserActivity(username: string, limit: number = DEFAULT_ACTIVITY_LIMIT): Promise<unknown[]> {
    const [comments, posts] = await Promise.all([
      this.fetchListing(username, 'comments', 't1', limit),
      this.fetchListing(username, 'submitted', 't3', limit),
    ]);

    return [
      ...comments.map((data) => ({ ...data, kind: 'comment' })),
      ...posts.map((data) => ({ ...data, kind: 'post' })),
    ];
  }

  /**
   * Follow "after" cursors until the limit is reached or the listing ends
   */
  private async fetchListing(
    username: string,
    listing: 'comments' | 'submitted',
    kind: ListingKind,
    limit: number
  ): Promise<Record<string, unknown>[]> {
    const items: Record<string, unknown>[] = [];
    let after: string | null = null;

    if (limit <= 0) {
      return items;
    }

    do {
      const pageSize = Math.min(PAGE_SIZE, limit - items.length);
      const params = new URLSearchParams({ limit: String(pageSize), sort: 'new' });
      if (after) {
        params.set('after', after);
      }

      const url = `${this.baseUrl}/user/${encodeURIComponent(username)}/${listing}.json?${params}`;
      const page: ListingPage = this.parseListing(await this.fetchJSON(url, username), kind);

      items.push(...page.children.slice(0, limit - items.length));
      after = page.children.length > 0 ? page.after : null;
    } while (after && items.length < limit);

    console.log(`Reddit: got ${items.length} ${kind === 't1' ? 'comments' : 'posts'} for u/${username}`);
    return items;
  }

  private parseListing(body: unknown, kind: ListingKind): ListingPage {
    const data = isRecord(body) ? body.data : undefined;
    if (!isRecord(data) || !Array.isArray(data.children)) {
      return { children: [], after: null };
    }

    const children: Record<string, unknown>[] = [];
    for (const child of data.children) {
      if (isRecord(child) && child.kind === kind && isRecord(child.data)) {
        children.push(child.data);
      }
    }

    return {
      children,
      after: typeof data.after === 'string' && data.after ? data.after : null,
    };
  }

  private async fetchJSON(url: string, username: string): Promise<unknown> {
    const res = await fetch(url, {
      headers: { 'User-Agent': this.userAgent },
    });

    if (!res.ok) {
      // Release the connection before giving up on the body
      await res.body?.cancel();
      if (res.status === 404) {
        throw new UserNotFoundError(username);
      }
      throw new RedditApiError(res.status, url);
    }

    const body: unknown = await res.json();
    return body;
  }
}
