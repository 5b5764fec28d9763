/**
 * Reddit Persona type definitions
 */

// ============ Activity Types ============

export type ActivityKind = 'comment' | 'post';

interface ActivityBase {
  id: string;
  subreddit: string;
  /** Epoch seconds (UTC) */
  created_at: number;
  permalink: string;
  score: number;
}

export interface CommentRecord extends ActivityBase {
  kind: 'comment';
  body: string;
}

export interface PostRecord extends ActivityBase {
  kind: 'post';
  title: string;
  selftext: string;
  url: string;
}

export type ActivityRecord = CommentRecord | PostRecord;

export interface RejectedRecord {
  index: number;
  reason: string;
}

export interface IngestResult {
  records: ActivityRecord[];
  rejected: RejectedRecord[];
}

// ============ Profile Types ============

export interface UserProfile {
  username: string;
  /** Epoch seconds (UTC) */
  account_created_at: number;
  comment_karma: number;
  post_karma: number;
  is_gold: boolean;
  is_mod: boolean;
}

// ============ Data Source Types ============

/**
 * Anything that can hand over a user's profile and raw activity.
 * Raw entries are validated by the ingestor, not by the source.
 */
export interface ActivitySource {
  getUserProfile(username: string): Promise<UserProfile>;
  getUserActivity(username: string, limit?: number): Promise<unknown[]>;
}

// ============ Report Types ============

export interface Citation {
  kind: ActivityKind;
  record_id: string;
  subreddit: string;
  snippet: string;
  permalink: string;
}

export interface SubredditInterest {
  subreddit: string;
  count: number;
  citation: Citation;
}

export interface KeywordInterest {
  keyword: string;
  count: number;
  citation: Citation | null;
}

export type EngagementLevel = 'Highly Engaged' | 'Active' | 'Occasional';

export interface PersonaReport {
  username: string;
  profile: UserProfile;

  interests: {
    top_subreddits: SubredditInterest[];
    subreddit_counts: Record<string, number>;
    common_keywords: KeywordInterest[];
  };

  behavior: {
    /** null when there are no comments */
    avg_comment_length: number | null;
    active_hours: string[];
    hour_distribution: Record<number, number>;
    post_type_ratio: {
      comments: number;
      posts: number;
    };
    engagement_level: EngagementLevel;
  };

  personality_traits: string[];

  demographics: {
    likely_timezone: string | null;
    possible_location: string | null;
  };

  sources: {
    comment_count: number;
    post_count: number;
    sample_comment: CommentRecord | null;
    sample_post: PostRecord | null;
  };
}

// ============ Settings Types ============

export interface PersonaSettings {
  REDDIT_USER_AGENT?: string;
  REDDIT_BASE_URL?: string;
}
