/**
 * Error types
 */

export type PersonaErrorCode = 'INSUFFICIENT_DATA' | 'REDDIT_API' | 'USER_NOT_FOUND';

export class PersonaError extends Error {
  readonly code: PersonaErrorCode;

  constructor(code: PersonaErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No activity records to compute statistics from */
export class InsufficientDataError extends PersonaError {
  constructor(username: string) {
    super('INSUFFICIENT_DATA', `No activity records available for u/${username}`);
  }
}

export class RedditApiError extends PersonaError {
  readonly status: number;

  constructor(status: number, url: string) {
    super('REDDIT_API', `Reddit API error: ${status} (${url})`);
    this.status = status;
  }
}

export class UserNotFoundError extends PersonaError {
  constructor(username: string) {
    super('USER_NOT_FOUND', `Reddit user not found: u/${username}`);
  }
}
