export class AppError extends Error {
  constructor(message: string, public readonly statusCode: number = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, statusCode = 400) {
    super(message, statusCode);
  }
}

export interface YouTubeApiErrorDetails {
  status?: number;
  reason?: string;
  cause?: unknown;
}

export const COMMENTS_DISABLED_REASON = "commentsDisabled";

/** Error reported by the YouTube Data API, or a transport failure on the way to it. */
export class YouTubeApiError extends AppError {
  readonly status: number | null;
  readonly reason: string | null;

  constructor(message: string, details: YouTubeApiErrorDetails = {}) {
    super(message, 502, { cause: details.cause });
    this.status = details.status ?? null;
    this.reason = details.reason ?? null;
  }

  get isCommentsDisabled(): boolean {
    return this.reason === COMMENTS_DISABLED_REASON;
  }

  get isRetryable(): boolean {
    if (this.status === null) return true;
    return this.status === 429 || this.status >= 500;
  }
}
