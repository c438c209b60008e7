/**
 * Base error class for the video generation integration
 * @module volcengine-video-jobs/errors/error
 */

export interface VideoGenErrorParams {
  /** Category, e.g. `submission_error` */
  readonly type: string;
  readonly message: string;
  /** HTTP status of the response that caused the error */
  readonly status?: number;
  /** Stable machine-readable code, e.g. `MISSING_TASK_ID` */
  readonly code?: string;
  readonly isRetryable: boolean;
  /** `X-Tt-Logid` or `X-Request-Id` of the failed exchange */
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Root of every error raised while signing, submitting, polling, uploading
 * or downloading. Subclasses fix `type` and default `isRetryable`.
 */
export class VideoGenError extends Error {
  readonly type: string;
  readonly status?: number;
  readonly code?: string;
  readonly isRetryable: boolean;
  readonly requestId?: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: unknown;

  constructor(params: VideoGenErrorParams) {
    super(params.message);

    // Keep instanceof working for subclasses compiled to older targets
    Object.setPrototypeOf(this, VideoGenError.prototype);

    this.name = 'VideoGenError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.requestId = params.requestId;
    this.details = params.details;
    this.cause = params.cause;

    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * Plain object for structured logs; the cause is left out
   */
  toJSON(): Record<string, unknown> {
    const { name, type, message, status, code, isRetryable, requestId, details } = this;
    return { name, type, message, status, code, isRetryable, requestId, details };
  }

  /**
   * `Name [CODE] (status) - message (RequestId: id)`, omitting absent parts
   */
  override toString(): string {
    const code = this.code ? ` [${this.code}]` : '';
    const status = this.status ? ` (${this.status})` : '';
    const requestId = this.requestId ? ` (RequestId: ${this.requestId})` : '';
    return `${this.name}${code}${status} - ${this.message}${requestId}`;
  }
}
