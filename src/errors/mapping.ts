/**
 * Error mapping utilities for the video generation integration
 * @module volcengine-video-jobs/errors/mapping
 */

import { VideoGenError } from './error.js';

/**
 * Type guard for VideoGenError
 */
export function isVideoGenError(error: unknown): error is VideoGenError {
  return error instanceof VideoGenError;
}

/**
 * Whether an error is worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (isVideoGenError(error)) {
    return error.isRetryable;
  }
  return false;
}

/**
 * One-line description of an error for failure values and log lines
 */
export function describeError(error: unknown): string {
  if (isVideoGenError(error)) {
    return error.toString();
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
