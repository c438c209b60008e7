/**
 * Error system for the video generation integration
 * @module volcengine-video-jobs/errors
 */

// Base error class
export { VideoGenError, type VideoGenErrorParams } from './error.js';

// Error categories
export {
  ConfigurationError,
  DownloadError,
  NetworkError,
  ServerError,
  SigningError,
  SubmissionError,
  TransientPollError,
  UploadError,
  type SigningErrorCode,
} from './categories.js';

// Error mapping utilities
export { isVideoGenError, isRetryableError, describeError } from './mapping.js';
