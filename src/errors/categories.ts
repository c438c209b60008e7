/**
 * Specific error categories for the video generation integration
 * @module volcengine-video-jobs/errors/categories
 */

import { VideoGenError, type VideoGenErrorParams } from './error.js';

type CategoryParams = Omit<VideoGenErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Missing or malformed configuration and credentials. Fatal, never retried.
 */
export class ConfigurationError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'configuration_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  /**
   * Credentials required by an operation were not configured
   */
  static missingCredentials(kind: 'keyPair' | 'bearerToken'): ConfigurationError {
    const what =
      kind === 'keyPair'
        ? 'access key ID and secret access key'
        : 'bearer API token';
    return new ConfigurationError({
      message: `The ${what} is required for this operation but was not configured`,
      code: kind === 'keyPair' ? 'MISSING_KEY_PAIR' : 'MISSING_BEARER_TOKEN',
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigurationError {
    return new ConfigurationError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'INVALID_CONFIG',
      details: { paramName },
    });
  }
}

export type SigningErrorCode =
  | 'INVALID_URL'
  | 'INVALID_QUERY'
  | 'MISSING_CREDENTIALS'
  | 'SIGNING_FAILED';

/**
 * Malformed input to the request signer. The request must not be sent.
 */
export class SigningError extends VideoGenError {
  constructor(message: string, code: SigningErrorCode, cause?: unknown) {
    super({
      message,
      code,
      cause,
      type: 'signing_error',
      isRetryable: false,
    });
    this.name = 'SigningError';
    Object.setPrototypeOf(this, SigningError.prototype);
  }
}

/**
 * Job creation was rejected or the response carried neither a task ID nor a
 * resolved result. Not retried.
 */
export class SubmissionError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'submission_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }

  static rejected(status: number, body: string, requestId?: string): SubmissionError {
    return new SubmissionError({
      message: `Task submission failed with HTTP ${status}: ${body.slice(0, 500)}`,
      code: 'SUBMISSION_REJECTED',
      status,
      requestId,
    });
  }

  static missingIdentifier(body: unknown): SubmissionError {
    return new SubmissionError({
      message: 'Task submission response contained neither a task ID nor a result',
      code: 'MISSING_TASK_ID',
      details: { body },
    });
  }
}

/**
 * A single status check failed. The poll loop logs it and keeps going.
 */
export class TransientPollError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'transient_poll_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'TransientPollError';
    Object.setPrototypeOf(this, TransientPollError.prototype);
  }
}

/**
 * Streaming the finished artifact to disk failed.
 */
export class DownloadError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'download_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }

  static httpStatus(status: number, url: string): DownloadError {
    return new DownloadError({
      message: `Artifact download failed with HTTP ${status}`,
      code: 'DOWNLOAD_HTTP_ERROR',
      status,
      isRetryable: status >= 500,
      details: { url },
    });
  }

  static incompleteBody(expectedSize: number, actualSize: number): DownloadError {
    return new DownloadError({
      message: `Artifact incomplete. Expected ${expectedSize} bytes, got ${actualSize} bytes.`,
      code: 'INCOMPLETE_BODY',
      details: { expectedSize, actualSize },
    });
  }
}

/**
 * Publishing a local media file to the public host failed.
 */
export class UploadError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'upload_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'UploadError';
    Object.setPrototypeOf(this, UploadError.prototype);
  }
}

/**
 * Network and connectivity errors raised by the transport
 */
export class NetworkError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'network_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }

  static connectionFailed(message?: string, cause?: unknown): NetworkError {
    return new NetworkError({
      message: message ?? 'Failed to establish connection',
      code: 'CONNECTION_FAILED',
      cause,
    });
  }

  static timeout(timeoutMs: number): NetworkError {
    return new NetworkError({
      message: `Request timed out after ${timeoutMs}ms`,
      code: 'REQUEST_TIMEOUT',
      status: 408,
      details: { timeoutMs },
    });
  }

  static dnsError(hostname: string): NetworkError {
    return new NetworkError({
      message: `Failed to resolve DNS for hostname: ${hostname}`,
      code: 'DNS_ERROR',
      details: { hostname },
    });
  }

  static connectionReset(): NetworkError {
    return new NetworkError({
      message: 'Connection was reset by the peer',
      code: 'CONNECTION_RESET',
    });
  }
}

/**
 * Server-side errors (5xx, throttling)
 */
export class ServerError extends VideoGenError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'server_error',
      isRetryable: params.isRetryable ?? true,
    });
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }

  static internalError(requestId?: string): ServerError {
    return new ServerError({
      message: 'The service encountered an internal error',
      code: 'InternalError',
      status: 500,
      requestId,
    });
  }

  static throttled(status: number, requestId?: string): ServerError {
    return new ServerError({
      message: 'The service is throttling requests',
      code: 'Throttled',
      status,
      requestId,
    });
  }

  static badGateway(requestId?: string): ServerError {
    return new ServerError({
      message: 'Bad gateway error',
      code: 'BadGateway',
      status: 502,
      requestId,
    });
  }

  static gatewayTimeout(requestId?: string): ServerError {
    return new ServerError({
      message: 'Gateway timeout error',
      code: 'GatewayTimeout',
      status: 504,
      requestId,
    });
  }
}
