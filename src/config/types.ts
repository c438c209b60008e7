/**
 * Configuration type definitions
 * @module volcengine-video-jobs/config/types
 */

import type { Credentials, SecretString } from '../auth/index.js';
import type { LogLevel } from '../observability/index.js';

/**
 * Endpoint and signing parameters of the keyed-hash signed (visual) service.
 */
export interface VisualServiceConfig {
  /**
   * Base URL; the action and version are appended as query parameters.
   * @default "https://visual.volcengineapi.com"
   */
  endpoint: string;

  /**
   * Signing region.
   * @default "cn-north-1"
   */
  region: string;

  /**
   * Signing service name.
   * @default "cv"
   */
  service: string;

  /**
   * API version query parameter.
   * @default "2022-08-31"
   */
  version: string;

  /**
   * @default "CVSubmitTask"
   */
  submitAction: string;

  /**
   * @default "CVGetResult"
   */
  resultAction: string;
}

/**
 * Endpoint of the bearer-token (ark) service.
 */
export interface ArkServiceConfig {
  /**
   * Base API URL.
   * @default "https://ark.cn-beijing.volces.com/api/v3"
   */
  endpoint: string;
}

/**
 * Poll loop budget.
 */
export interface PollingConfig {
  /**
   * Maximum number of status checks per task (1..10000).
   * @default 60
   */
  maxAttempts: number;

  /**
   * Fixed delay between status checks in milliseconds.
   * @default 5000
   */
  intervalMs: number;
}

/**
 * Configuration as supplied by callers. Every field is optional.
 */
export interface VideoGenConfig {
  /**
   * Access key ID for signed requests.
   */
  accessKeyId?: string;

  /**
   * Secret access key for signed requests.
   */
  secretAccessKey?: string;

  /**
   * Bearer token for the ark service.
   */
  apiKey?: string;

  /**
   * ImgBB API key for publishing local media files.
   */
  imgbbApiKey?: string;

  visual?: Partial<VisualServiceConfig>;

  ark?: Partial<ArkServiceConfig>;

  polling?: Partial<PollingConfig>;

  /**
   * Per-request timeout in milliseconds.
   * @default 300000 (5 minutes)
   */
  timeout?: number;

  /**
   * Root directory for downloaded videos.
   * @default "./output"
   */
  outputDir?: string;

  /**
   * @default "info"
   */
  logLevel?: LogLevel;
}

/**
 * Normalized configuration with all defaults applied and secrets wrapped.
 */
export interface NormalizedVideoGenConfig {
  credentials: Credentials;
  imgbbApiKey?: SecretString;
  visual: VisualServiceConfig;
  ark: ArkServiceConfig;
  polling: PollingConfig;
  timeout: number;
  outputDir: string;
  logLevel: LogLevel;
}
