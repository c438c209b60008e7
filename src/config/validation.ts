/**
 * Configuration validation and normalization
 * @module volcengine-video-jobs/config/validation
 */

import { SecretString, type Credentials } from '../auth/index.js';
import { ConfigurationError } from '../errors/index.js';
import { isLogLevel } from '../observability/index.js';
import type { NormalizedVideoGenConfig, VideoGenConfig } from './types.js';
import {
  DEFAULT_ARK_CONFIG,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_POLLING_CONFIG,
  DEFAULT_TIMEOUT,
  DEFAULT_VISUAL_CONFIG,
  MAX_POLL_ATTEMPTS,
} from './defaults.js';

function validateEndpoint(paramName: string, endpoint: string | undefined): void {
  if (endpoint === undefined) {
    return;
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw ConfigurationError.invalidConfig(paramName, `${paramName} is not a valid URL: ${endpoint}`);
  }

  if (!['http:', 'https:'].includes(url.protocol)) {
    throw ConfigurationError.invalidConfig(paramName, `${paramName} must use http or https protocol`);
  }
}

function validateNonEmpty(paramName: string, value: string | undefined): void {
  if (value !== undefined && value.trim() === '') {
    throw ConfigurationError.invalidConfig(paramName, `${paramName} must not be empty`);
  }
}

/**
 * Validates configuration.
 * Missing credentials are not an error here; the operation that needs them
 * fails instead.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: VideoGenConfig): void {
  const hasAccessKey = Boolean(config.accessKeyId?.trim());
  const hasSecret = Boolean(config.secretAccessKey?.trim());
  if (hasAccessKey !== hasSecret) {
    throw ConfigurationError.invalidConfig(
      hasAccessKey ? 'secretAccessKey' : 'accessKeyId',
      'accessKeyId and secretAccessKey must be provided together'
    );
  }

  validateEndpoint('visual.endpoint', config.visual?.endpoint);
  validateEndpoint('ark.endpoint', config.ark?.endpoint);
  validateNonEmpty('visual.region', config.visual?.region);
  validateNonEmpty('visual.service', config.visual?.service);
  validateNonEmpty('visual.version', config.visual?.version);
  validateNonEmpty('visual.submitAction', config.visual?.submitAction);
  validateNonEmpty('visual.resultAction', config.visual?.resultAction);
  validateNonEmpty('outputDir', config.outputDir);

  const maxAttempts = config.polling?.maxAttempts;
  if (maxAttempts !== undefined) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1 || maxAttempts > MAX_POLL_ATTEMPTS) {
      throw ConfigurationError.invalidConfig(
        'polling.maxAttempts',
        `polling.maxAttempts must be an integer between 1 and ${MAX_POLL_ATTEMPTS}`
      );
    }
  }

  const intervalMs = config.polling?.intervalMs;
  if (intervalMs !== undefined) {
    if (!Number.isInteger(intervalMs) || intervalMs < 0) {
      throw ConfigurationError.invalidConfig(
        'polling.intervalMs',
        'polling.intervalMs must be a non-negative integer'
      );
    }
  }

  if (config.timeout !== undefined) {
    if (!Number.isInteger(config.timeout) || config.timeout <= 0) {
      throw ConfigurationError.invalidConfig('timeout', 'timeout must be a positive integer');
    }
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    throw ConfigurationError.invalidConfig('logLevel', `Unknown log level: ${config.logLevel}`);
  }
}

function credentialsFrom(config: VideoGenConfig): Credentials {
  const accessKeyId = config.accessKeyId?.trim();
  const secretAccessKey = config.secretAccessKey?.trim();
  const apiKey = config.apiKey?.trim();

  return {
    keyPair:
      accessKeyId && secretAccessKey
        ? { accessKeyId, secretAccessKey: new SecretString(secretAccessKey) }
        : undefined,
    bearer: apiKey ? { token: new SecretString(apiKey) } : undefined,
  };
}

/**
 * Normalizes configuration by applying defaults.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function normalizeConfig(config: VideoGenConfig = {}): NormalizedVideoGenConfig {
  validateConfig(config);

  const imgbbApiKey = config.imgbbApiKey?.trim();
  const visual = config.visual ?? {};

  return {
    credentials: credentialsFrom(config),
    imgbbApiKey: imgbbApiKey ? new SecretString(imgbbApiKey) : undefined,
    visual: {
      endpoint: (visual.endpoint ?? DEFAULT_VISUAL_CONFIG.endpoint).replace(/\/+$/, ''),
      region: visual.region ?? DEFAULT_VISUAL_CONFIG.region,
      service: visual.service ?? DEFAULT_VISUAL_CONFIG.service,
      version: visual.version ?? DEFAULT_VISUAL_CONFIG.version,
      submitAction: visual.submitAction ?? DEFAULT_VISUAL_CONFIG.submitAction,
      resultAction: visual.resultAction ?? DEFAULT_VISUAL_CONFIG.resultAction,
    },
    ark: {
      endpoint: (config.ark?.endpoint ?? DEFAULT_ARK_CONFIG.endpoint).replace(/\/+$/, ''),
    },
    polling: {
      maxAttempts: config.polling?.maxAttempts ?? DEFAULT_POLLING_CONFIG.maxAttempts,
      intervalMs: config.polling?.intervalMs ?? DEFAULT_POLLING_CONFIG.intervalMs,
    },
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    outputDir: config.outputDir ?? DEFAULT_OUTPUT_DIR,
    logLevel: config.logLevel ?? 'info',
  };
}

