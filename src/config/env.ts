/**
 * Environment variable configuration loading
 * @module volcengine-video-jobs/config/env
 */

import { ConfigurationError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../observability/index.js';
import type { NormalizedVideoGenConfig, VideoGenConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  ACCESS_KEY_ID: 'VOLC_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'VOLC_SECRET_ACCESS_KEY',
  API_KEY: 'ARK_API_KEY',
  IMGBB_API_KEY: 'IMGBB_API_KEY',
  OUTPUT_DIR: 'VIDEOGEN_OUTPUT_DIR',
  POLL_MAX_ATTEMPTS: 'VIDEOGEN_POLL_MAX_ATTEMPTS',
  POLL_INTERVAL_MS: 'VIDEOGEN_POLL_INTERVAL_MS',
  TIMEOUT_MS: 'VIDEOGEN_TIMEOUT_MS',
  LOG_LEVEL: 'VIDEOGEN_LOG_LEVEL',
} as const;

/**
 * Parses an integer from an environment variable.
 *
 * @param value - String value to parse
 * @param name - Environment variable name (for error messages)
 * @returns Parsed integer or undefined if value is empty
 * @throws {ConfigurationError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError({
      message: `${name} must be a valid integer, got: ${value}`,
      code: 'INVALID_INTEGER',
      details: { name },
    });
  }

  return parseInt(trimmed, 10);
}

function parseLogLevelEnv(value: string | undefined, name: string): LogLevel | undefined {
  if (!value || value.trim() === '') {
    return undefined;
  }

  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw ConfigurationError.invalidConfig(name, `${name} must be one of trace, debug, info, warn, error`);
  }
  return level;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Creates configuration from environment variables.
 *
 * Environment variables (all optional):
 * - VOLC_ACCESS_KEY_ID / VOLC_SECRET_ACCESS_KEY: key pair for signed services
 * - ARK_API_KEY: bearer token
 * - IMGBB_API_KEY: media host key
 * - VIDEOGEN_OUTPUT_DIR: download root
 * - VIDEOGEN_POLL_MAX_ATTEMPTS, VIDEOGEN_POLL_INTERVAL_MS: poll budget
 * - VIDEOGEN_TIMEOUT_MS: per-request timeout
 * - VIDEOGEN_LOG_LEVEL: trace | debug | info | warn | error
 *
 * Values in `overrides` win over the environment.
 *
 * @throws {ConfigurationError} If a variable is present but invalid
 */
export function createConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: VideoGenConfig = {}
): NormalizedVideoGenConfig {
  const fromEnv: VideoGenConfig = {
    accessKeyId: emptyToUndefined(env[ENV_VARS.ACCESS_KEY_ID]),
    secretAccessKey: emptyToUndefined(env[ENV_VARS.SECRET_ACCESS_KEY]),
    apiKey: emptyToUndefined(env[ENV_VARS.API_KEY]),
    imgbbApiKey: emptyToUndefined(env[ENV_VARS.IMGBB_API_KEY]),
    outputDir: emptyToUndefined(env[ENV_VARS.OUTPUT_DIR]),
    timeout: parseIntEnv(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS),
    logLevel: parseLogLevelEnv(env[ENV_VARS.LOG_LEVEL], ENV_VARS.LOG_LEVEL),
    polling: {
      maxAttempts: parseIntEnv(env[ENV_VARS.POLL_MAX_ATTEMPTS], ENV_VARS.POLL_MAX_ATTEMPTS),
      intervalMs: parseIntEnv(env[ENV_VARS.POLL_INTERVAL_MS], ENV_VARS.POLL_INTERVAL_MS),
    },
  };

  return normalizeConfig({
    accessKeyId: overrides.accessKeyId ?? fromEnv.accessKeyId,
    secretAccessKey: overrides.secretAccessKey ?? fromEnv.secretAccessKey,
    apiKey: overrides.apiKey ?? fromEnv.apiKey,
    imgbbApiKey: overrides.imgbbApiKey ?? fromEnv.imgbbApiKey,
    outputDir: overrides.outputDir ?? fromEnv.outputDir,
    timeout: overrides.timeout ?? fromEnv.timeout,
    logLevel: overrides.logLevel ?? fromEnv.logLevel,
    visual: overrides.visual,
    ark: overrides.ark,
    polling: {
      maxAttempts: overrides.polling?.maxAttempts ?? fromEnv.polling?.maxAttempts,
      intervalMs: overrides.polling?.intervalMs ?? fromEnv.polling?.intervalMs,
    },
  });
}
