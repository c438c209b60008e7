/**
 * Configuration module
 * @module volcengine-video-jobs/config
 */

export type {
  VideoGenConfig,
  NormalizedVideoGenConfig,
  VisualServiceConfig,
  ArkServiceConfig,
  PollingConfig,
} from './types.js';

export {
  DEFAULT_TIMEOUT,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_VISUAL_CONFIG,
  DEFAULT_ARK_CONFIG,
  DEFAULT_POLLING_CONFIG,
  MAX_POLL_ATTEMPTS,
} from './defaults.js';

export { validateConfig, normalizeConfig } from './validation.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';
