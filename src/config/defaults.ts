/**
 * Default configuration values
 * @module volcengine-video-jobs/config/defaults
 */

import type { ArkServiceConfig, PollingConfig, VisualServiceConfig } from './types.js';

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT = 300000;

export const DEFAULT_OUTPUT_DIR = './output';

export const DEFAULT_VISUAL_CONFIG: VisualServiceConfig = {
  endpoint: 'https://visual.volcengineapi.com',
  region: 'cn-north-1',
  service: 'cv',
  version: '2022-08-31',
  submitAction: 'CVSubmitTask',
  resultAction: 'CVGetResult',
};

export const DEFAULT_ARK_CONFIG: ArkServiceConfig = {
  endpoint: 'https://ark.cn-beijing.volces.com/api/v3',
};

/**
 * 60 checks, 5 seconds apart: five minutes per task.
 */
export const DEFAULT_POLLING_CONFIG: PollingConfig = {
  maxAttempts: 60,
  intervalMs: 5000,
};

export const MAX_POLL_ATTEMPTS = 10000;
