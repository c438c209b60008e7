/**
 * Image/audio-to-video generation jobs on Volcengine services
 *
 * - Keyed-hash (HMAC-SHA256) request signing for the visual service
 * - Bearer-token submission for the ark service
 * - One poll loop for every task family
 * - Streaming downloads of finished videos
 *
 * @module volcengine-video-jobs
 */

export * from './client/index.js';
export * from './config/index.js';
export * from './auth/index.js';
export * from './errors/index.js';
export * from './signing/index.js';
export * from './transport/index.js';
export * from './observability/index.js';
export * from './tasks/index.js';
export * from './download/index.js';
export * from './media/index.js';
export * from './services/index.js';
