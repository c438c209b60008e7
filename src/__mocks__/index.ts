export * from './http-transport.mock.js';
export * from './logger.mock.js';
