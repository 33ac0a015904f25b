export * from './date.js';
export * from './env.js';
export * from './errors.js';
export * from './logger.js';
export * from './backoff.js';
