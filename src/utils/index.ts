export * from './logger.js';
export * from './errors.js';
export * from './async-helpers.js';
export * from './frequency.js';
export * from './mac.js';
export * from './metrics.js';
