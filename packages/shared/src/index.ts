export * from './types/index.js';
export * from './constants.js';
export * from './errors.js';
export * from './utils/env.js';
export * from './utils/hash.js';
export * from './utils/logger.js';
export * from './utils/markers.js';
export * from './utils/retry.js';
export * from './utils/slack.js';
