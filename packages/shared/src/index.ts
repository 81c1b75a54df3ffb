export * from './constants.js';
export * from './types/run.js';
export type * from './types/store.js';
export * from './utils/concurrency.js';
export * from './utils/env.js';
export * from './utils/errors.js';
export * from './utils/hash.js';
export * from './utils/http.js';
export * from './utils/logger.js';
export * from './utils/retry.js';
export * from './utils/slack.js';
