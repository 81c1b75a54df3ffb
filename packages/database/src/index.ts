export { getPool, query, closePool } from './client.js';
export * from './queries/runs.js';
export * from './queries/entity-outcomes.js';
export * from './queries/change-hashes.js';
export * from './queries/raw-records.js';
export * from './queries/error-logs.js';
export * from './stores.js';
