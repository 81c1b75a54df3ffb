export * from './budget.js';
export * from './cursor.js';
export * from './paginate.js';
export * from './change-hash.js';
export * from './watchdog.js';
export * from './coordinator.js';
export * from './registry.js';
