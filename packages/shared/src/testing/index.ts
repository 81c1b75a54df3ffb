/**
 * Test doubles and fixture factories shared by every package's tests.
 */

export * from './factories.js';
export * from './mocks.js';
export * from './stores.js';
