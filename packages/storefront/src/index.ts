export { StorefrontClient, BROWSER_USER_AGENT, type StorefrontClientConfig } from './client.js';
export {
  createProductCollector,
  productRecordId,
  ALTERNATE_PROFILE_NOTE,
  NO_STOREFRONT_NOTE,
  type ProductCollectorOptions,
} from './collector.js';
export { extractNextCursor } from './link-header.js';
export { storeOrigin, storeDomain } from './origin.js';
export * from './types.js';
