/** Products per storefront page; the catalog endpoint caps `limit` at 250 */
export const STOREFRONT_PAGE_SIZE = 250;
/** Guard against a cursor stream that never terminates */
export const MAX_PAGES_PER_FETCH = 200;
export const DEFAULT_INTER_PAGE_DELAY_MS = 250;

export const DEFAULT_MAX_CONCURRENT_ENTITIES = 1;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 5000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 60000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/** Logical calls one legislative session may spend before stopping on its own */
export const DEFAULT_LEGISLATIVE_MAX_REQUESTS = 5000;

/** A run with no recorded progress for this long is force-failed */
export const DEFAULT_MAX_RUN_IDLE_MS = 15 * 60 * 1000;

export const RUN_KIND_PRODUCTS = 'products';
export const RUN_KIND_REGULATORY_BILLS = 'regulatory_bills';

export const SOURCE_STOREFRONT = 'storefront';
export const SOURCE_LEGISLATIVE = 'legislative';

export const DEFAULT_USER_AGENT = 'collection-engine/0.1 (+catalog sync)';
