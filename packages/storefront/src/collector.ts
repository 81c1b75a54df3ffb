import {
  DEFAULT_INTER_PAGE_DELAY_MS,
  MAX_PAGES_PER_FETCH,
  SOURCE_STOREFRONT,
  STOREFRONT_PAGE_SIZE,
  UpstreamClientError,
  type RecordSink,
  type RetryOptions,
} from '@collector/shared';
import { fetchAll, type EntityCollector, type PageSource } from '@collector/engine';
import type { StorefrontClient } from './client.js';
import type { BrandTarget, StorefrontProduct } from './types.js';

export const ALTERNATE_PROFILE_NOTE =
  'primary products.json fetch returned 403; browser-profile fallback succeeded';
export const NO_STOREFRONT_NOTE = 'no storefront configured';

export interface ProductCollectorOptions {
  client: StorefrontClient;
  records: RecordSink;
  pageSize?: number;
  interPageDelayMs?: number;
  maxPages?: number;
  retry?: Partial<RetryOptions>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function isForbidden(error: unknown): boolean {
  return error instanceof UpstreamClientError && error.status === 403;
}

/** Stable record id; product ids are only unique within one store. */
export function productRecordId(brandKey: string, productId: number): string {
  return `${brandKey}:${productId}`;
}

/**
 * Per-brand entity logic for a products run: fetch the whole catalog, then
 * persist every product payload. A brand flagged for the alternate profile
 * that only succeeds through it finishes as partial with a note.
 */
export function createProductCollector(options: ProductCollectorOptions): EntityCollector<BrandTarget> {
  const { client, records } = options;

  return async (brand, ctx) => {
    const { shopUrl } = brand;
    if (!shopUrl) {
      ctx.logger.info('Brand has no storefront, skipping');
      return { status: 'skipped', recordsProcessed: 0, note: NO_STOREFRONT_NOTE };
    }

    const pageSource =
      (profile: 'default' | 'browser'): PageSource<StorefrontProduct> =>
      (cursor, pageSize, signal) =>
        client.fetchProductsPage(shopUrl, pageSize, cursor, profile, signal);

    const fetched = await fetchAll(pageSource('default'), {
      pageSize: options.pageSize ?? STOREFRONT_PAGE_SIZE,
      interPageDelayMs: options.interPageDelayMs ?? DEFAULT_INTER_PAGE_DELAY_MS,
      maxPages: options.maxPages ?? MAX_PAGES_PER_FETCH,
      retry: options.retry,
      sleep: options.sleep,
      signal: ctx.signal,
      logger: ctx.logger,
      alternate: brand.alternateProfile ? { fetchPage: pageSource('browser'), appliesTo: isForbidden } : undefined,
      onPage: (page, count) => {
        ctx.progress();
        ctx.logger.debug('Fetched products page', { page, count });
      },
    });

    let changed = 0;
    for (const product of fetched.items) {
      const written = await records.upsertRecord({
        source: SOURCE_STOREFRONT,
        externalId: productRecordId(brand.key, product.id),
        runId: ctx.runId,
        entityKey: ctx.entityKey,
        payload: product,
      });
      if (written) changed++;
    }
    ctx.progress();

    ctx.logger.info('Products persisted', {
      products: fetched.items.length,
      changed,
      pages: fetched.pages,
      usedAlternate: fetched.usedAlternate,
    });

    if (fetched.usedAlternate) {
      return { status: 'partial', recordsProcessed: fetched.items.length, note: ALTERNATE_PROFILE_NOTE };
    }
    return { status: 'succeeded', recordsProcessed: fetched.items.length };
  };
}
