import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  MalformedResponseError,
  errorForStatus,
  fetchWithTimeout,
  readJson,
  type FetchLike,
} from '@collector/shared';
import { PageCursor, type Page } from '@collector/engine';
import { extractNextCursor } from './link-header.js';
import { storeDomain, storeOrigin } from './origin.js';
import { productsPageSchema, type RequestProfile, type StorefrontProduct } from './types.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface StorefrontClientConfig {
  /** Sent by the default profile */
  userAgent?: string;
  requestTimeoutMs?: number;
  fetchImpl?: FetchLike;
}

/**
 * Client for a storefront's public `products.json` catalog endpoint.
 *
 * Fetches exactly one page per call and never retries; retries, the page
 * ceiling and the alternate profile belong to the paginated fetcher.
 */
export class StorefrontClient {
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl?: FetchLike;

  constructor(config: StorefrontClientConfig = {}) {
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl;
  }

  static productsUrl(shopUrl: string, limit: number, cursor: PageCursor | null): string {
    const url = new URL('/products.json', storeOrigin(shopUrl));
    url.searchParams.set('limit', String(limit));
    if (cursor) {
      url.searchParams.set('page_info', cursor.toQueryValue());
    }
    return url.toString();
  }

  async fetchProductsPage(
    shopUrl: string,
    limit: number,
    cursor: PageCursor | null,
    profile: RequestProfile = 'default',
    signal?: AbortSignal,
  ): Promise<Page<StorefrontProduct>> {
    const url = StorefrontClient.productsUrl(shopUrl, limit, cursor);
    const domain = storeDomain(shopUrl);

    const { body, next } = await fetchWithTimeout(
      url,
      {
        method: 'GET',
        headers: {
          Accept: 'application/json,text/html;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
          Referer: storeOrigin(shopUrl),
          'Cache-Control': 'no-cache',
          'User-Agent': profile === 'browser' ? BROWSER_USER_AGENT : this.userAgent,
        },
      },
      { timeoutMs: this.requestTimeoutMs, signal, fetchImpl: this.fetchImpl },
      async (response) => {
        const failure = errorForStatus(response, domain);
        if (failure) throw failure;
        // Read before the body is consumed
        const cursor = PageCursor.from(extractNextCursor(response.headers.get('link')));
        return { body: await readJson(response, `${domain} products page`), next: cursor };
      },
    );

    const parsed = productsPageSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const detail = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch';
      throw new MalformedResponseError(`${domain} products page: unexpected payload (${detail})`, parsed.error);
    }

    return { items: parsed.data.products, next };
  }
}
