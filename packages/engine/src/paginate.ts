import {
  DEFAULT_INTER_PAGE_DELAY_MS,
  MAX_PAGES_PER_FETCH,
  PaginationLimitExceededError,
  RunCancelledError,
  errorMessage,
  nullLogger,
  sleep as defaultSleep,
  withRetry,
  type Logger,
  type RetryOptions,
} from '@collector/shared';
import type { BudgetGuard } from './budget.js';
import type { PageCursor } from './cursor.js';

export interface Page<T> {
  items: T[];
  /** Null on the final page */
  next: PageCursor | null;
}

export type PageSource<T> = (cursor: PageCursor | null, pageSize: number, signal?: AbortSignal) => Promise<Page<T>>;

/**
 * Second request identity for sources known to reject the default one.
 * Gets exactly one attempt per page, only for failures `appliesTo` accepts.
 */
export interface AlternateProfile<T> {
  fetchPage: PageSource<T>;
  appliesTo: (error: unknown) => boolean;
}

export interface FetchAllOptions<T> {
  pageSize: number;
  interPageDelayMs?: number;
  maxPages?: number;
  retry?: Partial<RetryOptions>;
  /** When set, one unit is reserved per page request (not per retry) */
  budget?: BudgetGuard;
  alternate?: AlternateProfile<T>;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onPage?: (pageNumber: number, itemCount: number) => void;
  logger?: Logger;
}

export interface FetchAllResult<T> {
  items: T[];
  pages: number;
  usedAlternate: boolean;
}

/**
 * Fetches every page of a source, strictly one after another.
 *
 * All-or-nothing: if any page fails after its retries (and the alternate
 * profile, when configured), the error is thrown and the pages gathered so
 * far are dropped. A token stream still going after `maxPages` pages fails
 * with PaginationLimitExceededError.
 */
export async function fetchAll<T>(fetchPage: PageSource<T>, options: FetchAllOptions<T>): Promise<FetchAllResult<T>> {
  const maxPages = options.maxPages ?? MAX_PAGES_PER_FETCH;
  const interPageDelayMs = options.interPageDelayMs ?? DEFAULT_INTER_PAGE_DELAY_MS;
  const wait = options.sleep ?? defaultSleep;
  const logger = options.logger ?? nullLogger;

  const collected: T[] = [];
  let cursor: PageCursor | null = null;
  let pages = 0;
  let usedAlternate = false;

  for (;;) {
    if (options.signal?.aborted) {
      throw new RunCancelledError(`pagination stopped after ${pages} pages`);
    }

    options.budget?.reserve();

    const pageNumber = pages + 1;
    const currentCursor = cursor;
    let page: Page<T>;
    try {
      page = await withRetry(() => fetchPage(currentCursor, options.pageSize, options.signal), {
        sleep: wait,
        signal: options.signal,
        onRetry: (error, attempt, delayMs) => {
          logger.warn('Retrying page fetch', { page: pageNumber, attempt, delayMs, error: error.message });
        },
        ...options.retry,
      });
    } catch (error) {
      if (!options.alternate || !options.alternate.appliesTo(error)) throw error;
      logger.warn('Default profile rejected, trying alternate profile', {
        page: pageNumber,
        error: errorMessage(error),
      });
      page = await options.alternate.fetchPage(currentCursor, options.pageSize, options.signal);
      usedAlternate = true;
    }

    pages = pageNumber;
    collected.push(...page.items);
    options.onPage?.(pageNumber, page.items.length);

    if (!page.next) break;
    if (pages >= maxPages) {
      throw new PaginationLimitExceededError(maxPages);
    }

    cursor = page.next;
    await wait(interPageDelayMs, options.signal);
  }

  return { items: collected, pages, usedAlternate };
}
