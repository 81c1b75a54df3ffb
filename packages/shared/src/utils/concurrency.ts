export interface ConcurrencyOptions {
  /** Checked before each item is taken; returning false stops dispatch of further items */
  shouldContinue?: () => boolean;
}

/**
 * Processes items with a fixed number of workers pulling from a shared index.
 * Items are dispatched in order; completion order is unspecified.
 * Slots for items that were never dispatched stay `undefined`.
 */
export async function processWithConcurrency<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number,
  options: ConcurrencyOptions = {},
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  let index = 0;

  async function worker(): Promise<void> {
    while (index < items.length) {
      if (options.shouldContinue && !options.shouldContinue()) return;
      const currentIndex = index++;
      const item = items[currentIndex];
      if (item !== undefined) {
        results[currentIndex] = await processor(item, currentIndex);
      }
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  const workers = Array.from({ length: workerCount }, () => worker());
  await Promise.all(workers);

  return results;
}
