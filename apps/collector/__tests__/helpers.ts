import { InMemoryChangeHashStore, InMemoryRecordSink, InMemoryRunStore, createMockLogger, createMockNotifyClient, createRecordingSleep } from '@collector/shared/testing';
import type { FetchLike } from '@collector/shared';
import type { BrandTarget } from '@collector/storefront';
import type { CollectorConfig } from '../src/config.js';
import type { JobDependencies } from '../src/jobs.js';

export function testConfig(overrides: Partial<CollectorConfig> = {}): CollectorConfig {
  return {
    requestTimeoutMs: 1000,
    userAgent: 'collector-test/1.0',
    maxConcurrentEntities: 1,
    interPageDelayMs: 0,
    maxRetries: 0,
    retryBaseDelayMs: 1,
    retryMaxDelayMs: 10,
    maxRunIdleMs: 0,
    brandsPath: '/tmp/brands.json',
    alternateProfileBrands: [],
    legislative: { apiKey: null, baseUrl: 'https://legislative.test', maxRequests: 50 },
    schedule: {
      productsIntervalMs: 60_000,
      regulatoryIntervalMs: 120_000,
      regulatoryStates: [],
      regulatoryKeywords: [],
    },
    ...overrides,
  };
}

export const BRANDS: BrandTarget[] = [
  { key: 'fizzco', name: 'Fizz Co', shopUrl: 'https://shop.example', alternateProfile: false },
  { key: 'quiet-harbor', name: 'Quiet Harbor', shopUrl: null, alternateProfile: false },
];

export function testDependencies(fetchImpl: FetchLike, config: CollectorConfig = testConfig()) {
  const runs = new InMemoryRunStore();
  const hashes = new InMemoryChangeHashStore();
  const records = new InMemoryRecordSink();
  const logger = createMockLogger();
  const notifier = createMockNotifyClient();
  const { sleep } = createRecordingSleep();

  const deps: JobDependencies = {
    config,
    runs,
    hashes,
    records,
    logger,
    loadBrands: async () => BRANDS,
    fetchImpl,
    notify: notifier.notify,
    sleep,
  };
  return { deps, runs, records, logger, notifier };
}

export function productsPage(ids: number[]): Response {
  const products = ids.map((id) => ({
    id,
    title: `Product ${id}`,
    handle: `product-${id}`,
    vendor: 'Fizz Co',
    tags: [],
    variants: [],
    images: [],
  }));
  return new Response(JSON.stringify({ products }), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}
