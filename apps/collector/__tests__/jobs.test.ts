import { describe, it, expect, vi } from 'vitest';
import { NotifyCategory, type FetchLike } from '@collector/shared';
import { createMockNotifyClient } from '@collector/shared/testing';
import type { RunResult } from '@collector/engine';
import {
  PRODUCTS_JOB,
  REGULATORY_JOB,
  announceRun,
  buildJobRegistry,
  createProductsJob,
  createRegulatoryJob,
  runSummary,
  selectBrands,
} from '../src/jobs.js';
import { BRANDS, productsPage, testConfig, testDependencies } from './helpers.js';

function runResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    runId: 'run-7',
    runKind: 'products',
    status: 'succeeded',
    outcomes: [],
    notAttempted: [],
    budgetExhausted: false,
    quotaExhausted: false,
    cancelled: false,
    totals: { attempted: 3, succeeded: 2, failed: 1, skipped: 0, recordsProcessed: 40 },
    ...overrides,
  };
}

describe('selectBrands', () => {
  it('returns every brand without a filter', () => {
    expect(selectBrands(BRANDS).map((brand) => brand.key)).toEqual(['fizzco', 'quiet-harbor']);
  });

  it('narrows to one brand', () => {
    expect(selectBrands(BRANDS, 'quiet-harbor')).toEqual([BRANDS[1]]);
  });

  it('rejects an unknown brand', () => {
    expect(() => selectBrands(BRANDS, 'nope')).toThrow("Unknown brand 'nope'");
  });
});

describe('runSummary', () => {
  it('lists totals and unattempted work', () => {
    expect(runSummary(runResult({ notAttempted: ['d'] }))).toBe(
      '2/3 entities succeeded, 1 failed, 0 skipped, 1 not attempted, 40 records',
    );
  });
});

describe('announceRun', () => {
  const startedAt = new Date('2026-03-01T10:00:00Z');
  const completedAt = new Date('2026-03-01T10:02:05Z');

  it('posts a completion notice', async () => {
    const notifier = createMockNotifyClient();

    await announceRun(runResult(), startedAt, completedAt, notifier.notify);

    expect(notifier.sent).toEqual([
      {
        category: NotifyCategory.RUN_COMPLETED,
        title: 'products run succeeded',
        message: '2/3 entities succeeded, 1 failed, 0 skipped, 0 not attempted, 40 records',
        context: { runId: 'run-7', runKind: 'products', duration: '2m 5s' },
      },
    ]);
  });

  it('adds a quota alert and the failure reason', async () => {
    const notifier = createMockNotifyClient();
    const result = runResult({
      runKind: 'regulatory_bills',
      status: 'partial',
      quotaExhausted: true,
      errorMessage: 'upstream quota exhausted',
      outcomes: [
        { runId: 'run-7', entityKey: 'CA:AB1:1', status: 'failed', recordsProcessed: 0, recordedAt: completedAt },
        { runId: 'run-7', entityKey: 'CA:AB2:2', status: 'succeeded', recordsProcessed: 1, recordedAt: completedAt },
      ],
    });

    await announceRun(result, startedAt, completedAt, notifier.notify);

    expect(notifier.sent.map((n) => n.category)).toEqual([
      NotifyCategory.RUN_PARTIAL_SUCCESS,
      NotifyCategory.QUOTA_EXHAUSTED,
    ]);
    expect(notifier.sent[0]?.message).toBe(
      '2/3 entities succeeded, 1 failed, 0 skipped, 0 not attempted, 40 records\nupstream quota exhausted',
    );
    expect(notifier.sent[1]?.message).toBe('1 entities could not be collected');
  });
});

describe('products job', () => {
  it('collects every brand and announces the run', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => productsPage([1, 2]));
    const { deps, runs, records, notifier } = testDependencies(fetchImpl);

    const result = await createProductsJob(deps).run({ triggerSource: 'cli' });

    expect(result.status).toBe('succeeded');
    expect(result.totals).toEqual({ attempted: 2, succeeded: 1, failed: 0, skipped: 1, recordsProcessed: 2 });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://shop.example/products.json?limit=250');
    expect([...records.records.keys()].sort()).toEqual(['storefront:fizzco:1', 'storefront:fizzco:2']);
    await expect(runs.getRun(result.runId)).resolves.toMatchObject({ status: 'succeeded', triggerSource: 'cli' });
    expect(notifier.sent.map((n) => n.category)).toEqual([NotifyCategory.RUN_COMPLETED]);
  });

  it('fails the run for an unknown brand', async () => {
    const fetchImpl = vi.fn<FetchLike>();
    const { deps, notifier } = testDependencies(fetchImpl);

    const result = await createProductsJob(deps, { brandKey: 'nope' }).run({ triggerSource: 'cli' });

    expect(result.status).toBe('failed');
    expect(result.errorMessage).toBe("precondition failed: Unknown brand 'nope'");
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(notifier.sent.map((n) => n.category)).toEqual([NotifyCategory.RUN_FAILED]);
  });
});

describe('regulatory job', () => {
  it('fails its precondition without an API key', async () => {
    const fetchImpl = vi.fn<FetchLike>();
    const { deps } = testDependencies(fetchImpl);

    const result = await createRegulatoryJob(deps, { states: ['CA'], keywords: [] }).run({
      triggerSource: 'scheduler',
    });

    expect(result).toMatchObject({
      runKind: 'regulatory_bills',
      status: 'failed',
      errorMessage: 'precondition failed: LEGISLATIVE_API_KEY is not set',
      outcomes: [],
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('buildJobRegistry', () => {
  const fetchImpl = vi.fn<FetchLike>();

  it('registers only the products job without scheduled states', () => {
    const { deps } = testDependencies(fetchImpl);
    expect(buildJobRegistry(deps).getNames()).toEqual([PRODUCTS_JOB]);
  });

  it('adds the regulatory job when states are configured', () => {
    const base = testConfig();
    const config = testConfig({ schedule: { ...base.schedule, regulatoryStates: ['CA', 'TX'] } });
    const { deps } = testDependencies(fetchImpl, config);
    expect(buildJobRegistry(deps).getNames()).toEqual([PRODUCTS_JOB, REGULATORY_JOB]);
  });
});
