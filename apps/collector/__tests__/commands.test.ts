import { describe, it, expect, vi } from 'vitest';
import type { CollectionRun, EntityOutcome, FetchLike } from '@collector/shared';
import { createTestOutcome, createTestRun } from '@collector/shared/testing';
import {
  USAGE,
  UsageError,
  formatOutcomeRow,
  formatRunRow,
  runCommand,
  type CommandContext,
  type RunReader,
} from '../src/commands.js';
import { productsPage, testDependencies } from './helpers.js';

function setup(fetchImpl: FetchLike = vi.fn<FetchLike>(), runs: CollectionRun[] = [], outcomes: EntityOutcome[] = []) {
  const { deps, runs: runStore } = testDependencies(fetchImpl);
  const lines: string[] = [];
  const controller = new AbortController();
  const reader: RunReader = {
    listRuns: vi.fn(async (limit: number) => runs.slice(0, limit)),
    getRun: vi.fn(async (runId: string) => runs.find((run) => run.runId === runId) ?? null),
    listEntityOutcomes: vi.fn(async () => outcomes),
  };
  const ctx: CommandContext = {
    ...deps,
    reader,
    print: (line) => lines.push(line),
    signal: controller.signal,
  };
  return { ctx, lines, reader, controller, runStore };
}

const partialRun = createTestRun({
  runId: 'run-1',
  status: 'partial',
  triggerSource: 'scheduler',
  startedAt: new Date('2026-01-01T00:00:05Z'),
  completedAt: new Date('2026-01-01T00:03:00Z'),
  errorMessage: undefined,
  totals: { attempted: 3, succeeded: 2, failed: 1, skipped: 0, recordsProcessed: 12 },
});

describe('runCommand', () => {
  it('prints usage for help', async () => {
    const { ctx, lines } = setup();
    await expect(runCommand(['help'], ctx)).resolves.toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it('rejects unknown commands', async () => {
    const { ctx } = setup();
    await expect(runCommand(['collect', 'everything'], ctx)).rejects.toThrow(
      new UsageError('Unknown command: collect everything'),
    );
  });

  describe('collect products', () => {
    it('lists targets on a dry run without creating a run', async () => {
      const fetchImpl = vi.fn<FetchLike>();
      const { ctx, lines, runStore } = setup(fetchImpl);

      await expect(runCommand(['collect', 'products', '--dry-run'], ctx)).resolves.toBe(0);

      expect(lines).toEqual([
        'Would collect 2 brand(s):',
        '  fizzco  https://shop.example',
        '  quiet-harbor  (no storefront)',
      ]);
      expect(fetchImpl).not.toHaveBeenCalled();
      expect(runStore.runs.size).toBe(0);
    });

    it('collects one brand and prints the summary', async () => {
      const fetchImpl = vi.fn<FetchLike>(async () => productsPage([1, 2]));
      const { ctx, lines, runStore } = setup(fetchImpl);

      await expect(runCommand(['collect', 'products', '--brand', 'fizzco'], ctx)).resolves.toBe(0);

      const [runId] = [...runStore.runs.keys()];
      expect(lines).toEqual([
        `Run ${runId} succeeded: 1/1 entities succeeded, 0 failed, 0 skipped, 0 not attempted, 2 records`,
      ]);
    });

    it('rejects unknown flags', async () => {
      const { ctx } = setup();
      await expect(runCommand(['collect', 'products', '--everything'], ctx)).rejects.toBeInstanceOf(UsageError);
    });

    it('rejects a flag missing its value and stray arguments', async () => {
      const { ctx } = setup();
      await expect(runCommand(['collect', 'products', '--brand'], ctx)).rejects.toBeInstanceOf(UsageError);
      await expect(runCommand(['collect', 'products', 'fizzco'], ctx)).rejects.toBeInstanceOf(UsageError);
    });

    it('reads the brand flag in --flag=value form', async () => {
      const { ctx, lines } = setup();

      await expect(runCommand(['collect', 'products', '--brand=fizzco', '--dry-run'], ctx)).resolves.toBe(0);

      expect(lines).toEqual(['Would collect 1 brand(s):', '  fizzco  https://shop.example']);
    });
  });

  describe('regs ingest', () => {
    it('needs at least one state', async () => {
      const { ctx } = setup();
      await expect(runCommand(['regs', 'ingest'], ctx)).rejects.toThrow('regs ingest needs at least one --state');
    });

    it('validates state codes', async () => {
      const { ctx } = setup();
      await expect(runCommand(['regs', 'ingest', '--state', 'California'], ctx)).rejects.toThrow(
        "Invalid state code 'CALIFORNIA', expected two letters",
      );
    });

    it('validates the request budget', async () => {
      const { ctx } = setup();
      await expect(
        runCommand(['regs', 'ingest', '--state', 'CA', '--max-requests', '0'], ctx),
      ).rejects.toThrow("--max-requests must be a positive integer, got '0'");
    });

    it('describes the plan on a dry run', async () => {
      const { ctx, lines } = setup();

      await runCommand(
        ['regs', 'ingest', '--state', 'ca', '--state', 'TX', '--keyword', 'hemp', '--max-requests', '10', '--dry-run'],
        ctx,
      );

      expect(lines).toEqual([
        'Would ingest bills for CA, TX',
        '  keywords: hemp',
        '  sessions: current',
        '  request budget: 10',
      ]);
    });

    it('exits non-zero when the run fails its precondition', async () => {
      const { ctx, lines, runStore } = setup();

      await expect(runCommand(['regs', 'ingest', '--state', 'CA'], ctx)).resolves.toBe(1);

      const [runId] = [...runStore.runs.keys()];
      expect(lines).toEqual([
        `Run ${runId} failed: 0/0 entities succeeded, 0 failed, 0 skipped, 0 not attempted, 0 records`,
        '  reason: precondition failed: LEGISLATIVE_API_KEY is not set',
      ]);
    });
  });

  describe('runs', () => {
    it('lists recent runs with the requested limit', async () => {
      const { ctx, lines, reader } = setup(undefined, [partialRun]);

      await runCommand(['runs', 'list', '--limit', '5'], ctx);

      expect(reader.listRuns).toHaveBeenCalledWith(5);
      expect(lines).toEqual([formatRunRow(partialRun)]);
    });

    it('says so when nothing was recorded', async () => {
      const { ctx, lines } = setup();
      await runCommand(['runs', 'list'], ctx);
      expect(lines).toEqual(['No runs recorded']);
    });

    it('shows a run with its outcomes', async () => {
      const outcome = createTestOutcome({
        runId: 'run-1',
        entityKey: 'fizzco',
        status: 'failed',
        message: { kind: 'error', text: 'timeout' },
      });
      const { ctx, lines } = setup(undefined, [partialRun], [outcome]);

      await expect(runCommand(['runs', 'show', 'run-1'], ctx)).resolves.toBe(0);

      expect(lines).toEqual([
        formatRunRow(partialRun),
        '  started:   2026-01-01T00:00:05.000Z',
        '  completed: 2026-01-01T00:03:00.000Z',
        '  trigger:   scheduler',
        'Entities (1):',
        formatOutcomeRow(outcome),
      ]);
    });

    it('reports a missing run', async () => {
      const { ctx, lines } = setup();
      await expect(runCommand(['runs', 'show', 'nope'], ctx)).resolves.toBe(1);
      expect(lines).toEqual(['Run not found: nope']);
    });
  });

  it('runs the scheduler until the shutdown signal fires', async () => {
    const { ctx, lines, controller } = setup();

    const pending = runCommand(['schedule'], ctx);
    controller.abort();

    await expect(pending).resolves.toBe(0);
    expect(lines).toEqual(['Scheduler running: products']);
  });
});

describe('formatting', () => {
  it('lays out a run row', () => {
    expect(formatRunRow(partialRun)).toBe(
      'run-1  products          partial    2026-01-01T00:00:00.000Z  2/3 ok  12 records',
    );
  });

  it('lays out an outcome row with its tagged message', () => {
    const outcome = createTestOutcome({
      entityKey: 'CA:AB1:1',
      status: 'failed',
      message: { kind: 'error', text: 'timeout' },
    });
    expect(formatOutcomeRow(outcome)).toBe(`  CA:AB1:1${' '.repeat(18)}failed${' '.repeat(5)}0  [error] timeout`);
  });
});
