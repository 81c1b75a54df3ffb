/**
 * Run lifecycle queries against an in-memory stand-in for the pg pool.
 * The stand-in applies the same conditional-update semantics as the SQL.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidTransitionError, type RunTotals } from '@collector/shared';
import type { CollectionRunRow } from '../src/queries/runs.js';
import type { EntityOutcomeRow } from '../src/queries/entity-outcomes.js';

const runs = new Map<string, CollectionRunRow>();
const outcomes = new Map<string, EntityOutcomeRow>();
let nextRunNumber = 0;

function applyTotals(row: CollectionRunRow, params: unknown[], offset: number): void {
  row.entities_attempted = Number(params[offset]);
  row.entities_succeeded = Number(params[offset + 1]);
  row.entities_failed = Number(params[offset + 2]);
  row.entities_skipped = Number(params[offset + 3]);
  row.records_processed = Number(params[offset + 4]);
}

const mockQueryFn = vi.fn(async (sql: string, params: unknown[] = []) => {
  if (sql.includes('INSERT INTO collection_runs')) {
    const row: CollectionRunRow = {
      run_id: `run-${++nextRunNumber}`,
      run_kind: String(params[0]),
      trigger_source: String(params[1]),
      status: 'queued',
      started_at: null,
      completed_at: null,
      entities_attempted: 0,
      entities_succeeded: 0,
      entities_failed: 0,
      entities_skipped: 0,
      records_processed: 0,
      error_message: null,
      created_at: new Date('2026-02-01T00:00:00Z'),
    };
    runs.set(row.run_id, row);
    return { rows: [{ ...row }], rowCount: 1 };
  }

  if (sql.includes('UPDATE collection_runs')) {
    const row = runs.get(String(params[0]));
    const expected = sql.includes("status = 'queued'") ? 'queued' : 'running';
    if (!row || row.status !== expected) return { rows: [], rowCount: 0 };

    if (sql.includes("SET status = 'running'")) {
      row.status = 'running';
      row.started_at = new Date('2026-02-01T00:01:00Z');
    } else if (sql.includes("SET status = 'failed'")) {
      row.status = 'failed';
      row.error_message = String(params[1]);
      row.completed_at = new Date('2026-02-01T00:02:00Z');
      applyTotals(row, params, 2);
    } else {
      row.status = String(params[1]);
      row.completed_at = new Date('2026-02-01T00:02:00Z');
      applyTotals(row, params, 2);
    }
    return { rows: [{ ...row }], rowCount: 1 };
  }

  if (sql.includes('SELECT status FROM collection_runs')) {
    const row = runs.get(String(params[0]));
    return { rows: row ? [{ status: row.status }] : [], rowCount: row ? 1 : 0 };
  }

  if (sql.includes('SELECT * FROM collection_runs WHERE run_id')) {
    const row = runs.get(String(params[0]));
    return { rows: row ? [{ ...row }] : [], rowCount: row ? 1 : 0 };
  }

  if (sql.includes('INSERT INTO collection_run_entities')) {
    const row: EntityOutcomeRow = {
      run_id: String(params[0]),
      entity_key: String(params[1]),
      status: String(params[2]),
      records_processed: Number(params[3]),
      message: params[4] === null ? null : String(params[4]),
      message_kind: params[5] === null ? null : String(params[5]),
      recorded_at: new Date('2026-02-01T00:01:30Z'),
    };
    outcomes.set(`${row.run_id}:${row.entity_key}`, row);
    return { rows: [], rowCount: 1 };
  }

  if (sql.includes('SELECT * FROM collection_run_entities')) {
    const rows = [...outcomes.values()]
      .filter((row) => row.run_id === params[0])
      .sort((a, b) => a.entity_key.localeCompare(b.entity_key));
    return { rows, rowCount: rows.length };
  }

  throw new Error(`Unhandled SQL: ${sql}`);
});

vi.mock('pg', () => ({
  default: {
    Pool: class MockPool {
      query = mockQueryFn;
    },
  },
}));

import { completeRun, createRun, failRun, getRun, startRun } from '../src/queries/runs.js';
import { listEntityOutcomes, upsertEntityOutcome } from '../src/queries/entity-outcomes.js';

const totals: RunTotals = { attempted: 3, succeeded: 2, failed: 1, skipped: 0, recordsProcessed: 40 };

describe('collection run transitions', () => {
  beforeEach(() => {
    runs.clear();
    outcomes.clear();
    nextRunNumber = 0;
    mockQueryFn.mockClear();
  });

  it('creates runs in queued with zero totals', async () => {
    const run = await createRun('products', 'cli');

    expect(run).toMatchObject({ runId: 'run-1', runKind: 'products', triggerSource: 'cli', status: 'queued' });
    expect(run.completedAt).toBeUndefined();
    expect(run.totals).toEqual({ attempted: 0, succeeded: 0, failed: 0, skipped: 0, recordsProcessed: 0 });
  });

  it('walks queued -> running -> partial and sets completion fields', async () => {
    const { runId } = await createRun('products', 'scheduler');
    const started = await startRun(runId);
    expect(started.status).toBe('running');
    expect(started.startedAt).toEqual(new Date('2026-02-01T00:01:00Z'));

    const completed = await completeRun(runId, 'partial', totals);
    expect(completed.status).toBe('partial');
    expect(completed.completedAt).toEqual(new Date('2026-02-01T00:02:00Z'));
    expect(completed.totals).toEqual(totals);
  });

  it('refuses to start a run twice and leaves it running', async () => {
    const { runId } = await createRun('products', 'cli');
    await startRun(runId);

    const error = await startRun(runId).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidTransitionError);
    expect(error).toMatchObject({ runId, expected: ['queued'], actual: 'running' });
    expect((await getRun(runId))?.status).toBe('running');
  });

  it('refuses to complete or fail a run that is not running', async () => {
    const { runId } = await createRun('products', 'cli');

    await expect(completeRun(runId, 'succeeded', totals)).rejects.toMatchObject({
      code: 'INVALID_TRANSITION',
      actual: 'queued',
    });
    await expect(failRun(runId, 'boom', totals)).rejects.toBeInstanceOf(InvalidTransitionError);

    const stored = await getRun(runId);
    expect(stored?.status).toBe('queued');
    expect(stored?.errorMessage).toBeUndefined();
  });

  it('refuses to reopen a finished run', async () => {
    const { runId } = await createRun('regulatory_bills', 'cli');
    await startRun(runId);
    await failRun(runId, 'all 2 entities failed collection', totals);

    await expect(completeRun(runId, 'succeeded', totals)).rejects.toMatchObject({ actual: 'failed' });
    const stored = await getRun(runId);
    expect(stored).toMatchObject({ status: 'failed', errorMessage: 'all 2 entities failed collection' });
  });

  it('reports a missing run as actual null', async () => {
    await expect(startRun('run-404')).rejects.toMatchObject({ actual: null });
  });
});

describe('entity outcomes', () => {
  beforeEach(() => {
    outcomes.clear();
  });

  it('keeps one row per run and entity, replacing earlier writes', async () => {
    const recordedAt = new Date('2026-02-01T00:01:00Z');
    await upsertEntityOutcome({
      runId: 'run-1',
      entityKey: 'brand-a',
      status: 'failed',
      recordsProcessed: 0,
      message: { kind: 'error', text: 'HTTP 503' },
      recordedAt,
    });
    await upsertEntityOutcome({ runId: 'run-1', entityKey: 'brand-a', status: 'succeeded', recordsProcessed: 12, recordedAt });

    const rows = await listEntityOutcomes('run-1');
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ entityKey: 'brand-a', status: 'succeeded', recordsProcessed: 12 });
    expect(rows[0]?.message).toBeUndefined();
  });

  it('round-trips the message kind column', async () => {
    const recordedAt = new Date('2026-02-01T00:01:00Z');
    await upsertEntityOutcome({
      runId: 'run-2',
      entityKey: 'brand-b',
      status: 'partial',
      recordsProcessed: 5,
      message: { kind: 'note', text: 'served by alternate profile' },
      recordedAt,
    });

    const [row] = await listEntityOutcomes('run-2');
    expect(row?.message).toEqual({ kind: 'note', text: 'served by alternate profile' });
  });
});
