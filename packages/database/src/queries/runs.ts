import {
  InvalidTransitionError,
  isRunStatus,
  type CollectionRun,
  type RunStatus,
  type RunTotals,
  type TriggerSource,
} from '@collector/shared';
import { query } from '../client.js';

export interface CollectionRunRow {
  run_id: string;
  run_kind: string;
  trigger_source: string;
  status: string;
  started_at: Date | null;
  completed_at: Date | null;
  entities_attempted: number;
  entities_succeeded: number;
  entities_failed: number;
  entities_skipped: number;
  records_processed: number;
  error_message: string | null;
  created_at: Date;
}

function parseStatus(value: string): RunStatus {
  if (!isRunStatus(value)) {
    throw new Error(`Unknown run status in collection_runs: '${value}'`);
  }
  return value;
}

function parseTriggerSource(value: string): TriggerSource {
  return value === 'scheduler' ? 'scheduler' : 'cli';
}

export function mapRowToCollectionRun(row: CollectionRunRow): CollectionRun {
  return {
    runId: row.run_id,
    runKind: row.run_kind,
    triggerSource: parseTriggerSource(row.trigger_source),
    status: parseStatus(row.status),
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
    totals: {
      attempted: row.entities_attempted,
      succeeded: row.entities_succeeded,
      failed: row.entities_failed,
      skipped: row.entities_skipped,
      recordsProcessed: row.records_processed,
    },
    errorMessage: row.error_message ?? undefined,
    createdAt: row.created_at,
  };
}

function singleRow(rows: CollectionRunRow[], statement: string): CollectionRun {
  const row = rows[0];
  if (!row) {
    throw new Error(`${statement} returned no row`);
  }
  return mapRowToCollectionRun(row);
}

/**
 * Builds the error for an UPDATE that matched nothing, reading the status
 * the run actually has so the caller can tell a missing run from a race.
 */
async function transitionError(runId: string, expected: RunStatus): Promise<InvalidTransitionError> {
  const current = await query<{ status: string }>(
    `SELECT status FROM collection_runs WHERE run_id = $1`,
    [runId],
  );
  return new InvalidTransitionError(runId, [expected], current.rows[0]?.status ?? null);
}

export async function createRun(runKind: string, triggerSource: TriggerSource): Promise<CollectionRun> {
  const result = await query<CollectionRunRow>(
    `INSERT INTO collection_runs (run_kind, trigger_source, status)
     VALUES ($1, $2, 'queued')
     RETURNING *`,
    [runKind, triggerSource],
  );
  return singleRow(result.rows, 'createRun');
}

export async function startRun(runId: string): Promise<CollectionRun> {
  const result = await query<CollectionRunRow>(
    `UPDATE collection_runs
     SET status = 'running', started_at = NOW()
     WHERE run_id = $1 AND status = 'queued'
     RETURNING *`,
    [runId],
  );
  if (result.rows.length === 0) throw await transitionError(runId, 'queued');
  return singleRow(result.rows, 'startRun');
}

export async function completeRun(
  runId: string,
  status: 'succeeded' | 'partial',
  totals: RunTotals,
): Promise<CollectionRun> {
  const result = await query<CollectionRunRow>(
    `UPDATE collection_runs
     SET status = $2,
         completed_at = NOW(),
         entities_attempted = $3,
         entities_succeeded = $4,
         entities_failed = $5,
         entities_skipped = $6,
         records_processed = $7
     WHERE run_id = $1 AND status = 'running'
     RETURNING *`,
    [runId, status, totals.attempted, totals.succeeded, totals.failed, totals.skipped, totals.recordsProcessed],
  );
  if (result.rows.length === 0) throw await transitionError(runId, 'running');
  return singleRow(result.rows, 'completeRun');
}

export async function failRun(runId: string, errorMessage: string, totals: RunTotals): Promise<CollectionRun> {
  const result = await query<CollectionRunRow>(
    `UPDATE collection_runs
     SET status = 'failed',
         completed_at = NOW(),
         error_message = $2,
         entities_attempted = $3,
         entities_succeeded = $4,
         entities_failed = $5,
         entities_skipped = $6,
         records_processed = $7
     WHERE run_id = $1 AND status = 'running'
     RETURNING *`,
    [runId, errorMessage, totals.attempted, totals.succeeded, totals.failed, totals.skipped, totals.recordsProcessed],
  );
  if (result.rows.length === 0) throw await transitionError(runId, 'running');
  return singleRow(result.rows, 'failRun');
}

export async function getRun(runId: string): Promise<CollectionRun | null> {
  const result = await query<CollectionRunRow>(`SELECT * FROM collection_runs WHERE run_id = $1`, [runId]);
  const row = result.rows[0];
  return row ? mapRowToCollectionRun(row) : null;
}

export async function listRuns(limit = 20, runKind?: string): Promise<CollectionRun[]> {
  const result = runKind
    ? await query<CollectionRunRow>(
        `SELECT * FROM collection_runs WHERE run_kind = $1 ORDER BY created_at DESC LIMIT $2`,
        [runKind, limit],
      )
    : await query<CollectionRunRow>(`SELECT * FROM collection_runs ORDER BY created_at DESC LIMIT $1`, [limit]);
  return result.rows.map(mapRowToCollectionRun);
}
