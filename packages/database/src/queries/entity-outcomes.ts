import {
  isOutcomeStatus,
  type EntityOutcome,
  type OutcomeMessage,
  type OutcomeStatus,
} from '@collector/shared';
import { query } from '../client.js';

export interface EntityOutcomeRow {
  run_id: string;
  entity_key: string;
  status: string;
  records_processed: number;
  message: string | null;
  message_kind: string | null;
  recorded_at: Date;
}

function parseOutcomeStatus(value: string): OutcomeStatus {
  if (!isOutcomeStatus(value)) {
    throw new Error(`Unknown outcome status in collection_run_entities: '${value}'`);
  }
  return value;
}

function parseMessage(text: string | null, kind: string | null): OutcomeMessage | undefined {
  if (text === null) return undefined;
  return kind === 'note' ? { kind: 'note', text } : { kind: 'error', text };
}

export function mapRowToEntityOutcome(row: EntityOutcomeRow): EntityOutcome {
  return {
    runId: row.run_id,
    entityKey: row.entity_key,
    status: parseOutcomeStatus(row.status),
    recordsProcessed: row.records_processed,
    message: parseMessage(row.message, row.message_kind),
    recordedAt: row.recorded_at,
  };
}

/**
 * One row per (run, entity). Re-recording an entity in the same run
 * replaces its earlier outcome.
 */
export async function upsertEntityOutcome(outcome: EntityOutcome): Promise<void> {
  await query(
    `INSERT INTO collection_run_entities (
       run_id, entity_key, status, records_processed, message, message_kind, recorded_at
     ) VALUES ($1, $2, $3, $4, $5, $6, $7)
     ON CONFLICT (run_id, entity_key) DO UPDATE SET
       status = EXCLUDED.status,
       records_processed = EXCLUDED.records_processed,
       message = EXCLUDED.message,
       message_kind = EXCLUDED.message_kind,
       recorded_at = EXCLUDED.recorded_at`,
    [
      outcome.runId,
      outcome.entityKey,
      outcome.status,
      outcome.recordsProcessed,
      outcome.message?.text ?? null,
      outcome.message?.kind ?? null,
      outcome.recordedAt,
    ],
  );
}

export async function listEntityOutcomes(runId: string): Promise<EntityOutcome[]> {
  const result = await query<EntityOutcomeRow>(
    `SELECT * FROM collection_run_entities WHERE run_id = $1 ORDER BY entity_key`,
    [runId],
  );
  return result.rows.map(mapRowToEntityOutcome);
}
