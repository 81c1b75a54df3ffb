import { hashPayload, type RawRecordInput } from '@collector/shared';
import { query } from '../client.js';

export interface RawRecordRow {
  source: string;
  external_id: string;
  run_id: string;
  entity_key: string;
  payload: Record<string, unknown>;
  payload_hash: string;
  created_at: Date;
  updated_at: Date;
}

/**
 * Insert or refresh a raw upstream payload. Returns false when the stored
 * payload hash already matched and no row was written.
 */
export async function upsertRawRecord(record: RawRecordInput): Promise<boolean> {
  const payloadStr = JSON.stringify(record.payload);
  const payloadHash = hashPayload(record.payload);

  // WHERE clause prevents no-op updates when payload hasn't changed
  const result = await query(
    `INSERT INTO raw_records (source, external_id, run_id, entity_key, payload, payload_hash)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (source, external_id) DO UPDATE SET
       run_id = EXCLUDED.run_id,
       entity_key = EXCLUDED.entity_key,
       payload = EXCLUDED.payload,
       payload_hash = EXCLUDED.payload_hash,
       updated_at = NOW()
     WHERE raw_records.payload_hash IS DISTINCT FROM EXCLUDED.payload_hash`,
    [record.source, record.externalId, record.runId, record.entityKey, payloadStr, payloadHash],
  );
  return (result.rowCount ?? 0) > 0;
}

export async function countRawRecords(source: string, entityKey?: string): Promise<number> {
  const result = entityKey
    ? await query<{ count: string }>(
        `SELECT COUNT(*) AS count FROM raw_records WHERE source = $1 AND entity_key = $2`,
        [source, entityKey],
      )
    : await query<{ count: string }>(`SELECT COUNT(*) AS count FROM raw_records WHERE source = $1`, [source]);
  return parseInt(result.rows[0]?.count ?? '0', 10);
}
