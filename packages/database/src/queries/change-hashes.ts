import { query } from '../client.js';

/**
 * Stored hashes for the given ids in one round trip. Ids without a stored
 * hash are absent from the returned map.
 */
export async function getStoredHashes(source: string, externalIds: readonly string[]): Promise<Map<string, string>> {
  const hashes = new Map<string, string>();
  if (externalIds.length === 0) return hashes;

  const result = await query<{ external_id: string; content_hash: string }>(
    `SELECT external_id, content_hash
     FROM change_hashes
     WHERE source = $1 AND external_id = ANY($2::text[])`,
    [source, [...externalIds]],
  );
  for (const row of result.rows) {
    hashes.set(row.external_id, row.content_hash);
  }
  return hashes;
}

export async function updateStoredHash(source: string, externalId: string, hash: string): Promise<void> {
  await query(
    `INSERT INTO change_hashes (source, external_id, content_hash)
     VALUES ($1, $2, $3)
     ON CONFLICT (source, external_id) DO UPDATE SET
       content_hash = EXCLUDED.content_hash,
       updated_at = NOW()`,
    [source, externalId, hash],
  );
}
