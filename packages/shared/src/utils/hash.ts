import { createHash } from 'node:crypto';

export function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Content hash of a JSON payload, as stored beside raw records. */
export function hashPayload(payload: unknown): string {
  return sha256(JSON.stringify(payload));
}
