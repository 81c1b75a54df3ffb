import { query } from '../client.js';

export interface ErrorLogRow {
  id: string;
  service: string;
  error_message: string;
  stack_trace: string | null;
  context: Record<string, unknown> | null;
  created_at: Date;
}

export interface ErrorLog {
  id: string;
  service: string;
  errorMessage: string;
  stackTrace?: string;
  context?: Record<string, unknown>;
  createdAt: Date;
}

function mapRowToErrorLog(row: ErrorLogRow): ErrorLog {
  return {
    id: row.id,
    service: row.service,
    errorMessage: row.error_message,
    stackTrace: row.stack_trace ?? undefined,
    context: row.context ?? undefined,
    createdAt: row.created_at,
  };
}

/**
 * Insert an error log entry. Callers go through safeLogError, which
 * catches failures here so they never mask the original error.
 */
export async function insertErrorLog(
  service: string,
  errorMessage: string,
  stackTrace?: string,
  context?: Record<string, unknown>,
): Promise<void> {
  await query(
    `INSERT INTO error_logs (service, error_message, stack_trace, context)
     VALUES ($1, $2, $3, $4)`,
    [service, errorMessage, stackTrace ?? null, context ? JSON.stringify(context) : null],
  );
}

/** Most recent entries first, optionally for one run. */
export async function listErrorLogs(limit: number, runId?: string): Promise<ErrorLog[]> {
  const result = runId
    ? await query<ErrorLogRow>(
        `SELECT * FROM error_logs WHERE context->>'runId' = $1 ORDER BY created_at DESC LIMIT $2`,
        [runId, limit],
      )
    : await query<ErrorLogRow>(`SELECT * FROM error_logs ORDER BY created_at DESC LIMIT $1`, [limit]);
  return result.rows.map(mapRowToErrorLog);
}
