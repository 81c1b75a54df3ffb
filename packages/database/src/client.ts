import pg from 'pg';
import { optionalEnv, parseIntEnv } from '@collector/shared';

const { Pool } = pg;

let pool: pg.Pool | null = null;

// Keep PG_POOL_MAX small: collection is I/O bound on upstream APIs, not on the database
const DEFAULT_POOL_MAX = 2;
const DEFAULT_IDLE_TIMEOUT_MS = 30000;
const DEFAULT_CONN_TIMEOUT_MS = 10000;

function getPoolConfig(): pg.PoolConfig {
  return {
    max: parseIntEnv('PG_POOL_MAX', DEFAULT_POOL_MAX),
    idleTimeoutMillis: parseIntEnv('PG_IDLE_TIMEOUT_MS', DEFAULT_IDLE_TIMEOUT_MS),
    connectionTimeoutMillis: parseIntEnv('PG_CONN_TIMEOUT_MS', DEFAULT_CONN_TIMEOUT_MS),
    keepAlive: true,
  };
}

export function getPool(): pg.Pool {
  if (!pool) {
    const poolConfig = getPoolConfig();
    const url = optionalEnv('DATABASE_URL', '');

    pool = url
      ? new Pool({ connectionString: url, ...poolConfig })
      : new Pool({
          host: optionalEnv('DATABASE_HOST', 'localhost'),
          port: parseIntEnv('DATABASE_PORT', 5432),
          database: optionalEnv('DATABASE_NAME', 'postgres'),
          user: optionalEnv('DATABASE_USERNAME', 'postgres'),
          password: optionalEnv('DATABASE_PASSWORD', ''),
          ...poolConfig,
        });
  }
  return pool;
}

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
