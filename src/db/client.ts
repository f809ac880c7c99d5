import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

export interface DbClientOptions {
  connectionString: string;
  minConnections?: number;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  /** Client-side cap on any single query. */
  queryTimeoutMs?: number;
  applicationName?: string;
  log?: (level: 'error' | 'warn' | 'info', data: Record<string, unknown>) => void;
}

/**
 * Create a PostgreSQL connection pool for the inventory store and the
 * database info probe.
 *
 * Pool sizing: min 1, max 10. Queries are short lookups; the manager
 * database is shared with the rest of the control plane.
 */
export function createDbPool(opts: DbClientOptions): DbPool {
  const pool = new Pool({
    connectionString: opts.connectionString,
    min: opts.minConnections ?? 1,
    max: opts.maxConnections ?? 10,
    idleTimeoutMillis: opts.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs ?? 5_000,
    query_timeout: opts.queryTimeoutMs ?? 10_000,
    application_name: opts.applicationName ?? 'cluster-manager-api',
  });

  pool.on('error', (err) => {
    opts.log?.('error', {
      event: 'pg_pool_error',
      message: err.message,
    });
  });

  pool.on('connect', () => {
    opts.log?.('info', { event: 'pg_pool_connect', total: pool.totalCount });
  });

  return pool;
}

/**
 * Health check - acquires and releases a connection.
 * Returns latency in ms or throws on failure.
 */
export async function checkDbHealth(pool: DbPool): Promise<number> {
  const start = Date.now();
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
    return Date.now() - start;
  } finally {
    client.release();
  }
}

/**
 * Graceful shutdown - drains all connections.
 */
export async function closeDbPool(pool: DbPool): Promise<void> {
  await pool.end();
}
