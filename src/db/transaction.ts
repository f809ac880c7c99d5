import type pg from 'pg';
import type { DbPool } from './client.js';
import type { LogCallback } from '../middleware/logger.js';

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client.
 *
 * On error the transaction is rolled back and the error from `fn` (or
 * COMMIT) is rethrown. A ROLLBACK that fails too is logged and never
 * replaces that error; the client is then released as broken so the
 * pool does not hand out a connection stuck mid-transaction.
 */
export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: pg.PoolClient) => Promise<T>,
  log: LogCallback | null = null,
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
      log?.('error', {
        event: 'transaction_rollback_failed',
        error: broken.message,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    throw err;
  } finally {
    client.release(broken);
  }
}
