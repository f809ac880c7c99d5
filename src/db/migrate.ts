/**
 * Migration runner - forward-only SQL migrations.
 *
 * Applies `migrations/NNN_*.sql` in numeric order, each in its own
 * transaction, and records applied files with a checksum in
 * `_migrations`. A file whose checksum changed after it was applied is
 * reported as a warning, never re-run. A session advisory lock keeps
 * two replicas from migrating at once.
 */
import { readdir, readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createHash } from 'node:crypto';
import type { DbPool } from './client.js';
import { withTransaction } from './transaction.js';

const MIGRATIONS_DIR = join(dirname(fileURLToPath(import.meta.url)), 'migrations');

/** 31-bit lock id derived from the application name. */
export const MIGRATION_LOCK_ID =
  createHash('sha256').update('cluster-manager-api:migration').digest().readUInt32BE(0) & 0x7fffffff;

export interface MigrationResult {
  applied: string[];
  skipped: string[];
  warnings: string[];
}

function checksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function discoverMigrations(dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => /^\d+_.+\.sql$/.test(f))
    .sort((a, b) => parseInt(a, 10) - parseInt(b, 10));
}

/**
 * Run all pending migrations.
 *
 * @param dir - Directory holding the SQL files; defaults to `db/migrations`
 */
export async function migrate(pool: DbPool, dir: string = MIGRATIONS_DIR): Promise<MigrationResult> {
  const result: MigrationResult = { applied: [], skipped: [], warnings: [] };

  const lockClient = await pool.connect();
  try {
    await lockClient.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
    try {
      await pool.query(`
        CREATE TABLE IF NOT EXISTS _migrations (
          id SERIAL PRIMARY KEY,
          filename TEXT NOT NULL UNIQUE,
          checksum TEXT NOT NULL,
          applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
        );
      `);
      const appliedRows = await pool.query<{ filename: string; checksum: string }>(
        'SELECT filename, checksum FROM _migrations ORDER BY id',
      );
      const applied = new Map(appliedRows.rows.map((row) => [row.filename, row.checksum]));

      for (const filename of await discoverMigrations(dir)) {
        const content = await readFile(join(dir, filename), 'utf-8');
        const sum = checksum(content);
        const previous = applied.get(filename);
        if (previous !== undefined) {
          if (previous !== sum) {
            result.warnings.push(`Checksum mismatch for ${filename}: file changed after it was applied`);
          }
          result.skipped.push(filename);
          continue;
        }

        try {
          await withTransaction(pool, async (client) => {
            await client.query(content);
            await client.query('INSERT INTO _migrations (filename, checksum) VALUES ($1, $2)', [
              filename,
              sum,
            ]);
          });
        } catch (err) {
          throw new Error(
            `Migration ${filename} failed: ${err instanceof Error ? err.message : String(err)}`,
          );
        }
        result.applied.push(filename);
      }
      return result;
    } finally {
      await lockClient.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]);
    }
  } finally {
    lockClient.release();
  }
}
