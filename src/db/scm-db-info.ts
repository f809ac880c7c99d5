import type { DbPool } from './client.js';
import type { ApiScmDbInfo, ScmDbType } from '../model/manager.js';

export interface ScmDbProbeOptions {
  connectionString: string;
  embeddedDbUsed: boolean;
}

/**
 * Describe the manager's own database by asking it for its version.
 *
 * Throws when the database cannot be reached or the query times out;
 * callers surface that as a service error rather than a partial record.
 */
export async function probeScmDbInfo(pool: DbPool, opts: ScmDbProbeOptions): Promise<ApiScmDbInfo> {
  const client = await pool.connect();
  try {
    const result = await client.query<{ version: string }>('SELECT version() AS version');
    const version = result.rows[0]?.version ?? '';
    return {
      scmDbType: detectDbType(version),
      ...describeConnection(opts.connectionString),
      embeddedDbUsed: opts.embeddedDbUsed,
    };
  } finally {
    client.release();
  }
}

export function detectDbType(versionString: string): ScmDbType {
  if (/postgresql/i.test(versionString)) return 'POSTGRESQL';
  if (/mysql|mariadb/i.test(versionString)) return 'MYSQL';
  if (/oracle/i.test(versionString)) return 'ORACLE';
  return 'UNKNOWN';
}

/**
 * Host, port and database name from a connection URL. Credentials are
 * never copied out.
 */
export function describeConnection(
  connectionString: string,
): Pick<ApiScmDbInfo, 'scmDbHost' | 'scmDbPort' | 'scmDbName'> {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    return {};
  }
  const port = url.port ? parseInt(url.port, 10) : undefined;
  const name = decodeURIComponent(url.pathname.replace(/^\//, ''));
  return {
    ...(url.hostname ? { scmDbHost: url.hostname } : {}),
    ...(port !== undefined ? { scmDbPort: port } : {}),
    ...(name ? { scmDbName: name } : {}),
  };
}
