import { Hono } from 'hono';
import type { DbPool } from '../db/client.js';
import { checkDbHealth } from '../db/client.js';
import { SERVER_VERSION } from '../services/cluster-manager-service.js';
import type { ServiceHealth } from '../types.js';

const startedAt = Date.now();

export interface HealthDependencies {
  /** Null when the in-memory store is in use. */
  dbPool: DbPool | null;
}

/**
 * GET / - liveness plus database reachability. Reports `degraded`
 * (still 200) when the database probe fails.
 */
export function createHealthRoutes(deps: HealthDependencies): Hono {
  const app = new Hono();

  app.get('/', async (c) => {
    const database = deps.dbPool ? await probeDatabase(deps.dbPool) : null;
    return c.json({
      status: database?.status === 'unreachable' ? 'degraded' : 'healthy',
      version: SERVER_VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      ...(database ? { database } : {}),
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

async function probeDatabase(pool: DbPool): Promise<ServiceHealth> {
  const start = Date.now();
  try {
    const latency = await checkDbHealth(pool);
    return { status: 'healthy', latency_ms: latency };
  } catch (err) {
    return {
      status: 'unreachable',
      latency_ms: Date.now() - start,
      error: err instanceof Error ? err.message : 'PostgreSQL health check failed',
    };
  }
}
