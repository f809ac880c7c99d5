import { isLogLevel, type LogLevel } from './middleware/logger.js';

export interface ApiConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;

  /** PostgreSQL connection string; null selects the in-memory store. */
  databaseUrl: string | null;
  /** Whether the manager database is the bundled embedded instance. */
  embeddedDb: boolean;
  /** Run pending SQL migrations at startup (PostgreSQL only). Default true. */
  migrateOnStart: boolean;

  /** JSON file that seeds the in-memory store; ignored with a database. */
  inventorySeedPath: string | null;

  bodyLimitBytes: number;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

/**
 * Environment variables:
 *
 * CM_API_PORT          (optional): HTTP listen port; default 7180
 * DATABASE_URL         (optional): PostgreSQL connection string; unset selects the in-memory store
 * CM_EMBEDDED_DB       (optional): 'true' when DATABASE_URL points at the embedded database; default false
 * CM_MIGRATE_ON_START  (optional): 'false' skips startup migrations; default true
 * CM_INVENTORY_SEED    (optional): path to a JSON inventory seed for the in-memory store
 * CM_BODY_LIMIT_BYTES  (optional): max request body size; default 102400
 * NODE_ENV             (optional): runtime environment; default 'development'
 * LOG_LEVEL            (optional): error | warn | info | debug; default 'info'
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of error, warn, info, debug (got "${logLevel}")`);
  }

  return {
    port: parsePositiveInt('CM_API_PORT', env.CM_API_PORT, 7180),
    nodeEnv: env.NODE_ENV ?? 'development',
    logLevel,
    databaseUrl: env.DATABASE_URL || null,
    embeddedDb: env.CM_EMBEDDED_DB === 'true',
    migrateOnStart: env.CM_MIGRATE_ON_START !== 'false',
    inventorySeedPath: env.CM_INVENTORY_SEED || null,
    bodyLimitBytes: parsePositiveInt('CM_BODY_LIMIT_BYTES', env.CM_BODY_LIMIT_BYTES, 102_400),
  };
}
