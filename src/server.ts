import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { requestId } from './middleware/request-id.js';
import { createTracing } from './middleware/tracing.js';
import { createLogger, type LogCallback } from './middleware/logger.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { createHealthRoutes } from './routes/health.js';
import { createClusterRoutes } from './routes/clusters.js';
import { createManagerRoutes } from './routes/manager.js';
import { createRoleConfigGroupRoutes } from './routes/role-config-groups.js';
import { createDbPool, type DbPool } from './db/client.js';
import { PostgresInventoryStore } from './db/pg-inventory-store.js';
import {
  InMemoryInventoryStore,
  loadInventorySeed,
  type InventoryStore,
} from './services/inventory-store.js';
import { ClusterManagerService } from './services/cluster-manager-service.js';
import { RoleConfigGroupService } from './services/role-config-group-service.js';
import {
  MANAGER_OPERATIONS,
  SUPPORTED_API_VERSIONS,
} from './resources/cluster-manager-resource.js';
import { createErrorHandler } from './utils/error-handler.js';
import type { ApiConfig } from './config.js';

export const SERVICE_NAME = 'cluster-manager-api';

export interface ClusterManagerApp {
  app: Hono;
  log: LogCallback;
  store: InventoryStore;
  manager: ClusterManagerService;
  /** PostgreSQL pool (null when DATABASE_URL is not configured) */
  dbPool: DbPool | null;
}

export interface AppOverrides {
  /** Replace the store chosen from config (tests). */
  store?: InventoryStore;
  /** Replace the pool created from DATABASE_URL (tests). */
  dbPool?: DbPool | null;
  /** Sink for log lines; defaults to stdout. */
  write?: (line: string) => void;
}

/**
 * Create and configure the cluster manager Hono application.
 *
 * Middleware order:
 * 1. requestId - id exists before anything logs
 * 2. tracing - span wraps the rest of the pipeline
 * 3. secureHeaders
 * 4. bodyLimit - reject oversized payloads before parsing
 * 5. logger - one line per request, after status is known
 */
export function createClusterManagerApp(
  config: ApiConfig,
  overrides: AppOverrides = {},
): ClusterManagerApp {
  const app = new Hono();
  const { middleware: loggerMiddleware, log } = createLogger(
    SERVICE_NAME,
    config.logLevel,
    overrides.write,
  );

  let dbPool: DbPool | null = overrides.dbPool ?? null;
  if (overrides.dbPool === undefined && config.databaseUrl) {
    dbPool = createDbPool({ connectionString: config.databaseUrl, log });
  }

  let store: InventoryStore;
  if (overrides.store) {
    store = overrides.store;
  } else if (dbPool) {
    store = new PostgresInventoryStore(dbPool, log);
  } else {
    store = new InMemoryInventoryStore(
      config.inventorySeedPath ? loadInventorySeed(config.inventorySeedPath) : undefined,
    );
  }

  const manager = new ClusterManagerService({
    store,
    dbPool,
    databaseUrl: config.databaseUrl,
    embeddedDbUsed: config.embeddedDb,
    log,
  });
  const roleConfigGroups = new RoleConfigGroupService(store, log);

  // --- Global middleware ---
  app.use('*', requestId());
  app.use('*', createTracing(SERVICE_NAME));
  app.use('*', secureHeaders());
  app.use('/api/*', createBodyLimit(config.bodyLimitBytes));
  app.use('*', loggerMiddleware);

  app.onError(createErrorHandler(log));
  app.notFound((c) =>
    c.json({ error: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` }, 404),
  );

  // --- Routes ---
  app.route('/api/health', createHealthRoutes({ dbPool }));

  for (const version of SUPPORTED_API_VERSIONS) {
    const base = `/api/${version}`;
    app.route(`${base}/cm`, createManagerRoutes(manager, MANAGER_OPERATIONS[version]));
    app.route(
      `${base}/cm/service/roleConfigGroups`,
      createRoleConfigGroupRoutes(roleConfigGroups, 'management'),
    );
    app.route(
      `${base}/clusters/:clusterName/services/:serviceName/roleConfigGroups`,
      createRoleConfigGroupRoutes(roleConfigGroups, 'cluster'),
    );
    app.route(`${base}/clusters`, createClusterRoutes(store));
  }

  app.get('/', (c) =>
    c.json({
      service: SERVICE_NAME,
      status: 'running',
      environment: config.nodeEnv,
      apiVersions: SUPPORTED_API_VERSIONS,
    }),
  );

  return { app, log, store, manager, dbPool };
}
