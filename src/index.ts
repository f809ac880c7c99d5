import { serve } from '@hono/node-server';
import { createClusterManagerApp, SERVICE_NAME } from './server.js';
import { loadConfig } from './config.js';
import { migrate } from './db/migrate.js';
import { closeDbPool } from './db/client.js';

const config = loadConfig();
const { app, log, dbPool } = createClusterManagerApp(config);

if (dbPool && config.migrateOnStart) {
  const result = await migrate(dbPool);
  log('info', { event: 'migrations_complete', ...result });
}

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log('info', { event: 'listening', url: `http://localhost:${info.port}`, service: SERVICE_NAME });
});

let shuttingDown = false;
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log('info', { event: 'shutdown', signal });

  server.close();
  if (dbPool) {
    try {
      await closeDbPool(dbPool);
    } catch (err) {
      log('warn', {
        event: 'pg_pool_close_failed',
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // Force exit if the event loop does not drain
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
