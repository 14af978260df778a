/**
 * Application Entry Point
 *
 * Starts the Express HTTP server and both BullMQ workers in a single process.
 *
 * Startup:
 * 1. Validate the relation config (fails fast on duplicate or missing fields)
 * 2. Start Express server on configured port
 * 3. Start the sync worker and the maintenance worker
 * 4. Register the daily full-sync and token-refresh schedulers
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close workers (finish current jobs, stop accepting new)
 * 3. Close queue and Redis connections
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './webhook/server.js';
import { createWorker, closeWorker } from './webhook/worker.js';
import { closeQueue } from './webhook/queue.js';
import {
  createMaintenanceWorker,
  closeMaintenanceWorker,
  closeMaintenanceQueue,
  startSchedulers,
} from './scheduler/maintenance.js';
import { closeTokenStore } from './auth/token-store.js';
import { syncConfig, validateSyncConfig } from './sync/index.js';
import { appConfig } from './config.js';

async function main() {
  console.log('[startup] SPA link sync starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');

  validateSyncConfig(syncConfig);
  console.log('[startup] Relations:', syncConfig.relations.map((r) => `${r.kind}(${r.entityTypeId})`).join(', '));

  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  createWorker();
  createMaintenanceWorker();
  await startSchedulers();

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal} — shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeWorker();
    await closeMaintenanceWorker();
    console.log('[shutdown] Workers closed');

    await closeQueue();
    await closeMaintenanceQueue();
    await closeTokenStore();
    console.log('[shutdown] Queues and Redis closed');

    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
