/**
 * Application Entry Point
 *
 * Starts the Express HTTP server and all BullMQ workers in a single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Start Express server on configured port
 * 3. Start stage workers (ingestion, OCR, classification) and the mail worker
 * 4. Start Gmail monitor (periodic inbox polling)
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close all workers (finish current jobs, stop accepting new)
 * 3. Close queue and store connections
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createClassificationWorker, closeClassificationWorker } from './classification/classification-worker.js';
import { appConfig } from './config.js';
import { closeIngestionWorker, createIngestionWorker } from './intake/ingestion-worker.js';
import { closeMailQueue, getMailQueue, startGmailMonitor } from './intake/gmail-monitor.js';
import { closeMailWorker, createMailWorker } from './intake/mail-worker.js';
import { closeOcrWorker, createOcrWorker } from './ocr/ocr-worker.js';
import { errorMessage } from './pipeline/errors.js';
import { closeQueues } from './queue/queues.js';
import { createApp } from './server/server.js';
import { closeDocumentStore } from './store/redis-store.js';

async function main() {
  console.log('[startup] Document pipeline starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');

  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  createIngestionWorker();
  createOcrWorker();
  createClassificationWorker();
  createMailWorker();

  await startGmailMonitor(getMailQueue());

  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal} — shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeIngestionWorker();
    await closeOcrWorker();
    await closeClassificationWorker();
    await closeMailWorker();
    console.log('[shutdown] Workers closed');

    await closeQueues();
    await closeMailQueue();
    console.log('[shutdown] All queues closed');

    await closeDocumentStore();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', errorMessage(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exit(1);
});
