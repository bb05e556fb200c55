/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * `npm start` / `npm run dev`. The primary process serves nothing itself: it
 * forks one HTTP worker per CPU (WEB_CONCURRENCY overrides the count) and
 * replaces any worker that dies. Each worker builds its own Express app and DB
 * pool; the OS spreads connections on the shared port across them.
 *
 * Searches are short, read-only queries, so extra processes translate almost
 * directly into throughput. Ingestion runs in its own worker thread and never
 * occupies an HTTP event loop.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests finish, destroys its pool and exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  // Graceful shutdown: stop accepting new connections, drain existing ones,
  // then tear down the DB pool.
  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
