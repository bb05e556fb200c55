/**
 * Seed CLI Script — Standalone Data Ingestion
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run seed -- [--file path] [--migrate] [--force]
 *
 * The main way to load the disclosure workbook. Checks the file exists,
 * optionally runs migrations, and skips quietly when the store already holds
 * records (the store is loaded once; --force clears it and loads again).
 * The check, the clear and the load all run under the repository's ingestion
 * lock, so a seed and an HTTP ingest never load at the same time.
 * Otherwise it runs the same ETL worker the HTTP ingest endpoint uses, prints
 * progress, then the counts and the rejection tally.
 */
import 'reflect-metadata';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { REJECTION_REASONS } from '@domain/entities/Rejection';
import { createKnex } from '@infrastructure/database/connection';
import { PostgresCompensationRepository } from '@infrastructure/repositories/PostgresCompensationRepository';
import { buildWorkerData, runEtlWorker } from '@workers/etl/runEtlWorker';
import fs from 'fs';
import path from 'path';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const defaultFile = path.resolve(config.etl.dataDir, config.etl.sourceFile);
const filePath = path.resolve(getArg('--file', defaultFile));
const runMigrations = hasFlag('--migrate');
const force = hasFlag('--force');

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

/** host:port/db from DATABASE_URL, without credentials. */
function databaseLabel(url: string): string {
  try {
    const u = new URL(url);
    return `${u.hostname}:${u.port || '5432'}${u.pathname}`;
  } catch {
    return '(from DATABASE_URL)';
  }
}

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('  Wage Disclosure Search — ETL Seed');
  log('');

  if (!fs.existsSync(filePath)) {
    log(`  ERROR: File not found: ${filePath}`);
    log('  Use --file <path> to specify the .xlsx workbook.');
    process.exit(1);
  }

  const fileSize = fs.statSync(filePath).size;
  log(`  File:       ${filePath}`);
  log(`  Size:       ${(fileSize / 1024 / 1024).toFixed(1)} MB`);
  log(`  Batch size: ${formatNumber(config.etl.batchSize)}`);
  log(`  Database:   ${databaseLabel(config.database.url)}`);
  log('');

  const db = createKnex(config.database, { min: 0, max: 2 });
  try {
    if (runMigrations) {
      log('  Running migrations...');
      await db.migrate.latest({
        directory: path.resolve(__dirname, '../infrastructure/database/migrations'),
        loadExtensions: ['.ts'],
      });
      log('  Migrations complete.');
      log('');
    }

    const repo = new PostgresCompensationRepository(db, logger, config.payUnits);
    // Held for the whole load; a running HTTP ingest makes this fail with a conflict.
    await repo.withIngestionLock(async () => {
      const existing = await repo.count();
      if (existing > 0) {
        if (!force) {
          log(`  Store already holds ${formatNumber(existing)} records; nothing to do.`);
          log('  Use --force to clear it and load again.');
          log('');
          return;
        }
        log(`  --force: clearing ${formatNumber(existing)} existing records...`);
        await repo.clear();
      }
      await load(log);
    });
  } finally {
    await db.destroy();
  }
}

async function load(log: (message: string) => void): Promise<void> {
  log('  Starting ingestion...');
  log('');

  const startTime = Date.now();
  let lastProgressTime = startTime;
  let lastProgressCount = 0;

  const result = await runEtlWorker(buildWorkerData(filePath), ({ processed, accepted }) => {
    const now = Date.now();
    const intervalMs = now - lastProgressTime;
    const rps = intervalMs > 0 ? Math.round(((processed - lastProgressCount) / intervalMs) * 1000) : 0;

    log(
      `  [${formatDuration(now - startTime)}] ${formatNumber(processed)} rows read, ` +
        `${formatNumber(accepted)} accepted (${formatNumber(rps)} rows/s)`,
    );

    lastProgressTime = now;
    lastProgressCount = processed;
  });

  const avgRps =
    result.durationMs > 0 ? Math.round((result.totalProcessed / result.durationMs) * 1000) : 0;

  log('');
  log('  ✓ Ingestion complete');
  log(`    Rows read:      ${formatNumber(result.totalProcessed)}`);
  log(`    Inserted:       ${formatNumber(result.totalInserted)}`);
  log(`    Rejected:       ${formatNumber(result.totalRejected)}`);
  for (const reason of REJECTION_REASONS) {
    log(`      ${reason.padEnd(26)}${formatNumber(result.rejections[reason])}`);
  }
  log(`    Duration:       ${formatDuration(result.durationMs)}`);
  log(`    Avg throughput: ${formatNumber(avgRps)} rows/s`);
  log('');
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Seed failed:', err);
  process.exit(1);
});
