/**
 * ETL Worker Thread — Workbook Ingestion Engine
 * Layer: Workers (ETL)
 *
 * Runs in a worker thread started by runEtlWorker. Pipeline:
 *
 *   XlsxRecordSource → DisclosureFieldNormalizer → RecordValidator
 *     → BatchProcessor → PostgresCompensationRepository
 *
 * Backpressure: each accepted record is awaited into the batch processor, and
 * the normalization pipeline only pulls the next workbook row when the loop
 * asks for the next record. A slow flush therefore pauses reading instead of
 * piling rows up in memory.
 *
 * Progress is reported from rows read, so a long stretch of rejected rows
 * still reports.
 *
 * The thread owns a small pool of its own (threads cannot share sockets with
 * the main thread) and always destroys it before reporting.
 */
import 'reflect-metadata';

import { logger } from '@core/logger';
import { totalRejected } from '@domain/entities/Rejection';
import { createKnex } from '@infrastructure/database/connection';
import { PostgresCompensationRepository } from '@infrastructure/repositories/PostgresCompensationRepository';
import type { IngestionResult } from '@shared/types';
import { parentPort, workerData } from 'worker_threads';

import { BatchProcessor } from './batchProcessor';
import { DisclosureFieldNormalizer } from './DisclosureFieldNormalizer';
import { NormalizationPipeline } from './normalizationPipeline';
import { RecordValidator } from './recordValidator';
import type { EtlWorkerData, EtlWorkerMessage } from './runEtlWorker';
import { XlsxRecordSource } from './XlsxRecordSource';

const data: EtlWorkerData = workerData;

function post(message: EtlWorkerMessage): void {
  parentPort?.postMessage(message);
}

async function run(): Promise<IngestionResult> {
  const startTime = Date.now();
  const db = createKnex(data.dbConfig, {
    min: 1,
    max: 4,
    idleTimeoutMillis: data.poolIdleTimeoutMs,
  });

  try {
    const repository = new PostgresCompensationRepository(db, logger, data.payUnitPolicy);
    const processor = new BatchProcessor(repository, data.batchSize, data.etlOptions);
    const pipeline = new NormalizationPipeline(
      new DisclosureFieldNormalizer(data.columns),
      new RecordValidator(data.payUnitPolicy),
    );

    let lastReported = 0;
    const source = new XlsxRecordSource(data.filePath);
    const { records, tally, stats } = pipeline.run(source, ({ processed, accepted }) => {
      if (processed - lastReported >= data.progressInterval) {
        lastReported = processed;
        post({ type: 'progress', processed, accepted });
      }
    });

    for await (const record of records) {
      await processor.add(record);
    }
    await processor.flush();

    return {
      totalProcessed: stats.processed,
      totalInserted: processor.inserted,
      totalRejected: totalRejected(tally),
      rejections: tally,
      durationMs: Date.now() - startTime,
    };
  } finally {
    await db.destroy();
  }
}

run()
  .then((result) => post({ type: 'done', result }))
  .catch((err: unknown) => {
    post({ type: 'error', message: err instanceof Error ? err.message : String(err) });
  });
