/**
 * ETL Worker Runner — main-thread side of the ingestion worker
 * Layer: Workers (ETL)
 *
 * Reading and normalizing a few hundred thousand workbook rows would block the
 * HTTP event loop for minutes, so the work runs in a worker thread with its own
 * event loop and its own DB pool.
 *
 *   Main thread → Worker: workerData (EtlWorkerData)
 *   Worker → Main thread: postMessage(EtlWorkerMessage)
 *
 * `execArgv: ['--require', 'tsx/cjs']` preloads the tsx transpiler in the
 * worker so it can load etlWorker.ts without a build step.
 *
 * Both the ingestion service and the seed script go through `runEtlWorker`.
 */
import { config } from '@core/config';
import type { PayUnitPolicy } from '@domain/entities/PayUnit';
import type { DbConfig } from '@infrastructure/database/connection';
import { IngestionError } from '@shared/errors/AppError';
import type { IngestionResult } from '@shared/types';
import path from 'path';
import { Worker } from 'worker_threads';

import type { EtlOptions } from './batchProcessor';
import type { DisclosureColumns } from './DisclosureFieldNormalizer';

export interface EtlWorkerData {
  filePath: string;
  dbConfig: DbConfig;
  batchSize: number;
  etlOptions: EtlOptions;
  poolIdleTimeoutMs: number;
  progressInterval: number;
  columns: DisclosureColumns;
  payUnitPolicy: PayUnitPolicy;
}

export interface EtlProgress {
  processed: number;
  accepted: number;
}

export type EtlWorkerMessage =
  | ({ type: 'progress' } & EtlProgress)
  | { type: 'done'; result: IngestionResult }
  | { type: 'error'; message: string };

export type EtlRunner = (
  data: EtlWorkerData,
  onProgress?: (progress: EtlProgress) => void,
) => Promise<IngestionResult>;

const WORKER_PATH = path.resolve(__dirname, 'etlWorker.ts');

/** Worker settings for one ingestion run, taken from config. */
export function buildWorkerData(filePath: string): EtlWorkerData {
  return {
    filePath,
    dbConfig: config.database,
    batchSize: config.etl.batchSize,
    etlOptions: {
      retryAttempts: config.etl.retryAttempts,
      retryDelayMs: config.etl.retryDelayMs,
      flushDelayMs: config.etl.flushDelayMs,
    },
    poolIdleTimeoutMs: config.etl.poolIdleTimeoutMs,
    progressInterval: config.etl.progressInterval,
    columns: { ...config.etl.columns },
    payUnitPolicy: {
      correctionThreshold: config.payUnits.correctionThreshold,
      factors: { ...config.payUnits.factors },
    },
  };
}

export const runEtlWorker: EtlRunner = (data, onProgress) =>
  new Promise<IngestionResult>((resolve, reject) => {
    let settled = false;
    const worker = new Worker(WORKER_PATH, {
      workerData: data,
      execArgv: ['--require', 'tsx/cjs'],
    });

    worker.on('message', (msg: EtlWorkerMessage) => {
      switch (msg.type) {
        case 'progress':
          onProgress?.({ processed: msg.processed, accepted: msg.accepted });
          break;
        case 'done':
          settled = true;
          resolve(msg.result);
          break;
        case 'error':
          settled = true;
          reject(new IngestionError(msg.message));
          break;
      }
    });

    worker.on('error', (err: Error) => {
      settled = true;
      reject(new IngestionError(`worker crashed: ${err.message}`));
    });

    worker.on('exit', (code) => {
      if (!settled) {
        reject(new IngestionError(`worker exited with code ${code} before reporting a result`));
      }
    });
  });
