/**
 * Ingestion Service — Facade over the ETL Subsystem
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * `ingest(filePath)` hides:
 *   - checking the workbook exists and the store is still empty
 *   - spawning the ETL worker thread (see runEtlWorker)
 *   - streaming the workbook through the normalization pipeline
 *   - batching inserts into PostgreSQL
 *
 * The store is loaded once. A second ingest is a 409 unless `force` is set, in
 * which case every stored record is removed first.
 *
 * Only one load runs at a time: a call made while this instance is loading is
 * a 409, and the repository's ingestion lock turns away loads started by other
 * processes (cluster workers, the seed script). The container registers this
 * service as a singleton so the in-process guard is shared.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';
import { ConflictError, NotFoundError } from '@shared/errors/AppError';
import type { IngestionResult } from '@shared/types';
import { buildWorkerData, type EtlRunner } from '@workers/etl/runEtlWorker';
import fs from 'fs';
import path from 'path';
import { inject, injectable } from 'tsyringe';

export interface IngestOptions {
  /** Clear a populated store and load again. */
  force?: boolean;
}

@injectable()
export class IngestionService {
  constructor(
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.CompensationRepository) private repo: ICompensationRepository,
    @inject(TOKENS.EtlRunner) private runEtl: EtlRunner,
  ) {}

  private running = false;

  async ingest(filePath: string, options: IngestOptions = {}): Promise<IngestionResult> {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      throw new NotFoundError('Source file', absolutePath);
    }
    if (this.running) {
      throw new ConflictError('An ingestion is already running');
    }

    this.running = true;
    try {
      return await this.repo.withIngestionLock(() => this.load(absolutePath, options));
    } finally {
      this.running = false;
    }
  }

  private async load(absolutePath: string, options: IngestOptions): Promise<IngestionResult> {
    const existing = await this.repo.count();
    if (existing > 0) {
      if (!options.force) {
        throw new ConflictError(
          `Compensation store already holds ${existing} records; re-run with force to reload`,
        );
      }
      this.log.warn({ existing }, 'Clearing compensation store before forced ingestion');
      await this.repo.clear();
    }

    this.log.info({ filePath: absolutePath }, 'Starting ETL ingestion');
    const result = await this.runEtl(buildWorkerData(absolutePath), (progress) => {
      this.log.info(progress, 'ETL progress');
    });

    this.log.info(
      {
        totalProcessed: result.totalProcessed,
        totalInserted: result.totalInserted,
        rejections: result.rejections,
        durationMs: result.durationMs,
      },
      'ETL ingestion complete',
    );
    return result;
  }
}
