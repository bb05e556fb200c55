/**
 * Batch Processor — Buffered Bulk Insert
 * Layer: Workers (ETL)
 *
 * Buffers canonical records and hands them to the repository in batches so we
 * don't do one INSERT per record. `add()` resolves only once any flush it
 * triggered has finished, which is how the pipeline feels backpressure from
 * the store.
 *
 * Concurrency: flushes are chained so only one runs at a time; overlapping
 * callers queue behind the previous flush.
 *
 * Retries: connection-class errors (reset sockets, pool timeouts, admin
 * shutdown) retry the whole batch with exponential backoff. The repository
 * writes each batch in one transaction, so a retried batch leaves no partial
 * rows. Any other error, or running out of attempts, propagates: a failing
 * store ends the ingestion run.
 */
import type { CompensationRecord } from '@domain/entities/CompensationRecord';
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';

/** ETL tuning: retries, backoff, pacing. */
export interface EtlOptions {
  retryAttempts: number;
  retryDelayMs: number;
  flushDelayMs: number;
}

const DEFAULT_ETL_OPTIONS: EtlOptions = {
  retryAttempts: 3,
  retryDelayMs: 1000,
  flushDelayMs: 0,
};

const RETRYABLE_CODES = new Set(['ECONNRESET', 'EPIPE', 'ETIMEDOUT', 'ECONNREFUSED', '57P01']);

export function isRetryableConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? String(err.code) : null;
  if (code !== null && RETRYABLE_CODES.has(code)) return true;
  return (
    /connection terminated|terminated unexpectedly|connection closed|connection.*reset/i.test(
      err.message,
    ) || /timeout acquiring a connection|pool is probably full/i.test(err.message)
  );
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class BatchProcessor {
  private buffer: CompensationRecord[] = [];
  private totalInserted = 0;
  private readonly etlOptions: EtlOptions;
  private flushChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: Pick<ICompensationRepository, 'bulkInsert'>,
    private readonly batchSize: number,
    etlOptions?: Partial<EtlOptions>,
  ) {
    this.etlOptions = { ...DEFAULT_ETL_OPTIONS, ...etlOptions };
  }

  get inserted(): number {
    return this.totalInserted;
  }

  async add(record: CompensationRecord): Promise<void> {
    this.buffer.push(record);
    if (this.buffer.length >= this.batchSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return this.flushChain;
    const batch = this.buffer.splice(0);
    const run = this.flushChain.then(() => this.writeWithRetry(batch));
    // Keep the chain alive for later callers; this caller still sees the failure via `run`.
    this.flushChain = run.catch(() => undefined);
    return run;
  }

  private async writeWithRetry(batch: CompensationRecord[]): Promise<void> {
    const { retryAttempts, retryDelayMs, flushDelayMs } = this.etlOptions;
    for (let attempt = 1; attempt <= retryAttempts; attempt++) {
      try {
        this.totalInserted += await this.repository.bulkInsert(batch);
        if (flushDelayMs > 0) await delay(flushDelayMs);
        return;
      } catch (err) {
        if (!isRetryableConnectionError(err) || attempt === retryAttempts) throw err;
        await delay(retryDelayMs * Math.pow(2, attempt - 1));
      }
    }
  }
}
