/**
 * Compensation Repository Interface — The Search Index Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * What the application needs from the searchable store, without saying how it
 * is done. The PostgreSQL implementation uses tsvector columns and GIN indexes;
 * tests use an in-memory implementation with the same semantics.
 *
 * Records are write-once and append-only: there is no update path and no
 * primary key the domain cares about.
 */
import type { CompensationRecord } from '@domain/entities/CompensationRecord';
import type { CompensationQuery, CompensationSummary } from '@shared/types';

export interface ICompensationRepository {
  /** Insert a batch of canonical records. Returns the number of rows written. */
  bulkInsert(records: readonly CompensationRecord[]): Promise<number>;

  /** Total number of stored records (ingestion only loads into an empty store). */
  count(): Promise<number>;

  /** Remove every stored record (forced re-ingestion). */
  clear(): Promise<void>;

  /** Store-native annualized statistics over every record matching the query. */
  aggregate(query: CompensationQuery): Promise<CompensationSummary>;

  /** Matching records, ranked, at most `query.limit` of them. */
  findMatches(query: CompensationQuery): Promise<CompensationRecord[]>;

  /**
   * Runs `work` while holding the store-wide ingestion lock, released when
   * `work` settles. Rejects with ConflictError, without running `work`, when
   * another load (another process included) already holds it.
   */
  withIngestionLock<T>(work: () => Promise<T>): Promise<T>;
}
