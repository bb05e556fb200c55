/**
 * Normalization Pipeline — RawRecordSource → CompensationRecords
 * Layer: Workers (ETL)
 *
 * `run(source)` wires the field normalizer and the record validator over a
 * source and hands back three things together:
 *
 *   records — a lazy async sequence; nothing is read until it is iterated and
 *             the next row is only pulled when the consumer asks for the next
 *             record, so a slow sink (the batch processor awaiting a flush)
 *             holds the reader back.
 *   tally   — rejection counts per reason, owned by this run only.
 *   stats   — rows read and records accepted so far.
 *
 * An optional `onRow` callback receives a snapshot of stats after every row
 * read, rejected rows included, so progress reporting does not depend on how
 * many rows are accepted.
 *
 * tally and stats are final once `records` is exhausted. Running again over the
 * same source starts from its first row and produces the same output.
 */
import type { CompensationRecord } from '@domain/entities/CompensationRecord';
import { createRejectionTally, type RejectionTally } from '@domain/entities/Rejection';
import type { IFieldNormalizer, IRawRecordSource } from '@domain/interfaces/IDataSourceAdapter';

import type { RecordValidator } from './recordValidator';

export interface PipelineStats {
  processed: number;
  accepted: number;
}

export type RowListener = (stats: Readonly<PipelineStats>) => void;

export interface NormalizationRun {
  records: AsyncGenerator<CompensationRecord, void, undefined>;
  tally: RejectionTally;
  stats: PipelineStats;
}

export class NormalizationPipeline {
  constructor(
    private readonly normalizer: IFieldNormalizer,
    private readonly validator: RecordValidator,
  ) {}

  run(source: IRawRecordSource, onRow?: RowListener): NormalizationRun {
    const tally = createRejectionTally();
    const stats: PipelineStats = { processed: 0, accepted: 0 };
    return { records: this.emit(source, tally, stats, onRow), tally, stats };
  }

  private async *emit(
    source: IRawRecordSource,
    tally: RejectionTally,
    stats: PipelineStats,
    onRow: RowListener | undefined,
  ): AsyncGenerator<CompensationRecord, void, undefined> {
    for await (const row of source.rows()) {
      stats.processed++;
      const outcome = this.validator.validate(this.normalizer.normalize(row));
      if (outcome.ok) stats.accepted++;
      else tally[outcome.reason]++;
      onRow?.({ ...stats });
      if (outcome.ok) yield outcome.record;
    }
  }
}
