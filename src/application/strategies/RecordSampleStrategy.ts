/**
 * Record Sample Strategy — fetch ranked records, summarize in process
 * Layer: Application
 * Pattern: Strategy Pattern (implements ISearchStrategy)
 *
 * technique=records. The store is asked for one record past `query.limit`; the
 * extra one only tells whether more matches exist and is dropped before
 * ResultAggregator summarizes the rest. `truncated` is true only when matches
 * were left out, in which case the summary describes the top-ranked sample.
 */
import type { ResultAggregator } from '@application/aggregation/ResultAggregator';
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';
import type { ISearchStrategy } from '@domain/interfaces/ISearchStrategy';
import type { CompensationQuery, CompensationSearchResult } from '@shared/types';

export class RecordSampleStrategy implements ISearchStrategy {
  constructor(
    private repo: ICompensationRepository,
    private aggregator: ResultAggregator,
  ) {}

  async execute(query: CompensationQuery): Promise<CompensationSearchResult> {
    const start = Date.now();
    const fetched = await this.repo.findMatches({ ...query, limit: query.limit + 1 });
    const queryTimeMs = Date.now() - start;
    const records = fetched.slice(0, query.limit);

    return {
      summary: this.aggregator.summarize(records),
      records,
      truncated: fetched.length > query.limit,
      meta: { queryTimeMs },
    };
  }
}
