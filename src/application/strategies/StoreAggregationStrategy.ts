/**
 * Store Aggregation Strategy — statistics computed by the store
 * Layer: Application
 * Pattern: Strategy Pattern (implements ISearchStrategy)
 *
 * The default technique. The repository aggregates over every matching row
 * (COUNT / MIN / MAX / AVG / percentile_cont in SQL), so the summary is never
 * limited by SEARCH_MAX_RESULTS. No records are returned.
 */
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';
import type { ISearchStrategy } from '@domain/interfaces/ISearchStrategy';
import type { CompensationQuery, CompensationSearchResult } from '@shared/types';

export class StoreAggregationStrategy implements ISearchStrategy {
  constructor(private repo: ICompensationRepository) {}

  async execute(query: CompensationQuery): Promise<CompensationSearchResult> {
    const start = Date.now();
    const summary = await this.repo.aggregate(query);
    return { summary, meta: { queryTimeMs: Date.now() - start } };
  }
}
