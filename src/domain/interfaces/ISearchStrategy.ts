/**
 * Search Strategy Interface
 * Layer: Domain
 * Pattern: Strategy Pattern
 *
 * A strategy answers a translated query with annualized statistics. Two exist:
 *   - StoreAggregationStrategy: the store aggregates natively over all matches.
 *   - RecordSampleStrategy: the store returns the capped, ranked matches and
 *     the ResultAggregator summarizes them in process.
 * SearchService picks one per request through SearchStrategyFactory.
 */
import type { CompensationQuery, CompensationSearchResult } from '@shared/types';

export interface ISearchStrategy {
  execute(query: CompensationQuery): Promise<CompensationSearchResult>;
}
