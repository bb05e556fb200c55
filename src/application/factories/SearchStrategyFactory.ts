/**
 * Search Strategy Factory
 * Layer: Application
 * Pattern: Factory Pattern
 *
 * Maps the request's technique to a strategy: `store` (default) →
 * StoreAggregationStrategy, `records` → RecordSampleStrategy. The repository
 * and aggregator come in through DI and are handed to whichever strategy is
 * built for the request.
 */
import { ResultAggregator } from '@application/aggregation/ResultAggregator';
import { RecordSampleStrategy } from '@application/strategies/RecordSampleStrategy';
import { StoreAggregationStrategy } from '@application/strategies/StoreAggregationStrategy';
import { TOKENS } from '@core/types';
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';
import type { ISearchStrategy } from '@domain/interfaces/ISearchStrategy';
import { DEFAULT_TECHNIQUE } from '@shared/constants';
import { ValidationError } from '@shared/errors/AppError';
import { inject, injectable } from 'tsyringe';

@injectable()
export class SearchStrategyFactory {
  constructor(
    @inject(TOKENS.CompensationRepository) private repo: ICompensationRepository,
    private aggregator: ResultAggregator,
  ) {}

  create(technique: string = DEFAULT_TECHNIQUE): ISearchStrategy {
    switch (technique) {
      case 'store':
        return new StoreAggregationStrategy(this.repo);
      case 'records':
        return new RecordSampleStrategy(this.repo, this.aggregator);
      default:
        throw new ValidationError(`Unknown search technique: ${technique}`);
    }
  }
}
