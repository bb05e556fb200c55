/**
 * Search Service — The Orchestrator
 * Layer: Application
 * Pattern: Facade (simplifies access to the search subsystem)
 *
 * search(): translate the free-text input into a CompensationQuery, resolve the
 * strategy for the requested technique, run it. The controller never knows
 * which technique answered.
 *
 * Controllers resolve it via TOKENS.SearchService.
 */
import { SearchStrategyFactory } from '@application/factories/SearchStrategyFactory';
import { QueryTranslator } from '@application/query/QueryTranslator';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { CompensationSearchInput, CompensationSearchResult } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class SearchService {
  constructor(
    @inject(TOKENS.Logger) private log: Logger,
    private translator: QueryTranslator,
    private strategyFactory: SearchStrategyFactory,
  ) {}

  async search(input: CompensationSearchInput): Promise<CompensationSearchResult> {
    const strategy = this.strategyFactory.create(input.technique);
    const query = this.translator.translate(input);
    const result = await strategy.execute(query);

    this.log.debug(
      {
        titleTerms: query.titleTerms,
        locationTerms: query.locationTerms,
        technique: input.technique,
        count: result.summary.count,
      },
      'Compensation search complete',
    );
    return result;
  }
}
