/**
 * Unit Tests — SearchStrategyFactory and the two strategies
 *
 * The factory maps a technique to a strategy; the strategies are then run
 * against a mock repository to check what each one asks the store for.
 */
import { ResultAggregator } from '@application/aggregation/ResultAggregator';
import { SearchStrategyFactory } from '@application/factories/SearchStrategyFactory';
import { RecordSampleStrategy } from '@application/strategies/RecordSampleStrategy';
import { StoreAggregationStrategy } from '@application/strategies/StoreAggregationStrategy';
import { AppError, ValidationError } from '@shared/errors/AppError';
import type { CompensationQuery } from '@shared/types';

import { record, testPayUnitPolicy } from '../helpers/fixtures';
import { createMockRepository, type MockCompensationRepository } from '../helpers/mockRepository';

const query: CompensationQuery = {
  titleTerms: ['engineer'],
  locationTerms: [],
  matchPolicy: 'all',
  limit: 2,
};

describe('SearchStrategyFactory', () => {
  let factory: SearchStrategyFactory;
  let mockRepo: MockCompensationRepository;

  beforeEach(() => {
    mockRepo = createMockRepository();
    factory = new SearchStrategyFactory(mockRepo, new ResultAggregator(testPayUnitPolicy));
  });

  describe('create()', () => {
    it('should return a StoreAggregationStrategy for "store"', () => {
      expect(factory.create('store')).toBeInstanceOf(StoreAggregationStrategy);
    });

    it('should default to "store" when no technique is given', () => {
      expect(factory.create()).toBeInstanceOf(StoreAggregationStrategy);
    });

    it('should return a RecordSampleStrategy for "records"', () => {
      expect(factory.create('records')).toBeInstanceOf(RecordSampleStrategy);
    });

    it('should throw a 400 ValidationError for an unknown technique', () => {
      expect(() => factory.create('quantum')).toThrow(ValidationError);
      expect(() => factory.create('quantum')).toThrow('Unknown search technique: quantum');

      try {
        factory.create('quantum');
      } catch (err) {
        expect(err instanceof AppError && err.statusCode).toBe(400);
      }
    });
  });

  describe('StoreAggregationStrategy', () => {
    it('should return the store aggregate without records', async () => {
      const summary = {
        count: 7,
        minSalary: 50000,
        maxSalary: 90000,
        meanSalary: 70000,
        medianSalary: 71000,
        percentile25: 60000,
        percentile75: 80000,
      };
      mockRepo.aggregate.mockResolvedValue(summary);

      const result = await factory.create('store').execute(query);

      expect(mockRepo.aggregate).toHaveBeenCalledWith(query);
      expect(mockRepo.findMatches).not.toHaveBeenCalled();
      expect(result.summary).toEqual(summary);
      expect(result.records).toBeUndefined();
      expect(typeof result.meta?.queryTimeMs).toBe('number');
    });
  });

  describe('RecordSampleStrategy', () => {
    it('should summarize the returned records in process', async () => {
      mockRepo.findMatches.mockResolvedValue([
        record('Engineer', 90000, 'YEARLY', 'Austin', 'Texas'),
        record('Engineer', 50, 'HOURLY', 'Austin', 'Texas'),
      ]);

      const result = await factory.create('records').execute(query);

      expect(mockRepo.findMatches).toHaveBeenCalledWith({ ...query, limit: 3 });
      expect(mockRepo.aggregate).not.toHaveBeenCalled();
      expect(result.summary).toEqual({
        count: 2,
        minSalary: 90000,
        maxSalary: 104000,
        meanSalary: 97000,
        medianSalary: 97000,
        percentile25: 93500,
        percentile75: 100500,
      });
      expect(result.records).toHaveLength(2);
    });

    it('should drop the extra record and flag truncation when more matches exist', async () => {
      mockRepo.findMatches.mockResolvedValue([
        record('Engineer', 90000, 'YEARLY', 'Austin', null),
        record('Engineer', 95000, 'YEARLY', 'Austin', null),
        record('Engineer', 99000, 'YEARLY', 'Austin', null),
      ]);

      const result = await factory.create('records').execute(query);

      expect(result.truncated).toBe(true);
      expect(result.records?.map((r) => r.salaryAmount)).toEqual([90000, 95000]);
      expect(result.summary.count).toBe(2);
    });

    it('should not flag truncation when exactly the cap matches', async () => {
      mockRepo.findMatches.mockResolvedValue([
        record('Engineer', 90000, 'YEARLY', 'Austin', null),
        record('Engineer', 95000, 'YEARLY', 'Austin', null),
      ]);

      const result = await factory.create('records').execute(query);

      expect(result.truncated).toBe(false);
      expect(result.records).toHaveLength(2);
    });

    it('should not flag the result as truncated below the cap', async () => {
      mockRepo.findMatches.mockResolvedValue([record('Engineer', 90000, 'YEARLY', 'Austin', null)]);

      expect((await factory.create('records').execute(query)).truncated).toBe(false);
    });
  });
});
