/**
 * Result Aggregator — in-process annualized statistics
 * Layer: Application
 *
 * Used by the `records` technique, where the store hands back the matching
 * records and the statistics are computed here. Salaries are annualized with
 * the configured factors, so the numbers line up with what the store computes
 * in SQL for the `store` technique.
 *
 * Percentiles interpolate linearly between the closest ranks, which is what
 * PostgreSQL's percentile_cont does. All values are rounded to cents.
 */
import { TOKENS } from '@core/types';
import type { CompensationRecord } from '@domain/entities/CompensationRecord';
import { annualize, type PayUnitPolicy } from '@domain/entities/PayUnit';
import { emptySummary, roundCurrency } from '@shared/summary';
import type { CompensationSummary } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class ResultAggregator {
  constructor(@inject(TOKENS.PayUnitPolicy) private policy: PayUnitPolicy) {}

  summarize(records: readonly CompensationRecord[]): CompensationSummary {
    if (records.length === 0) return emptySummary();

    const annual = records
      .map((record) => annualize(record.salaryAmount, record.payUnit, this.policy.factors))
      .sort((a, b) => a - b);
    const total = annual.reduce((sum, value) => sum + value, 0);

    return {
      count: annual.length,
      minSalary: roundCurrency(annual[0]),
      maxSalary: roundCurrency(annual[annual.length - 1]),
      meanSalary: roundCurrency(total / annual.length),
      medianSalary: roundCurrency(percentile(annual, 0.5)),
      percentile25: roundCurrency(percentile(annual, 0.25)),
      percentile75: roundCurrency(percentile(annual, 0.75)),
    };
  }
}

/** Continuous percentile of an ascending, non-empty array; `fraction` in [0, 1]. */
export function percentile(sorted: readonly number[], fraction: number): number {
  const position = fraction * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}
