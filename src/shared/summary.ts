import type { CompensationSummary } from './types';

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function emptySummary(): CompensationSummary {
  return {
    count: 0,
    minSalary: null,
    maxSalary: null,
    meanSalary: null,
    medianSalary: null,
    percentile25: null,
    percentile75: null,
  };
}
