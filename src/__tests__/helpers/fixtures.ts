/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Shared rows, records and settings so tests don't rebuild the same objects.
 * Column names match the workbook defaults; every person, place and figure is
 * made up.
 */
import {
  type CompensationRecord,
  createCompensationRecord,
} from '@domain/entities/CompensationRecord';
import type { PayUnitPolicy } from '@domain/entities/PayUnit';
import { RawRow, type RawScalar } from '@domain/entities/RawRow';
import type { SearchSettings } from '@shared/types';
import type { DisclosureColumns } from '@workers/etl/DisclosureFieldNormalizer';
import pino from 'pino';

export const silentLogger = pino({ level: 'silent' });

export const testPayUnitPolicy: PayUnitPolicy = {
  correctionThreshold: 10_000_000,
  factors: { HOURLY: 2080, WEEKLY: 52, BIWEEKLY: 26, MONTHLY: 12, YEARLY: 1 },
};

export const testSearchSettings: SearchSettings = { maxResults: 100, matchPolicy: 'all' };

export const testColumns: DisclosureColumns = {
  title: 'JOB_TITLE',
  city: 'WORKSITE_CITY_1',
  state: 'WORKSITE_STATE_1',
  wageAmount: 'WAGE_RATE_OF_PAY_FROM_1',
  wageUnit: 'WAGE_UNIT_OF_PAY_1',
};

/** One workbook row; pass `undefined` for a column to leave it out entirely. */
export function sampleRow(overrides: Record<string, RawScalar> = {}): RawRow {
  return RawRow.fromRecord({
    JOB_TITLE: 'Software Engineer',
    WORKSITE_CITY_1: 'Austin',
    WORKSITE_STATE_1: 'TX',
    WAGE_RATE_OF_PAY_FROM_1: 120000,
    WAGE_UNIT_OF_PAY_1: 'Year',
    EMPLOYER_NAME: 'Example Widgets LLC',
    ...overrides,
  });
}

export function record(
  title: string,
  salaryAmount: number,
  payUnit: CompensationRecord['payUnit'],
  city: string | null,
  state: string | null,
): CompensationRecord {
  return createCompensationRecord({ title, salaryAmount, payUnit, city, state });
}

/** Small catalogue used by the in-memory repository tests and HTTP tests. */
export const sampleRecords: CompensationRecord[] = [
  record('Software Engineer', 100000, 'YEARLY', 'Austin', 'Texas'),
  record('Senior Software Engineer', 150000, 'YEARLY', 'Austin', 'Texas'),
  record('Software Engineer', 50, 'HOURLY', 'Seattle', 'Washington'),
  record('Data Analyst', 6000, 'MONTHLY', 'Austin', 'Texas'),
  record('Accountant', 1500, 'WEEKLY', null, 'New York'),
];
