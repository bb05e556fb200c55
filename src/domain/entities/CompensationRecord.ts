/**
 * CompensationRecord — The Canonical Wage/Location Record
 * Layer: Domain
 *
 * Three shapes of the same concept live here:
 *
 *   CandidateFields     — what the field normalizer could extract from a raw
 *                         row; every field may be null ("absent").
 *   CompensationRecord  — camelCase, validated and frozen. Only the record
 *                         validator creates these (via createCompensationRecord).
 *   CompensationRow     — snake_case, mirrors the `compensation_records` table.
 *                         The mapping happens in the repository.
 *
 * A record is immutable once built: unit correction happens before
 * construction, never after.
 */
import type { PayUnit } from './PayUnit';

export interface CandidateFields {
  title: string | null;
  salaryAmount: number | null;
  payUnit: PayUnit | null;
  city: string | null;
  state: string | null;
}

export interface CompensationRecord {
  readonly title: string;
  readonly salaryAmount: number;
  readonly payUnit: PayUnit;
  readonly city: string | null;
  readonly state: string | null;
}

export interface CompensationRow {
  job_title: string;
  salary_amount: number;
  pay_unit: PayUnit;
  city: string | null;
  state: string | null;
  /** Search-simplified title text; the DB trigger derives title_vector from it. */
  title_terms: string;
  /** Search-simplified "city state" text; the DB trigger derives location_vector from it. */
  location_terms: string;
}

export function createCompensationRecord(fields: CompensationRecord): CompensationRecord {
  return Object.freeze({
    title: fields.title,
    salaryAmount: fields.salaryAmount,
    payUnit: fields.payUnit,
    city: fields.city,
    state: fields.state,
  });
}
