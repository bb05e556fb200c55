/**
 * Row rejection reasons and the per-run tally.
 * Layer: Domain
 *
 * A rejected row is expected, counted and dropped; it is never thrown. The
 * tally is a plain value created per pipeline run and handed to whoever started
 * the run.
 */
import type { CompensationRecord } from './CompensationRecord';

export const REJECTION_REASONS = [
  'MISSING_TITLE',
  'MISSING_OR_INVALID_SALARY',
  'MISSING_LOCATION',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type RejectionTally = Record<RejectionReason, number>;

export type ValidationOutcome =
  | { ok: true; record: CompensationRecord }
  | { ok: false; reason: RejectionReason };

export function createRejectionTally(): RejectionTally {
  return {
    MISSING_TITLE: 0,
    MISSING_OR_INVALID_SALARY: 0,
    MISSING_LOCATION: 0,
  };
}

export function totalRejected(tally: RejectionTally): number {
  return REJECTION_REASONS.reduce((sum, reason) => sum + tally[reason], 0);
}
