/**
 * Record Validator — CandidateFields → CompensationRecord | RejectionReason
 * Layer: Workers (ETL)
 *
 * Rules run in order and stop at the first failure:
 *   1. no title                          → MISSING_TITLE
 *   2. no salary, or no recognised unit  → MISSING_OR_INVALID_SALARY
 *   3. neither city nor state            → MISSING_LOCATION
 *   4. unit correction (below)
 *   5. build the frozen record
 *
 * Unit correction: the source often labels an annual figure as hourly or
 * weekly, which annualizes to an absurd number. When a non-yearly amount
 * annualizes above the configured threshold the unit becomes YEARLY and the
 * amount is kept as reported. This is a best-effort heuristic; nothing else is
 * corrected.
 */
import {
  type CandidateFields,
  createCompensationRecord,
} from '@domain/entities/CompensationRecord';
import { annualize, type PayUnit, type PayUnitPolicy } from '@domain/entities/PayUnit';
import type { ValidationOutcome } from '@domain/entities/Rejection';

export class RecordValidator {
  constructor(private readonly policy: PayUnitPolicy) {}

  validate(candidate: CandidateFields): ValidationOutcome {
    const { title, salaryAmount, payUnit, city, state } = candidate;

    if (!isPresent(title)) return { ok: false, reason: 'MISSING_TITLE' };

    if (salaryAmount === null || !(salaryAmount > 0) || payUnit === null) {
      return { ok: false, reason: 'MISSING_OR_INVALID_SALARY' };
    }

    if (!isPresent(city) && !isPresent(state)) return { ok: false, reason: 'MISSING_LOCATION' };

    return {
      ok: true,
      record: createCompensationRecord({
        title,
        salaryAmount,
        payUnit: this.correctPayUnit(salaryAmount, payUnit),
        city: isPresent(city) ? city : null,
        state: isPresent(state) ? state : null,
      }),
    };
  }

  /** YEARLY when a non-yearly amount annualizes above the threshold; otherwise the unit as given. */
  correctPayUnit(salaryAmount: number, payUnit: PayUnit): PayUnit {
    if (payUnit === 'YEARLY') return payUnit;
    const annual = annualize(salaryAmount, payUnit, this.policy.factors);
    return annual > this.policy.correctionThreshold ? 'YEARLY' : payUnit;
  }
}

function isPresent(value: string | null): value is string {
  return value !== null && value.trim().length > 0;
}
