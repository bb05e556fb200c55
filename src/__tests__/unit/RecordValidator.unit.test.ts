/**
 * Unit Tests — RecordValidator
 *
 * Rules are ordered and short-circuit: title, then salary/unit, then
 * location. Unit correction only ever relabels a non-yearly unit as YEARLY.
 */
import type { CandidateFields } from '@domain/entities/CompensationRecord';
import { RecordValidator } from '@workers/etl/recordValidator';

import { testPayUnitPolicy } from '../helpers/fixtures';

const complete: CandidateFields = {
  title: 'Software Engineer',
  salaryAmount: 45,
  payUnit: 'HOURLY',
  city: 'Austin',
  state: 'Texas',
};

describe('RecordValidator', () => {
  const validator = new RecordValidator(testPayUnitPolicy);

  it('should accept a complete candidate as a frozen record', () => {
    const outcome = validator.validate(complete);

    expect(outcome).toEqual({
      ok: true,
      record: {
        title: 'Software Engineer',
        salaryAmount: 45,
        payUnit: 'HOURLY',
        city: 'Austin',
        state: 'Texas',
      },
    });
    if (outcome.ok) expect(Object.isFrozen(outcome.record)).toBe(true);
  });

  it('should reject a missing title first, even when everything else is missing', () => {
    const outcome = validator.validate({
      title: null,
      salaryAmount: null,
      payUnit: null,
      city: null,
      state: null,
    });

    expect(outcome).toEqual({ ok: false, reason: 'MISSING_TITLE' });
  });

  it('should reject a blank title', () => {
    expect(validator.validate({ ...complete, title: '   ' })).toEqual({
      ok: false,
      reason: 'MISSING_TITLE',
    });
  });

  it('should reject a missing salary before a missing location', () => {
    const outcome = validator.validate({ ...complete, salaryAmount: null, city: null, state: null });

    expect(outcome).toEqual({ ok: false, reason: 'MISSING_OR_INVALID_SALARY' });
  });

  it('should reject a salary without a unit', () => {
    expect(validator.validate({ ...complete, payUnit: null })).toEqual({
      ok: false,
      reason: 'MISSING_OR_INVALID_SALARY',
    });
  });

  it('should reject a non-positive salary', () => {
    expect(validator.validate({ ...complete, salaryAmount: 0 })).toEqual({
      ok: false,
      reason: 'MISSING_OR_INVALID_SALARY',
    });
  });

  it('should reject a record with neither city nor state', () => {
    expect(validator.validate({ ...complete, city: ' ', state: null })).toEqual({
      ok: false,
      reason: 'MISSING_LOCATION',
    });
  });

  it('should accept a record with only a state', () => {
    const outcome = validator.validate({ ...complete, city: null });

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.record.city).toBeNull();
      expect(outcome.record.state).toBe('Texas');
    }
  });

  describe('unit correction', () => {
    it('should relabel an hourly figure that annualizes above the threshold as YEARLY', () => {
      const outcome = validator.validate({ ...complete, salaryAmount: 500000 });

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.record.payUnit).toBe('YEARLY');
        expect(outcome.record.salaryAmount).toBe(500000);
      }
    });

    it('should keep a plausible hourly figure as HOURLY', () => {
      const outcome = validator.validate(complete);

      expect(outcome.ok && outcome.record.payUnit).toBe('HOURLY');
    });

    it('should relabel a weekly figure above the threshold', () => {
      // 200000 × 52 = 10,400,000
      expect(validator.correctPayUnit(200000, 'WEEKLY')).toBe('YEARLY');
    });

    it('should not relabel a value exactly at the threshold', () => {
      const strict = new RecordValidator({ ...testPayUnitPolicy, correctionThreshold: 2_080_000 });

      expect(strict.correctPayUnit(1000, 'HOURLY')).toBe('HOURLY');
      expect(strict.correctPayUnit(1000.5, 'HOURLY')).toBe('YEARLY');
    });

    it('should never relabel a YEARLY figure', () => {
      expect(validator.correctPayUnit(50_000_000, 'YEARLY')).toBe('YEARLY');
    });
  });
});
