/**
 * Disclosure Field Normalizer — RawRow → CandidateFields
 * Layer: Workers (ETL)
 * Pattern: Adapter Pattern (implements IFieldNormalizer<RawRow>)
 *
 * Pulls the five semantic fields out of one row of the wage-disclosure
 * workbook. It decides nothing about admissibility; it only reads, cleans and
 * reports "absent" (null) for anything it cannot read:
 *
 *   title   — trimmed text; blank and numeric cells are absent, as is text
 *             that is empty or all digits once punctuation is stripped
 *             ("1234.", "???").
 *   salary  — numeric cell, or text such as "85000", "$85,000.50"; must be > 0.
 *   unit    — "Hour" | "Week" | "Bi-Weekly" | "Month" | "Year" (any case).
 *   city    — trimmed text.
 *   state   — trimmed text; known two-letter abbreviations expand to the full
 *             name, unknown values pass through as they are.
 *
 * Only the first wage amount/unit columns are read. The workbook has numbered
 * alternates (…_2, …_3) but they are sparsely populated; reading them would
 * not materially change coverage on the dataset this was built against, and
 * may need revisiting for other exports of the same shape.
 */
import type { CandidateFields } from '@domain/entities/CompensationRecord';
import { parsePayUnit, type PayUnit } from '@domain/entities/PayUnit';
import type { RawCell, RawRow } from '@domain/entities/RawRow';
import type { IFieldNormalizer } from '@domain/interfaces/IDataSourceAdapter';
import { expandStateName } from '@shared/constants';
import { simplifyText } from '@shared/text';

/** Names of the workbook columns the normalizer reads. */
export interface DisclosureColumns {
  title: string;
  city: string;
  state: string;
  wageAmount: string;
  wageUnit: string;
}

export class DisclosureFieldNormalizer implements IFieldNormalizer<RawRow> {
  constructor(private readonly columns: DisclosureColumns) {}

  normalize(raw: RawRow): CandidateFields {
    const state = readText(raw.get(this.columns.state));
    return {
      title: readTitle(raw.get(this.columns.title)),
      salaryAmount: readAmount(raw.get(this.columns.wageAmount)),
      payUnit: readPayUnit(raw.get(this.columns.wageUnit)),
      city: readText(raw.get(this.columns.city)),
      state: state === null ? null : expandStateName(state),
    };
  }
}

function readText(cell: RawCell): string | null {
  if (cell.kind !== 'text') return null;
  const value = cell.value.trim();
  return value.length > 0 ? value : null;
}

function readTitle(cell: RawCell): string | null {
  const title = readText(cell);
  if (title === null) return null;
  const searchable = simplifyText(title);
  if (searchable === '' || /^[\d ]+$/.test(searchable)) return null;
  return title;
}

const AMOUNT_PATTERN = /^(\d+\.?\d*|\.\d+)$/;

function readAmount(cell: RawCell): number | null {
  switch (cell.kind) {
    case 'number':
      return Number.isFinite(cell.value) && cell.value > 0 ? cell.value : null;
    case 'text': {
      const cleaned = cell.value.trim().replace(/^\$\s*/, '').replace(/,/g, '');
      if (!AMOUNT_PATTERN.test(cleaned)) return null;
      const amount = Number(cleaned);
      return Number.isFinite(amount) && amount > 0 ? amount : null;
    }
    case 'absent':
      return null;
  }
}

function readPayUnit(cell: RawCell): PayUnit | null {
  return cell.kind === 'text' ? parsePayUnit(cell.value) : null;
}
