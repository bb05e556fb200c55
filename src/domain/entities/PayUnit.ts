/**
 * Pay Unit — the time basis a salary figure is reported against
 * Layer: Domain
 *
 * The closed set mirrors the units that appear in the disclosure workbook
 * ("Hour", "Week", "Bi-Weekly", "Month", "Year"). `parsePayUnit` also accepts
 * the adjective spellings so hand-made fixtures and other exports of the same
 * dataset normalize to the same value.
 *
 * Annualization is a plain multiplication by a per-unit factor. The factors and
 * the correction threshold come from configuration (PayUnitPolicy) so the
 * ingestion heuristic and the aggregation share one definition.
 */
export const PAY_UNITS = ['HOURLY', 'WEEKLY', 'BIWEEKLY', 'MONTHLY', 'YEARLY'] as const;

export type PayUnit = (typeof PAY_UNITS)[number];

export type AnnualizationFactors = Readonly<Record<PayUnit, number>>;

export interface PayUnitPolicy {
  /** Annualized value above which a non-yearly figure is re-labelled YEARLY. */
  readonly correctionThreshold: number;
  readonly factors: AnnualizationFactors;
}

const UNIT_ALIASES: Readonly<Record<string, PayUnit>> = {
  hour: 'HOURLY',
  hourly: 'HOURLY',
  hr: 'HOURLY',
  week: 'WEEKLY',
  weekly: 'WEEKLY',
  'bi-weekly': 'BIWEEKLY',
  biweekly: 'BIWEEKLY',
  'bi weekly': 'BIWEEKLY',
  month: 'MONTHLY',
  monthly: 'MONTHLY',
  year: 'YEARLY',
  yearly: 'YEARLY',
  annual: 'YEARLY',
  annually: 'YEARLY',
};

/** Unit label from the source (any case, surrounding whitespace allowed) → PayUnit, or null. */
export function parsePayUnit(value: string): PayUnit | null {
  const key = value.trim().toLowerCase().replace(/\s+/g, ' ');
  return UNIT_ALIASES[key] ?? null;
}

export function annualize(amount: number, unit: PayUnit, factors: AnnualizationFactors): number {
  return amount * factors[unit];
}
