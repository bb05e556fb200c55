/**
 * RawRow — one untransformed row of the source workbook
 * Layer: Domain
 *
 * Cells are a tagged union instead of `string | number | null`, so "absent" is
 * a variant the normalizer switches on rather than a null check repeated at
 * every call site. Looking up a column the row does not have yields the absent
 * cell as well.
 */
export type RawCell =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'absent' };

export const ABSENT_CELL: RawCell = { kind: 'absent' };

export function textCell(value: string): RawCell {
  return { kind: 'text', value };
}

export function numberCell(value: number): RawCell {
  return { kind: 'number', value };
}

/** Scalars accepted by `RawRow.fromRecord` (fixtures, JSON exports). */
export type RawScalar = string | number | null | undefined;

export class RawRow {
  private readonly cells: ReadonlyMap<string, RawCell>;

  constructor(cells: Iterable<readonly [string, RawCell]>) {
    this.cells = new Map(cells);
  }

  static fromRecord(record: Record<string, RawScalar>): RawRow {
    return new RawRow(
      Object.entries(record).map(([column, value]): [string, RawCell] => [
        column,
        toCell(value),
      ]),
    );
  }

  get(column: string): RawCell {
    return this.cells.get(column) ?? ABSENT_CELL;
  }

  columns(): string[] {
    return [...this.cells.keys()];
  }
}

function toCell(value: RawScalar): RawCell {
  if (typeof value === 'number') return Number.isFinite(value) ? numberCell(value) : ABSENT_CELL;
  if (typeof value === 'string') return textCell(value);
  return ABSENT_CELL;
}
