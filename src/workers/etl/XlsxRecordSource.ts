/**
 * XLSX Record Source — streams rows out of the disclosure workbook
 * Layer: Workers (ETL)
 * Pattern: Adapter Pattern (implements IRawRecordSource)
 *
 * The disclosure workbook is hundreds of megabytes, so it is read with
 * ExcelJS's streaming WorkbookReader: rows are parsed as the zip entry is
 * inflated and never held all at once. The first row of the first worksheet
 * is the header; every later row becomes a RawRow keyed by header name.
 *
 * ExcelJS cell values come in many shapes (rich text runs, hyperlinks, formula
 * results, dates, error values). `toRawCell` folds them into the three-variant
 * RawCell the normalizer understands.
 */
import * as ExcelJS from 'exceljs';

import { ABSENT_CELL, numberCell, type RawCell, RawRow, textCell } from '@domain/entities/RawRow';
import type { IRawRecordSource } from '@domain/interfaces/IDataSourceAdapter';

export class XlsxRecordSource implements IRawRecordSource {
  constructor(private readonly filePath: string) {}

  async *rows(): AsyncGenerator<RawRow, void, undefined> {
    const workbook = new ExcelJS.stream.xlsx.WorkbookReader(this.filePath, {
      worksheets: 'emit',
      sharedStrings: 'cache',
      hyperlinks: 'ignore',
      styles: 'ignore',
    });

    for await (const worksheet of workbook) {
      let header: Map<number, string> | null = null;
      for await (const row of worksheet) {
        if (header === null) {
          header = readHeader(row);
          continue;
        }
        yield toRawRow(row, header);
      }
      // Only the first worksheet holds disclosures.
      break;
    }
  }
}

/** Column number → header name, for every non-blank header cell. */
export function readHeader(row: ExcelJS.Row): Map<number, string> {
  const header = new Map<number, string>();
  row.eachCell((cell, colNumber) => {
    const name = toRawCell(cell.value);
    if (name.kind === 'text' && name.value.trim()) header.set(colNumber, name.value.trim());
    if (name.kind === 'number') header.set(colNumber, String(name.value));
  });
  return header;
}

function toRawRow(row: ExcelJS.Row, header: Map<number, string>): RawRow {
  const cells: [string, RawCell][] = [];
  for (const [colNumber, name] of header) {
    cells.push([name, toRawCell(row.getCell(colNumber).value)]);
  }
  return new RawRow(cells);
}

export function toRawCell(value: ExcelJS.CellValue): RawCell {
  if (value === null || value === undefined) return ABSENT_CELL;
  if (typeof value === 'number') return Number.isFinite(value) ? numberCell(value) : ABSENT_CELL;
  if (typeof value === 'string') return textCell(value);
  if (typeof value === 'boolean') return textCell(String(value));
  if (value instanceof Date) return textCell(value.toISOString());
  if ('richText' in value) return textCell(value.richText.map((run) => run.text).join(''));
  if ('hyperlink' in value) return textCell(value.text);
  if ('result' in value) return toRawCell(value.result ?? null);
  return ABSENT_CELL;
}
