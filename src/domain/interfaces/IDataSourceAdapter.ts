/**
 * Data Source Interfaces
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * IRawRecordSource is the far end of the ETL pipeline: anything that can hand
 * out rows of the disclosure table (an .xlsx stream, an in-memory fixture).
 * Each call to `rows()` starts again from the first row; a single iteration is
 * not seekable.
 *
 * IFieldNormalizer is the adapter that turns one raw row into the candidate
 * fields. It never throws: malformed cells become null.
 */
import type { CandidateFields } from '@domain/entities/CompensationRecord';
import type { RawRow } from '@domain/entities/RawRow';

export interface IRawRecordSource {
  rows(): AsyncIterable<RawRow> | Iterable<RawRow>;
}

export interface IFieldNormalizer<TRaw = RawRow> {
  normalize(raw: TRaw): CandidateFields;
}
