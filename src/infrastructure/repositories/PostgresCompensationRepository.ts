/**
 * PostgreSQL Compensation Repository — Search Index Implementation
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements ICompensationRepository)
 *
 * Title and location are searched independently through two tsvector columns
 * (maintained by the trigger from migration 002, GIN-indexed). Each query word
 * becomes its own plainto_tsquery('simple', ?) so the user's word order never
 * matters:
 *
 *   all:  title_vector @@ (plainto_tsquery(..'senior') && plainto_tsquery(..'audit'))
 *   any:  title_vector @@ (plainto_tsquery(..'senior') || plainto_tsquery(..'audit'))
 *
 * A field with no words adds no predicate. Under `any`, findMatches ranks by
 * the summed ts_rank of both fields so records matching more words come first.
 *
 * aggregate() computes the statistics in SQL over every matching row, with the
 * annualization factors bound into a CASE expression. findMatches() returns at
 * most `query.limit` rows.
 *
 * withIngestionLock() holds a transaction-scoped advisory lock for the length
 * of a load, so cluster workers and the seed script never load concurrently.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  type CompensationRecord,
  type CompensationRow,
  createCompensationRecord,
} from '@domain/entities/CompensationRecord';
import { type AnnualizationFactors, PAY_UNITS, type PayUnitPolicy } from '@domain/entities/PayUnit';
import type { ICompensationRepository } from '@domain/interfaces/ICompensationRepository';
import { locationSearchText } from '@shared/constants';
import { ConflictError } from '@shared/errors/AppError';
import { emptySummary, roundCurrency } from '@shared/summary';
import { simplifyText } from '@shared/text';
import type { CompensationQuery, CompensationSummary, MatchPolicy } from '@shared/types';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

export const COMPENSATION_TABLE = 'compensation_records';

/** pg_advisory_xact_lock key shared by every process that loads the store. */
export const INGESTION_LOCK_KEY = 727_001;

/** PostgreSQL max bind parameters per query. */
const PG_MAX_BIND_PARAMS = 65535;
/** Bound columns per compensation_records insert. */
const INSERT_COLS = 7;
/** Smaller than the bind-param ceiling so each INSERT finishes quickly over the network. */
const MAX_ROWS_PER_INSERT = Math.min(1000, Math.floor((PG_MAX_BIND_PARAMS - 1) / INSERT_COLS));

interface StoredRow extends CompensationRow {
  id: number;
}

/** Column aliases produced by aggregate(); pg returns numbers or numeric strings. */
interface AggregateRow {
  count: number | string | null;
  min_salary: number | string | null;
  max_salary: number | string | null;
  mean_salary: number | string | null;
  median_salary: number | string | null;
  percentile_25: number | string | null;
  percentile_75: number | string | null;
}

export interface SqlFragment {
  sql: string;
  bindings: (string | number)[];
}

@injectable()
export class PostgresCompensationRepository implements ICompensationRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.PayUnitPolicy) private policy: PayUnitPolicy,
  ) {}

  async bulkInsert(records: readonly CompensationRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const rows = records.map(toCompensationRow);
    await this.db.transaction(async (trx) => {
      for (let i = 0; i < rows.length; i += MAX_ROWS_PER_INSERT) {
        await trx(COMPENSATION_TABLE).insert(rows.slice(i, i + MAX_ROWS_PER_INSERT));
      }
    });

    this.log.debug({ count: rows.length }, 'bulkInsert complete');
    return rows.length;
  }

  async count(): Promise<number> {
    const row: { total?: number | string } | undefined = await this.db(COMPENSATION_TABLE)
      .count({ total: '*' })
      .first();
    return Number(row?.total ?? 0);
  }

  async clear(): Promise<void> {
    await this.db(COMPENSATION_TABLE).truncate();
    this.log.info('compensation_records truncated');
  }

  async aggregate(query: CompensationQuery): Promise<CompensationSummary> {
    const annual = annualizedSalaryExpression(this.policy.factors);
    const matches = this.buildMatchQuery(query)
      .select(this.db.raw(`${annual.sql} AS annual_salary`, annual.bindings))
      .as('matches');

    const row: AggregateRow | undefined = await this.db
      .from(matches)
      .select(
        this.db.raw('COUNT(*)::int AS count'),
        this.db.raw('MIN(annual_salary) AS min_salary'),
        this.db.raw('MAX(annual_salary) AS max_salary'),
        this.db.raw('AVG(annual_salary) AS mean_salary'),
        this.db.raw('PERCENTILE_CONT(0.5) WITHIN GROUP (ORDER BY annual_salary) AS median_salary'),
        this.db.raw('PERCENTILE_CONT(0.25) WITHIN GROUP (ORDER BY annual_salary) AS percentile_25'),
        this.db.raw('PERCENTILE_CONT(0.75) WITHIN GROUP (ORDER BY annual_salary) AS percentile_75'),
      )
      .first();

    return toSummary(row);
  }

  async findMatches(query: CompensationQuery): Promise<CompensationRecord[]> {
    const qb = this.buildMatchQuery(query)
      .select('id', 'job_title', 'salary_amount', 'pay_unit', 'city', 'state')
      .limit(query.limit);

    const rank = rankExpression(query);
    if (rank) qb.orderByRaw(`${rank.sql} DESC`, rank.bindings);
    qb.orderBy('job_title', 'asc').orderBy('id', 'asc');

    const rows: StoredRow[] = await qb;
    return rows.map(toDomain);
  }

  async withIngestionLock<T>(work: () => Promise<T>): Promise<T> {
    return this.db.transaction(async (trx) => {
      const result: { rows: { locked: boolean }[] } = await trx.raw(
        'SELECT pg_try_advisory_xact_lock(?) AS locked',
        [INGESTION_LOCK_KEY],
      );
      if (!result.rows[0]?.locked) {
        throw new ConflictError('Another ingestion is already loading the compensation store');
      }
      this.log.debug({ key: INGESTION_LOCK_KEY }, 'Ingestion lock acquired');
      return work();
    });
  }

  private buildMatchQuery(query: CompensationQuery): Knex.QueryBuilder {
    const qb = this.db(COMPENSATION_TABLE);
    if (query.titleTerms.length > 0) {
      qb.whereRaw(
        `title_vector @@ ${tsQueryExpression(query.titleTerms.length, query.matchPolicy)}`,
        query.titleTerms,
      );
    }
    if (query.locationTerms.length > 0) {
      qb.whereRaw(
        `location_vector @@ ${tsQueryExpression(query.locationTerms.length, query.matchPolicy)}`,
        query.locationTerms,
      );
    }
    return qb;
  }
}

/** `(plainto_tsquery('simple', ?) && …)` with one placeholder per word; `||` under `any`. */
export function tsQueryExpression(termCount: number, policy: MatchPolicy): string {
  const operator = policy === 'all' ? ' && ' : ' || ';
  const parts = Array.from({ length: termCount }, () => "plainto_tsquery('simple', ?)");
  return `(${parts.join(operator)})`;
}

/** CASE expression turning salary_amount into its yearly equivalent with bound factors. */
export function annualizedSalaryExpression(factors: AnnualizationFactors): SqlFragment {
  const whens = PAY_UNITS.map(() => 'WHEN ? THEN salary_amount * ?').join(' ');
  const bindings = PAY_UNITS.flatMap((unit): (string | number)[] => [unit, factors[unit]]);
  return { sql: `(CASE pay_unit ${whens} ELSE salary_amount END)`, bindings };
}

/** Summed ts_rank over the non-empty fields; only used to order partial matches. */
export function rankExpression(query: CompensationQuery): SqlFragment | null {
  if (query.matchPolicy !== 'any') return null;
  const parts: string[] = [];
  const bindings: string[] = [];
  if (query.titleTerms.length > 0) {
    parts.push(`ts_rank(title_vector, ${tsQueryExpression(query.titleTerms.length, 'any')})`);
    bindings.push(...query.titleTerms);
  }
  if (query.locationTerms.length > 0) {
    parts.push(`ts_rank(location_vector, ${tsQueryExpression(query.locationTerms.length, 'any')})`);
    bindings.push(...query.locationTerms);
  }
  return parts.length > 0 ? { sql: `(${parts.join(' + ')})`, bindings } : null;
}

export function toCompensationRow(record: CompensationRecord): CompensationRow {
  return {
    job_title: record.title,
    salary_amount: record.salaryAmount,
    pay_unit: record.payUnit,
    city: record.city,
    state: record.state,
    title_terms: simplifyText(record.title),
    location_terms: locationSearchText(record.city, record.state),
  };
}

function toDomain(row: StoredRow): CompensationRecord {
  return createCompensationRecord({
    title: row.job_title,
    salaryAmount: Number(row.salary_amount),
    payUnit: row.pay_unit,
    city: row.city ?? null,
    state: row.state ?? null,
  });
}

function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toSummary(row: AggregateRow | undefined): CompensationSummary {
  const count = toNumber(row?.count) ?? 0;
  if (!row || count === 0) return emptySummary();

  const money = (value: number | string | null): number | null => {
    const parsed = toNumber(value);
    return parsed === null ? null : roundCurrency(parsed);
  };

  return {
    count,
    minSalary: money(row.min_salary),
    maxSalary: money(row.max_salary),
    meanSalary: money(row.mean_salary),
    medianSalary: money(row.median_salary),
    percentile25: money(row.percentile_25),
    percentile75: money(row.percentile_75),
  };
}
