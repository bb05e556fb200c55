/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Request/response shapes that no single layer owns. The controller builds a
 * CompensationSearchInput, the QueryTranslator turns it into a
 * CompensationQuery, and strategies answer with a CompensationSearchResult.
 * IngestionResult is what the ETL worker reports for both the HTTP ingest
 * endpoint and the seed script.
 */
import type { CompensationRecord } from '@domain/entities/CompensationRecord';
import type { RejectionTally } from '@domain/entities/Rejection';

import type { SEARCH_TECHNIQUES } from './constants';

export type MatchPolicy = 'all' | 'any';

export type SearchTechnique = (typeof SEARCH_TECHNIQUES)[number];

export interface SearchSettings {
  maxResults: number;
  matchPolicy: MatchPolicy;
}

/** Raw user input: two free-text fields plus optional technique and record cap. */
export interface CompensationSearchInput {
  title?: string;
  location?: string;
  technique?: SearchTechnique;
  limit?: number;
}

/** Store-neutral, order-insensitive query produced by the QueryTranslator. */
export interface CompensationQuery {
  /** Distinct, sorted words every (or, under `any`, some) record title must contain. */
  titleTerms: string[];
  /** Distinct, sorted words matched against the combined "city state" text. */
  locationTerms: string[];
  matchPolicy: MatchPolicy;
  /** Cap on records returned by findMatches. */
  limit: number;
}

/** Annualized salary statistics; every statistic is null when count is 0. */
export interface CompensationSummary {
  count: number;
  minSalary: number | null;
  maxSalary: number | null;
  meanSalary: number | null;
  medianSalary: number | null;
  percentile25: number | null;
  percentile75: number | null;
}

/** Timing metadata returned with search responses. */
export interface SearchResultMeta {
  /** Wall-clock time from request arrival to response sent (ms). */
  totalTimeMs?: number;
  /** Time spent in the store (ms). */
  queryTimeMs?: number;
}

export interface CompensationSearchResult {
  summary: CompensationSummary;
  /** Present for the `records` technique: the capped, ranked matches that were summarized. */
  records?: CompensationRecord[];
  /** True when more records matched than the cap let through, so the summary covers a sample. */
  truncated?: boolean;
  meta?: SearchResultMeta;
}

export interface IngestionResult {
  totalProcessed: number;
  totalInserted: number;
  totalRejected: number;
  rejections: RejectionTally;
  durationMs: number;
}
