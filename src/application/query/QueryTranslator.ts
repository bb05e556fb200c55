/**
 * Query Translator — free text → store-neutral CompensationQuery
 * Layer: Application
 *
 * Title and location are simplified with the same rules used for the stored
 * title_terms / location_terms, split into words, de-duplicated and sorted.
 * "Software Engineer" and "engineer software" therefore translate to the same
 * query. An empty field yields no terms, which the store reads as "no
 * predicate on this field".
 *
 * Words are never rewritten: a stored location carries both the state name and
 * its abbreviation, so "Austin, TX" and "La Jolla" match as typed.
 */
import { TOKENS } from '@core/types';
import { toSearchTerms } from '@shared/text';
import type { CompensationQuery, CompensationSearchInput, SearchSettings } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class QueryTranslator {
  constructor(@inject(TOKENS.SearchSettings) private settings: SearchSettings) {}

  translate(input: CompensationSearchInput): CompensationQuery {
    const { maxResults, matchPolicy } = this.settings;
    return {
      titleTerms: toSearchTerms(input.title ?? ''),
      locationTerms: toSearchTerms(input.location ?? ''),
      matchPolicy,
      limit: Math.min(input.limit ?? maxResults, maxResults),
    };
  }
}

