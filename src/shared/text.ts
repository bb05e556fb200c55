/**
 * Search text simplification, shared by ingestion (title_terms /
 * location_terms columns) and query translation so both sides tokenize alike.
 *
 * Accents are folded, punctuation and symbols are deleted in place
 * ("new. york," → "new york", ".JAVA$?" → "java"), whitespace collapses and
 * everything is lower-cased.
 */
const COMBINING_MARKS = /\p{M}/gu;
const PUNCTUATION_AND_SYMBOLS = /[\p{P}\p{S}]/gu;

export function simplifyText(text: string): string {
  return text
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .replace(PUNCTUATION_AND_SYMBOLS, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ')
    .toLowerCase();
}

/** Distinct words of the simplified text, sorted so word order never matters. */
export function toSearchTerms(text: string): string[] {
  const words = simplifyText(text).split(' ').filter(Boolean);
  return [...new Set(words)].sort();
}
