import usStates from './data/us-states.json';
import { simplifyText } from './text';

/** Two-letter postal abbreviation → full state or territory name. */
export const US_STATES: Readonly<Record<string, string>> = usStates;

const STATE_CODES: ReadonlyMap<string, string> = new Map(
  Object.entries(US_STATES).map(([code, name]) => [name.toLowerCase(), code]),
);

/** Expands a known two-letter abbreviation (any case); anything else is returned unchanged. */
export function expandStateName(value: string): string {
  if (value.length !== 2) return value;
  return US_STATES[value.toUpperCase()] ?? value;
}

/** Two-letter abbreviation of a full state or territory name (any case), or null. */
export function stateCodeFor(name: string): string | null {
  return STATE_CODES.get(name.trim().toLowerCase()) ?? null;
}

/**
 * Searchable location text: city, state, and the state's abbreviation when it
 * has one, so "austin tx" and "austin texas" both find "Austin, Texas".
 * Query words are never rewritten; the code is stored alongside the name.
 */
export function locationSearchText(city: string | null, state: string | null): string {
  const code = state === null ? null : stateCodeFor(state);
  return simplifyText([city, state, code].filter((part) => part !== null).join(' '));
}

export const SEARCH_TECHNIQUES = ['store', 'records'] as const;

export const DEFAULT_TECHNIQUE = 'store';
