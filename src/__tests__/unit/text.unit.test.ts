/**
 * Unit Tests — search text simplification and state names
 */
import { expandStateName, locationSearchText, stateCodeFor } from '@shared/constants';
import { simplifyText, toSearchTerms } from '@shared/text';

describe('simplifyText', () => {
  it('should fold accents, drop punctuation, collapse whitespace and lower-case', () => {
    expect(simplifyText('  Café  Manager, Sr. ')).toBe('cafe manager sr');
  });

  it('should delete punctuation and symbols in place rather than splitting on them', () => {
    expect(simplifyText('new. york,')).toBe('new york');
    expect(simplifyText('.JAVA$?')).toBe('java');
    expect(simplifyText('Bi-Weekly')).toBe('biweekly');
  });

  it('should return an empty string for blank or punctuation-only input', () => {
    expect(simplifyText('   ')).toBe('');
    expect(simplifyText('?!')).toBe('');
  });
});

describe('toSearchTerms', () => {
  it('should return distinct sorted words', () => {
    expect(toSearchTerms('Software engineer SOFTWARE')).toEqual(['engineer', 'software']);
  });

  it('should be insensitive to word order', () => {
    expect(toSearchTerms('senior data analyst')).toEqual(toSearchTerms('Analyst, Data (Senior)'));
  });

  it('should return no terms for empty input', () => {
    expect(toSearchTerms('')).toEqual([]);
  });
});

describe('expandStateName', () => {
  it('should expand known abbreviations in any case', () => {
    expect(expandStateName('TX')).toBe('Texas');
    expect(expandStateName('ny')).toBe('New York');
    expect(expandStateName('PR')).toBe('Puerto Rico');
    expect(expandStateName('DC')).toBe('District of Columbia');
  });

  it('should pass unknown codes and full names through unchanged', () => {
    expect(expandStateName('ZZ')).toBe('ZZ');
    expect(expandStateName('Texas')).toBe('Texas');
  });
});

describe('stateCodeFor', () => {
  it('should find the abbreviation of a full name in any case', () => {
    expect(stateCodeFor('Texas')).toBe('TX');
    expect(stateCodeFor('new york')).toBe('NY');
  });

  it('should return null for names it does not know', () => {
    expect(stateCodeFor('Ontario')).toBeNull();
    expect(stateCodeFor('TX')).toBeNull();
  });
});

describe('locationSearchText', () => {
  it('should store the state abbreviation beside the name', () => {
    expect(locationSearchText('La Jolla', 'California')).toBe('la jolla california ca');
  });

  it('should leave out missing parts and unknown states', () => {
    expect(locationSearchText(null, 'New Jersey')).toBe('new jersey nj');
    expect(locationSearchText('Toronto', 'Ontario')).toBe('toronto ontario');
    expect(locationSearchText('Austin', null)).toBe('austin');
  });
});
