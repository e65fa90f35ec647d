import { describe, expect, it } from 'vitest';
import { filterRecords, findLocationLabels, matchesAny, matchesDestination, matchesOrigin, normalizeQuery } from '../src/services/locationService';
import { fareTable } from './fixtures';

describe('matchesAny', () => {
  it('matches a case-insensitive substring of the city', () => {
    expect(matchesAny('  NEW york ', 'New York', 'JFK')).toBe(true);
    expect(matchesAny('york', 'New York', 'JFK')).toBe(true);
  });

  it('matches the airport code', () => {
    expect(matchesAny('jfk', 'New York', 'JFK')).toBe(true);
    expect(matchesAny('lga', 'New York', 'JFK')).toBe(false);
  });

  it('never matches a blank query', () => {
    expect(matchesAny('', 'Austin', 'AUS')).toBe(false);
    expect(matchesAny('   \t', 'Austin', 'AUS')).toBe(false);
  });

  it('treats pattern characters literally', () => {
    const city = 'St. Louis (Lambert)';
    expect(matchesAny('louis (lambert)', city, 'STL')).toBe(true);
    expect(matchesAny('st.', city, 'STL')).toBe(true);
    expect(matchesAny('(', city, 'STL')).toBe(true);
    expect(matchesAny('st.*louis', city, 'STL')).toBe(false);
    expect(matchesAny('s.', city, 'STL')).toBe(false);
    expect(matchesAny('[a-z]+', city, 'STL')).toBe(false);
    expect(matchesAny('\\', city, 'STL')).toBe(false);
  });
});

describe('record matching', () => {
  const table = fareTable([['Austin', 'Denver', 'AUS', 'DEN', 120]]);
  const [record] = table.records;

  it('applies the query to each side independently', () => {
    if (!record) throw new Error('fixture missing');
    expect(matchesOrigin('aus', record)).toBe(true);
    expect(matchesOrigin('den', record)).toBe(false);
    expect(matchesDestination('den', record)).toBe(true);
    expect(matchesDestination('austin', record)).toBe(false);
  });

  it('accepts an injected matcher', () => {
    if (!record) throw new Error('fixture missing');
    const exact = (query: string, city: string) => city.toLowerCase() === normalizeQuery(query);
    expect(matchesOrigin('aus', record, exact)).toBe(false);
    expect(matchesOrigin('Austin', record, exact)).toBe(true);
  });
});

describe('filterRecords', () => {
  const table = fareTable([
    ['Austin', 'Denver', 'AUS', 'DEN', 120],
    ['Denver', 'Austin', 'DEN', 'AUS', 130],
    ['Austin', 'Chicago', 'AUS', 'ORD', 80],
  ]);

  it('filters one side of the table', () => {
    expect(filterRecords(table, 'austin', 'origin').map((record) => record.lowFare)).toEqual([120, 80]);
    expect(filterRecords(table, 'austin', 'destination').map((record) => record.lowFare)).toEqual([130]);
    expect(filterRecords(table, ' ', 'origin')).toEqual([]);
  });
});

describe('findLocationLabels', () => {
  it('lists distinct labels from both sides of the table', () => {
    const table = fareTable([
      ['San Jose', 'Denver', 'SJC', 'DEN', 100],
      ['Denver', 'San Jose del Cabo', 'DEN', 'SJD', 220],
      ['San Jose', 'Austin', 'SJC', 'AUS', 140],
    ]);
    expect(findLocationLabels(table, 'san jose')).toEqual(['San Jose (SJC)', 'San Jose del Cabo (SJD)']);
    expect(findLocationLabels(table, 'boston')).toEqual([]);
  });
});
