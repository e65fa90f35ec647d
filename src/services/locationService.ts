import type { FareRecord, FareTable, LocationMatcher } from '../types';

export function normalizeQuery(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Case-insensitive, literal substring match of `query` against either field.
 * A blank query matches nothing. No pattern syntax is interpreted, so input such
 * as `st. louis (lambert)` only matches that exact text.
 */
export const matchesAny: LocationMatcher = (query, cityField, airportField) => {
  const needle = normalizeQuery(query);
  if (!needle) return false;
  return cityField.toLowerCase().includes(needle) || airportField.toLowerCase().includes(needle);
};

export function matchesOrigin(query: string, record: FareRecord, matcher: LocationMatcher = matchesAny): boolean {
  return matcher(query, record.originCity, record.originAirportCode);
}

export function matchesDestination(query: string, record: FareRecord, matcher: LocationMatcher = matchesAny): boolean {
  return matcher(query, record.destinationCity, record.destinationAirportCode);
}

export type FareSide = 'origin' | 'destination';

/** Records whose origin-side (or destination-side) city or airport matches `query`, in table order. */
export function filterRecords(
  table: FareTable,
  query: string,
  side: FareSide,
  matcher: LocationMatcher = matchesAny,
): FareRecord[] {
  const test = side === 'origin' ? matchesOrigin : matchesDestination;
  return table.records.filter((record) => test(query, record, matcher));
}

/** Distinct city and airport labels from either side of the table that `text` would match. */
export function findLocationLabels(table: FareTable, text: string, matcher: LocationMatcher = matchesAny): string[] {
  const labels = new Set<string>();
  for (const record of filterRecords(table, text, 'origin', matcher)) {
    labels.add(`${record.originCity} (${record.originAirportCode})`);
  }
  for (const record of filterRecords(table, text, 'destination', matcher)) {
    labels.add(`${record.destinationCity} (${record.destinationAirportCode})`);
  }
  return Array.from(labels);
}
