import type { FareRecord, FareTable, LocationMatcher, RouteFound, RouteNotFound, RouteResult, RouteSearchOptions } from '../types';
import { logInfo } from '../utils/log';
import { roundCurrency } from '../utils/format';
import { matchesAny, matchesDestination, matchesOrigin, normalizeQuery } from './locationService';

export const NO_ROUTE = Object.freeze<RouteNotFound>({
  found: false,
  totalFare: null,
  stops: [],
  hasConnection: false,
  legs: [],
});

export function findDirectFares(
  table: FareTable,
  source: string,
  destination: string,
  matcher: LocationMatcher = matchesAny,
): FareRecord[] {
  return table.records.filter(
    (record) => matchesOrigin(source, record, matcher) && matchesDestination(destination, record, matcher),
  );
}

/** Cheapest direct record; ties go to the earliest row in table order. */
export function cheapestDirectFare(
  table: FareTable,
  source: string,
  destination: string,
  matcher: LocationMatcher = matchesAny,
): FareRecord | null {
  let best: FareRecord | null = null;
  for (const record of findDirectFares(table, source, destination, matcher)) {
    if (!best || record.lowFare < best.lowFare) best = record;
  }
  return best;
}

function buildRoute(stops: string[], legs: FareRecord[]): RouteFound {
  return {
    found: true,
    totalFare: roundCurrency(legs.reduce((sum, leg) => sum + leg.lowFare, 0)),
    stops,
    hasConnection: stops.length > 0,
    legs,
  };
}

export function candidateStops(table: FareTable, source: string, destination: string): string[] {
  const excluded = new Set([normalizeQuery(source), normalizeQuery(destination)]);
  return table.originCities.filter((city) => !excluded.has(city));
}

function findOneStop(
  table: FareTable,
  source: string,
  destination: string,
  candidates: string[],
  matcher: LocationMatcher,
): RouteFound | null {
  for (const stop of candidates) {
    const first = cheapestDirectFare(table, source, stop, matcher);
    if (!first) continue;
    const second = cheapestDirectFare(table, stop, destination, matcher);
    if (!second) continue;
    return buildRoute([stop], [first, second]);
  }
  return null;
}

function findTwoStop(
  table: FareTable,
  source: string,
  destination: string,
  candidates: string[],
  matcher: LocationMatcher,
): RouteFound | null {
  const outbound = new Map<string, FareRecord>();
  const inbound = new Map<string, FareRecord>();
  for (const stop of candidates) {
    const first = cheapestDirectFare(table, source, stop, matcher);
    if (first) outbound.set(stop, first);
    const last = cheapestDirectFare(table, stop, destination, matcher);
    if (last) inbound.set(stop, last);
  }

  for (const firstStop of candidates) {
    const first = outbound.get(firstStop);
    if (!first) continue;
    for (const secondStop of candidates) {
      if (secondStop === firstStop) continue;
      const last = inbound.get(secondStop);
      if (!last) continue;
      const middle = cheapestDirectFare(table, firstStop, secondStop, matcher);
      if (!middle) continue;
      return buildRoute([firstStop, secondStop], [first, middle, last]);
    }
  }
  return null;
}

/**
 * Tiered search: direct, then one stop, then two stops. The first tier with any
 * itinerary wins, and within the stop tiers the first qualifying stop (in table
 * order) is taken rather than the globally cheapest one. Each leg is priced at
 * its exact minimum fare.
 */
export function findCheapestRoute(
  table: FareTable,
  source: string,
  destination: string,
  options: RouteSearchOptions = {},
): RouteResult {
  const matcher = options.matcher ?? matchesAny;

  const direct = cheapestDirectFare(table, source, destination, matcher);
  if (direct) return buildRoute([], [direct]);

  const candidates = candidateStops(table, source, destination);
  const oneStop = findOneStop(table, source, destination, candidates, matcher);
  if (oneStop) return oneStop;

  const limit = options.maxStopCandidates;
  const bounded = limit != null && limit < candidates.length ? candidates.slice(0, limit) : candidates;
  if (bounded.length < candidates.length) {
    logInfo('route', `Two-stop search limited to ${bounded.length} of ${candidates.length} stops`);
  }
  return findTwoStop(table, source, destination, bounded, matcher) ?? NO_ROUTE;
}
