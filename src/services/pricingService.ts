import type { BudgetVerdict, FareTable, RouteFound, RouteSearchOptions, TripOutcome, TripRequest } from '../types';
import { formatMoney, formatStops, roundCurrency } from '../utils/format';
import { logInfo, logWarn } from '../utils/log';
import { findCheapestRoute } from './routeService';

export function evaluateBudget(total: number, budget: number): BudgetVerdict {
  const over = total > budget;
  return {
    budget,
    status: over ? 'over' : 'within',
    delta: roundCurrency(over ? total - budget : budget - total),
  };
}

function describeRoute(label: string, route: RouteFound): string {
  const legs = route.legs
    .map((leg) => `${leg.originAirportCode}-${leg.destinationAirportCode} ${formatMoney(leg.lowFare)}`)
    .join(', ');
  return `${label}: ${formatStops(route)} (${legs}).`;
}

function buildAssumptions(
  request: TripRequest,
  outbound: RouteFound,
  inbound: RouteFound | null,
  returnDowngraded: boolean,
): string[] {
  const notes = [describeRoute('Outbound route', outbound)];
  if (inbound) {
    notes.push(describeRoute('Return route', inbound));
  } else if (returnDowngraded) {
    notes.push('Return route unavailable; priced as one-way.');
  } else {
    notes.push('One-way trip requested.');
  }
  notes.push(`Lodging: ${request.nights} night(s) at ${formatMoney(request.nightlyRate)} per night.`);
  notes.push('Fares use the lowest listed fare per leg; connections take the first workable stop in table order.');
  return notes;
}

/**
 * Prices outbound (and optionally return) flights plus lodging. A missing outbound
 * route fails the whole computation; a missing return route downgrades the trip
 * to one-way with a warning.
 */
export function computeTrip(table: FareTable, request: TripRequest, options: RouteSearchOptions = {}): TripOutcome {
  const { source, destination } = request;

  const outbound = findCheapestRoute(table, source, destination, options);
  if (!outbound.found) {
    logWarn('trip', 'No outbound route', { source, destination });
    return { ok: false, reason: 'no_outbound_route', source, destination };
  }

  const warnings: string[] = [];
  let inbound: RouteFound | null = null;
  let returnDowngraded = false;
  if (request.wantsReturn) {
    const back = findCheapestRoute(table, destination, source, options);
    if (back.found) {
      inbound = back;
    } else {
      returnDowngraded = true;
      warnings.push(`No return route from ${destination} to ${source}; trip priced as one-way.`);
      logWarn('trip', 'Return route unavailable, downgrading to one-way', { source, destination });
    }
  }

  const flightCost = roundCurrency(outbound.totalFare + (inbound?.totalFare ?? 0));
  const lodgingCost = roundCurrency(request.nights * request.nightlyRate);
  const grandTotal = roundCurrency(flightCost + lodgingCost);
  const budget = request.budget != null ? evaluateBudget(grandTotal, request.budget) : null;

  logInfo('trip', 'Trip priced', { source, destination, grandTotal });

  return {
    ok: true,
    summary: {
      source,
      destination,
      outbound,
      inbound,
      returnRequested: request.wantsReturn,
      returnDowngraded,
      warnings,
      nights: request.nights,
      nightlyRate: request.nightlyRate,
      flightCost,
      lodgingCost,
      grandTotal,
      budget,
      assumptions: buildAssumptions(request, outbound, inbound, returnDowngraded),
    },
  };
}
