import { describe, expect, it } from 'vitest';
import { computeTrip, evaluateBudget } from '../src/services/pricingService';
import type { TripRequest } from '../src/types';
import { fareTable } from './fixtures';

const request = (overrides: Partial<TripRequest> = {}): TripRequest => ({
  source: 'austin',
  destination: 'denver',
  nights: 3,
  nightlyRate: 100,
  wantsReturn: true,
  ...overrides,
});

describe('computeTrip', () => {
  it('fails when there is no outbound route', () => {
    const table = fareTable([['Denver', 'Austin', 'DEN', 'AUS', 130]]);
    expect(computeTrip(table, request())).toEqual({
      ok: false,
      reason: 'no_outbound_route',
      source: 'austin',
      destination: 'denver',
    });
  });

  it('downgrades to one-way when the return route is missing', () => {
    const table = fareTable([['Austin', 'Denver', 'AUS', 'DEN', 200]]);
    const outcome = computeTrip(table, request());
    if (!outcome.ok) throw new Error('expected a priced trip');

    const { summary } = outcome;
    expect(summary.inbound).toBeNull();
    expect(summary.returnRequested).toBe(true);
    expect(summary.returnDowngraded).toBe(true);
    expect(summary.flightCost).toBe(200);
    expect(summary.lodgingCost).toBe(300);
    expect(summary.grandTotal).toBe(500);
    expect(summary.warnings).toEqual(['No return route from denver to austin; trip priced as one-way.']);
    expect(summary.budget).toBeNull();
  });

  it('reports the overage when the total exceeds the budget', () => {
    const table = fareTable([['Austin', 'Denver', 'AUS', 'DEN', 200]]);
    const outcome = computeTrip(table, request({ budget: 400 }));
    if (!outcome.ok) throw new Error('expected a priced trip');
    expect(outcome.summary.budget).toEqual({ budget: 400, status: 'over', delta: 100 });
  });

  it('prices a round trip with lodging and headroom', () => {
    const table = fareTable([
      ['Austin', 'Denver', 'AUS', 'DEN', 120],
      ['Denver', 'Austin', 'DEN', 'AUS', 130],
    ]);
    const outcome = computeTrip(table, request({ nights: 2, nightlyRate: 95.5, budget: 500 }));
    if (!outcome.ok) throw new Error('expected a priced trip');

    const { summary } = outcome;
    expect(summary.inbound?.totalFare).toBe(130);
    expect(summary.returnDowngraded).toBe(false);
    expect(summary.flightCost).toBe(250);
    expect(summary.lodgingCost).toBe(191);
    expect(summary.grandTotal).toBe(441);
    expect(summary.budget).toEqual({ budget: 500, status: 'within', delta: 59 });
    expect(summary.warnings).toEqual([]);
  });

  it('skips the return search for a one-way trip', () => {
    const table = fareTable([
      ['Austin', 'Denver', 'AUS', 'DEN', 120],
      ['Denver', 'Austin', 'DEN', 'AUS', 130],
    ]);
    const outcome = computeTrip(table, request({ wantsReturn: false, nights: 1, nightlyRate: 0 }));
    if (!outcome.ok) throw new Error('expected a priced trip');
    expect(outcome.summary.inbound).toBeNull();
    expect(outcome.summary.returnDowngraded).toBe(false);
    expect(outcome.summary.grandTotal).toBe(120);
  });

  it('describes the priced legs in the assumptions', () => {
    const table = fareTable([
      ['Austin', 'Chicago', 'AUS', 'ORD', 80],
      ['Chicago', 'Denver', 'ORD', 'DEN', 90],
    ]);
    const outcome = computeTrip(table, request({ wantsReturn: false }));
    if (!outcome.ok) throw new Error('expected a priced trip');
    expect(outcome.summary.assumptions.slice(0, 3)).toEqual([
      'Outbound route: chicago (AUS-ORD $80.00, ORD-DEN $90.00).',
      'One-way trip requested.',
      'Lodging: 3 night(s) at $100.00 per night.',
    ]);
  });
});

describe('evaluateBudget', () => {
  it('treats a total equal to the budget as within', () => {
    expect(evaluateBudget(500, 500)).toEqual({ budget: 500, status: 'within', delta: 0 });
  });

  it('rounds the delta to cents', () => {
    expect(evaluateBudget(100.3, 100.1)).toEqual({ budget: 100.1, status: 'over', delta: 0.2 });
  });
});
