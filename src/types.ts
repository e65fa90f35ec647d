export type FareRecord = {
  readonly originCity: string;
  readonly destinationCity: string;
  readonly originAirportCode: string;
  readonly destinationAirportCode: string;
  readonly lowFare: number;
};

export type FareTable = {
  readonly records: readonly FareRecord[];
  /** Distinct normalized origin cities, in order of first appearance. */
  readonly originCities: readonly string[];
  readonly dropped: number;
  readonly source: string;
};

export type FareColumnMap = {
  originCity: string;
  destinationCity: string;
  originAirportCode: string;
  destinationAirportCode: string;
  lowFare: string;
};

export type LocationMatcher = (query: string, cityField: string, airportField: string) => boolean;

export type RouteFound = {
  found: true;
  totalFare: number;
  stops: string[];
  hasConnection: boolean;
  legs: FareRecord[];
};

export type RouteNotFound = {
  readonly found: false;
  readonly totalFare: null;
  readonly stops: readonly string[];
  readonly hasConnection: false;
  readonly legs: readonly FareRecord[];
};

export type RouteResult = RouteFound | RouteNotFound;

export type RouteSearchOptions = {
  matcher?: LocationMatcher;
  maxStopCandidates?: number | null;
};

export type TripRequest = {
  source: string;
  destination: string;
  nights: number;
  nightlyRate: number;
  wantsReturn: boolean;
  budget?: number | null;
};

export type BudgetVerdict = {
  budget: number;
  status: 'within' | 'over';
  delta: number;
};

export type TripSummary = {
  source: string;
  destination: string;
  outbound: RouteFound;
  inbound: RouteFound | null;
  returnRequested: boolean;
  returnDowngraded: boolean;
  warnings: string[];
  nights: number;
  nightlyRate: number;
  flightCost: number;
  lodgingCost: number;
  grandTotal: number;
  budget: BudgetVerdict | null;
  assumptions: string[];
};

export type TripOutcome =
  | { ok: true; summary: TripSummary }
  | { ok: false; reason: 'no_outbound_route'; source: string; destination: string };

export type ExportRecord = {
  Source: string;
  Destination: string;
  'Outbound Connection': string;
  'Return Requested': string;
  'Return Connection': string;
  'Flight Cost': string;
  Nights: string;
  'Nightly Rate': string;
  'Lodging Cost': string;
  'Grand Total': string;
  Budget: string;
  'Budget Status': string;
};
