import type { FareColumnMap } from '../types';

export const DEFAULT_COLUMNS: FareColumnMap = {
  originCity: 'city1',
  destinationCity: 'city2',
  originAirportCode: 'airport_1',
  destinationAirportCode: 'airport_2',
  lowFare: 'fare_low',
};

export const DEFAULT_DATA_FILE = new URL('../../data/fares.csv', import.meta.url);
export const DEFAULT_EXPORT_FILE = 'trip-summary.csv';

export const DIRECT_LABEL = 'Direct';
export const NOT_APPLICABLE = 'N/A';
export const STOP_SEPARATOR = ' → ';
