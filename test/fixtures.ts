import { buildFareTable } from '../src/services/fareTableService';
import type { FareTable } from '../src/types';

export type FareRow = [originCity: string, destinationCity: string, originCode: string, destinationCode: string, fare: number];

export function fareTable(rows: FareRow[]): FareTable {
  return buildFareTable(
    rows.map(([city1, city2, airport1, airport2, fare]) => ({
      city1,
      city2,
      airport_1: airport1,
      airport_2: airport2,
      fare_low: fare,
    })),
    { source: 'fixture' },
  );
}
