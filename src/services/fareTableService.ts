import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { FareTableError } from '../errors';
import type { FareColumnMap, FareRecord, FareTable } from '../types';
import { DEFAULT_COLUMNS } from '../utils/constants';
import { logInfo, logWarn } from '../utils/log';
import { normalizeQuery } from './locationService';

export type FareTableOptions = {
  columns?: Partial<FareColumnMap>;
  source?: string;
};

const PLAIN_DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;
const GROUPED_DECIMAL = /^\d{1,3}(,\d{3})+(\.\d+)?$/;

function isDecimalText(value: string): boolean {
  return PLAIN_DECIMAL.test(value) || GROUPED_DECIMAL.test(value);
}

const FieldSchema = z.string().trim().min(1);

// Numeric strings may carry a leading currency symbol and thousands groups ("$1,240.50").
// Any other comma ("12,50", "1,2,3") makes the fare invalid.
const FareSchema = z
  .union([
    z.number(),
    z
      .string()
      .transform((value) => value.trim().replace(/^\$/, ''))
      .pipe(z.string().refine(isDecimalText).transform((value) => value.replace(/,/g, ''))),
  ])
  .pipe(z.coerce.number().finite().nonnegative());

export const FareRowSchema = z.object({
  originCity: FieldSchema,
  destinationCity: FieldSchema,
  originAirportCode: FieldSchema,
  destinationAirportCode: FieldSchema,
  lowFare: FareSchema,
});

const CsvRowsSchema = z.array(z.array(z.string()));

function resolveColumns(columns?: Partial<FareColumnMap>): FareColumnMap {
  return { ...DEFAULT_COLUMNS, ...columns };
}

function assertColumns(available: Iterable<string>, columns: FareColumnMap) {
  const present = new Set(available);
  const missing = Object.values(columns).filter((name) => !present.has(name));
  if (missing.length) {
    throw new FareTableError('missing_columns', `Fare table is missing required columns: ${missing.join(', ')}`);
  }
}

function collectOriginCities(records: readonly FareRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    seen.add(normalizeQuery(record.originCity));
  }
  return Array.from(seen);
}

export function buildFareTable(rows: ReadonlyArray<Record<string, unknown>>, options: FareTableOptions = {}): FareTable {
  const columns = resolveColumns(options.columns);
  const source = options.source ?? 'inline';

  if (rows.length) {
    assertColumns(new Set(rows.flatMap((row) => Object.keys(row))), columns);
  }

  const records: FareRecord[] = [];
  let dropped = 0;
  for (const row of rows) {
    const parsed = FareRowSchema.safeParse({
      originCity: row[columns.originCity],
      destinationCity: row[columns.destinationCity],
      originAirportCode: row[columns.originAirportCode],
      destinationAirportCode: row[columns.destinationAirportCode],
      lowFare: row[columns.lowFare],
    });
    if (parsed.success) {
      records.push(Object.freeze(parsed.data));
    } else {
      dropped += 1;
    }
  }

  if (dropped) {
    logWarn('fare-table', `Dropped ${dropped} invalid row(s)`, { source });
  }
  if (!records.length) {
    throw new FareTableError('empty_table', `Fare table ${source} has no valid fare rows`);
  }

  logInfo('fare-table', `Loaded ${records.length} fare row(s)`, { source });
  return Object.freeze({
    records: Object.freeze(records),
    originCities: Object.freeze(collectOriginCities(records)),
    dropped,
    source,
  });
}

export function parseFareTable(csvText: string, options: FareTableOptions = {}): FareTable {
  const columns = resolveColumns(options.columns);

  let rows: string[][];
  try {
    const raw: unknown = parse(csvText, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
    rows = CsvRowsSchema.parse(raw);
  } catch (error) {
    throw new FareTableError('unreadable', `Could not parse fare table ${options.source ?? 'inline'}`, { cause: error });
  }

  const [header, ...body] = rows;
  if (!header) {
    throw new FareTableError('missing_columns', 'Fare table has no header row');
  }
  assertColumns(header, columns);

  const objects = body.map((cells) =>
    Object.fromEntries(header.map((name, index): [string, unknown] => [name, cells[index]])),
  );
  return buildFareTable(objects, { ...options, columns });
}

export async function loadFareTable(path: string, options: FareTableOptions = {}): Promise<FareTable> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new FareTableError('unreadable', `Could not read fare table at ${path}`, { cause: error });
  }
  return parseFareTable(text, { ...options, source: options.source ?? path });
}
