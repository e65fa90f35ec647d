import { appendFile, stat, writeFile } from 'node:fs/promises';
import type { ExportRecord, TripSummary } from '../types';
import { NOT_APPLICABLE } from './constants';
import { formatStops } from './format';

export function toExportRecord(summary: TripSummary): ExportRecord {
  return {
    Source: summary.source,
    Destination: summary.destination,
    'Outbound Connection': formatStops(summary.outbound),
    'Return Requested': summary.inbound ? 'Yes' : 'No',
    'Return Connection': summary.inbound ? formatStops(summary.inbound) : NOT_APPLICABLE,
    'Flight Cost': summary.flightCost.toFixed(2),
    Nights: String(summary.nights),
    'Nightly Rate': summary.nightlyRate.toFixed(2),
    'Lodging Cost': summary.lodgingCost.toFixed(2),
    'Grand Total': summary.grandTotal.toFixed(2),
    Budget: summary.budget ? summary.budget.budget.toFixed(2) : NOT_APPLICABLE,
    'Budget Status': summary.budget?.status ?? NOT_APPLICABLE,
  };
}

function csvLine(values: string[]): string {
  return values
    .map((v) => {
      const safe = v.replace(/"/g, '""');
      return `"${safe}"`;
    })
    .join(',');
}

export function toCsv(records: ExportRecord[], includeHeader = true): string {
  const [first] = records;
  if (!first) return '';
  const header = Object.keys(first);
  const rows = records.map((record) => csvLine(Object.values(record)));
  return `${(includeHeader ? [csvLine(header), ...rows] : rows).join('\n')}\n`;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    return info.isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

/** Writes the summary as a CSV row, appending (without a header) when the file already exists. */
export async function exportSummaryCsv(summary: TripSummary, path: string): Promise<void> {
  const record = toExportRecord(summary);
  if (await fileExists(path)) {
    await appendFile(path, toCsv([record], false), 'utf8');
  } else {
    await writeFile(path, toCsv([record]), 'utf8');
  }
}
