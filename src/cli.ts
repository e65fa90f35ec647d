import { createInterface } from 'node:readline/promises';
import { loadConfig } from './config';
import { ConfigError, FareTableError, InputError } from './errors';
import { loadFareTable } from './services/fareTableService';
import { parseCliArgs, parseTripInput, resolveReturnFlag, type RawTripInput } from './services/inputService';
import { findLocationLabels } from './services/locationService';
import { computeTrip } from './services/pricingService';
import type { FareTable } from './types';
import { exportSummaryCsv } from './utils/csv';
import { logWarn, setLogLevel } from './utils/log';
import { renderOutcome } from './utils/summary';

const HELP = `
Estimate a trip's flight and lodging cost from a fare table.

Usage:
  npm start -- --from <place> --to <place> (--nights <n> | --depart <date> --back <date>) --rate <amount> [options]

Options:
  --data <path>       Fare table CSV (default: $FARE_TABLE_PATH or data/fares.csv)
  --from <place>      Origin city or airport code (substring match)
  --to <place>        Destination city or airport code
  --nights <n>        Nights of lodging
  --depart <date>     Departure date (YYYY-MM-DD), with --back instead of --nights
  --back <date>       Return date (YYYY-MM-DD)
  --rate <amount>     Nightly lodging rate
  --return            Price the return flight as well
  --one-way           Skip the return flight
  --budget <amount>   Compare the total against a budget
  --export <path>     Append the summary to a CSV file
  --save              Append the summary to $TRIP_EXPORT_PATH (default: trip-summary.csv)
  --help              Show this help

Missing values are prompted for when running in a terminal.
`;

type Prompt = (question: string) => Promise<string>;

async function fillMissing(raw: RawTripInput, wantsReturn: boolean | undefined, ask: Prompt | null): Promise<RawTripInput> {
  if (!ask) return { ...raw, wantsReturn: wantsReturn ?? false };

  const filled = { ...raw };
  filled.from ??= await ask('From (city or airport): ');
  filled.to ??= await ask('To (city or airport): ');
  if (filled.nights === undefined && (filled.depart === undefined || filled.back === undefined)) {
    filled.nights = await ask('Nights: ');
  }
  filled.rate ??= await ask('Nightly lodging rate: ');
  if (filled.budget === undefined) {
    const budget = (await ask('Budget (blank for none): ')).trim();
    filled.budget = budget || undefined;
  }
  const roundTrip = wantsReturn ?? /^y(es)?$/i.test((await ask('Include return flight? (y/n): ')).trim());
  return { ...filled, wantsReturn: roundTrip };
}

function warnUnknownLocation(table: FareTable, label: string, text: string) {
  if (!findLocationLabels(table, text).length) {
    logWarn('trip', `${label} "${text}" does not match any city or airport in the fare table`);
  }
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const values = parseCliArgs(argv);
  if (values.help) {
    console.log(HELP.trim());
    return 0;
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const table = await loadFareTable(values.data ?? config.fareTablePath);

  const wantsReturn = resolveReturnFlag(values.return, values['one-way']);
  const raw: RawTripInput = {
    from: values.from,
    to: values.to,
    nights: values.nights,
    depart: values.depart,
    back: values.back,
    rate: values.rate,
    budget: values.budget,
    wantsReturn: wantsReturn ?? false,
  };

  let input: RawTripInput;
  if (process.stdin.isTTY) {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      input = await fillMissing(raw, wantsReturn, (question) => rl.question(question));
    } finally {
      rl.close();
    }
  } else {
    input = await fillMissing(raw, wantsReturn, null);
  }

  const request = parseTripInput(input);
  warnUnknownLocation(table, 'Origin', request.source);
  warnUnknownLocation(table, 'Destination', request.destination);

  const outcome = computeTrip(table, request, { maxStopCandidates: config.maxStopCandidates });
  console.log(renderOutcome(outcome));
  if (!outcome.ok) return 2;

  const path = values.export ?? (values.save ? config.exportPath : undefined);
  if (path) {
    await exportSummaryCsv(outcome.summary, path);
    console.log(`Saved summary to ${path}`);
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    if (error instanceof InputError || error instanceof FareTableError || error instanceof ConfigError) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  },
);
