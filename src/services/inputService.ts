import { parseArgs } from 'node:util';
import { z } from 'zod';
import { InputError } from '../errors';
import type { TripRequest } from '../types';
import { daysBetween, isIsoDate } from '../utils/date';
import { normalizeQuery } from './locationService';

export type RawTripInput = {
  from?: string;
  to?: string;
  nights?: string;
  depart?: string;
  back?: string;
  rate?: string;
  budget?: string;
  wantsReturn: boolean;
};

const numberText = z.string().trim().min(1, 'is required').pipe(z.coerce.number({ invalid_type_error: 'must be a number' }));

const LocationSchema = z.string().transform(normalizeQuery).pipe(z.string().min(1, 'must not be blank'));

const TripInputSchema = z.object({
  source: LocationSchema,
  destination: LocationSchema,
  nights: numberText.pipe(z.number().int('must be a whole number').positive('must be greater than zero')),
  nightlyRate: numberText.pipe(z.number().finite().nonnegative('must not be negative')),
  budget: numberText.pipe(z.number().finite().nonnegative('must not be negative')).optional(),
  wantsReturn: z.boolean(),
});

export function resolveNights(raw: Pick<RawTripInput, 'nights' | 'depart' | 'back'>): string | undefined {
  if (raw.nights !== undefined || raw.depart === undefined || raw.back === undefined) {
    return raw.nights;
  }
  if (!isIsoDate(raw.depart)) throw new InputError('depart', `depart must be a YYYY-MM-DD date, got "${raw.depart}"`);
  if (!isIsoDate(raw.back)) throw new InputError('back', `back must be a YYYY-MM-DD date, got "${raw.back}"`);

  const nights = daysBetween(raw.depart, raw.back);
  if (nights < 1) throw new InputError('back', 'back must be after depart');
  return String(nights);
}

export function parseTripInput(raw: RawTripInput): TripRequest {
  const parsed = TripInputSchema.safeParse({
    source: raw.from ?? '',
    destination: raw.to ?? '',
    nights: resolveNights(raw) ?? '',
    nightlyRate: raw.rate ?? '',
    budget: raw.budget,
    wantsReturn: raw.wantsReturn,
  });

  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue ? issue.path.join('.') : 'input';
    throw new InputError(field, `${field} ${issue?.message ?? 'is invalid'}`);
  }

  return { ...parsed.data, budget: parsed.data.budget ?? null };
}

const CLI_OPTIONS = {
  data: { type: 'string' },
  from: { type: 'string' },
  to: { type: 'string' },
  nights: { type: 'string' },
  depart: { type: 'string' },
  back: { type: 'string' },
  rate: { type: 'string' },
  return: { type: 'boolean' },
  'one-way': { type: 'boolean' },
  budget: { type: 'string' },
  export: { type: 'string' },
  save: { type: 'boolean' },
  help: { type: 'boolean' },
} as const;

function isParseArgsError(error: unknown): error is Error & { code: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS');
}

// Unknown flags, missing flag values and stray positionals surface as InputError.
export function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true }).values;
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new InputError('arguments', error.message);
    }
    throw error;
  }
}

export function resolveReturnFlag(returnFlag?: boolean, oneWay?: boolean): boolean | undefined {
  if (returnFlag && oneWay) {
    throw new InputError('return', '--return and --one-way cannot be used together');
  }
  if (returnFlag) return true;
  if (oneWay) return false;
  return undefined;
}
