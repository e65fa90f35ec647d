import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_DATA_FILE, DEFAULT_EXPORT_FILE } from './utils/constants';

export type LogLevel = 'silent' | 'warn' | 'info';

export type AppConfig = {
  fareTablePath: string;
  exportPath: string;
  maxStopCandidates: number | null;
  logLevel: LogLevel;
};

const EnvSchema = z.object({
  FARE_TABLE_PATH: z.string().trim().min(1).optional(),
  TRIP_EXPORT_PATH: z.string().trim().min(1).optional(),
  MAX_STOP_CANDIDATES: z.coerce.number().int().positive().optional(),
  TRIP_LOG_LEVEL: z.enum(['silent', 'warn', 'info']).optional(),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    fareTablePath: vars.FARE_TABLE_PATH ?? fileURLToPath(DEFAULT_DATA_FILE),
    exportPath: vars.TRIP_EXPORT_PATH ?? DEFAULT_EXPORT_FILE,
    maxStopCandidates: vars.MAX_STOP_CANDIDATES ?? null,
    logLevel: vars.TRIP_LOG_LEVEL ?? 'info',
  };
}
