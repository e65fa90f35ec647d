import type { LogLevel } from '../config';

const RANK: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2 };

let level: LogLevel = 'info';

export function setLogLevel(next: LogLevel) {
  level = next;
}

export function logInfo(tag: string, message: string, detail?: Record<string, unknown>) {
  if (RANK[level] < RANK.info) return;
  if (detail) console.info(`[${tag}] ${message}`, detail);
  else console.info(`[${tag}] ${message}`);
}

export function logWarn(tag: string, message: string, detail?: Record<string, unknown>) {
  if (RANK[level] < RANK.warn) return;
  if (detail) console.warn(`[${tag}] ${message}`, detail);
  else console.warn(`[${tag}] ${message}`);
}
