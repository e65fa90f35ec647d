import type { RouteResult } from '../types';
import { DIRECT_LABEL, STOP_SEPARATOR } from './constants';

const money = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(value: number): string {
  return money.format(value);
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function formatStops(route: RouteResult): string {
  return route.stops.length ? route.stops.join(STOP_SEPARATOR) : DIRECT_LABEL;
}

export function titleCase(value: string): string {
  return value.replace(/(?<![\p{L}\p{N}'])\p{L}/gu, (letter) => letter.toUpperCase());
}
