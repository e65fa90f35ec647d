import type { TripOutcome, TripSummary } from '../types';
import { formatMoney, formatStops, titleCase } from './format';

export function renderTripSummary(summary: TripSummary): string {
  const lines = [
    `Trip: ${titleCase(summary.source)} → ${titleCase(summary.destination)}`,
    `Outbound: ${formatStops(summary.outbound)} (${formatMoney(summary.outbound.totalFare)})`,
  ];

  if (summary.inbound) {
    lines.push(`Return: ${formatStops(summary.inbound)} (${formatMoney(summary.inbound.totalFare)})`);
  } else if (summary.returnDowngraded) {
    lines.push('Return: unavailable, priced one-way');
  }

  lines.push(
    `Flights: ${formatMoney(summary.flightCost)}`,
    `Lodging: ${summary.nights} × ${formatMoney(summary.nightlyRate)} = ${formatMoney(summary.lodgingCost)}`,
    `Total: ${formatMoney(summary.grandTotal)}`,
  );

  if (summary.budget) {
    lines.push(
      summary.budget.status === 'over'
        ? `Budget: over ${formatMoney(summary.budget.budget)} by ${formatMoney(summary.budget.delta)}`
        : `Budget: within ${formatMoney(summary.budget.budget)}, ${formatMoney(summary.budget.delta)} to spare`,
    );
  }

  for (const warning of summary.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  return lines.join('\n');
}

export function renderOutcome(outcome: TripOutcome): string {
  if (outcome.ok) return renderTripSummary(outcome.summary);
  return `No outbound route found from ${titleCase(outcome.source)} to ${titleCase(outcome.destination)}.`;
}
