import type { DpdMonth } from '@bureau-insights/types';

/** `"01-2020: 45 days; 02-2020: 91 days"` */
export function formatDpdMonths(months: readonly DpdMonth[]): string {
  return months.map(month => `${month.date}: ${month.dpd} days`).join('; ');
}

export function formatPercentage(value: number): string {
  return `${value}%`;
}

export function average(total: number, count: number): number {
  return count > 0 ? total / count : 0;
}
