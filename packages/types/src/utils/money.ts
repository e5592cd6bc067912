import { CURRENCY_SYMBOL } from './constants.js';

/**
 * Parses a bureau amount such as `"1,50,000"` or `"₹25,000.50"`.
 * Empty, missing or unparseable amounts count as zero.
 */
export function parseAmount(amountStr: string | null | undefined): number {
  if (amountStr === null || amountStr === undefined || amountStr === '') {
    return 0;
  }

  const cleaned = amountStr.replace(/,/g, '').split(CURRENCY_SYMBOL).join('').trim();
  if (cleaned === '') {
    return 0;
  }

  const num = Number(cleaned);
  return Number.isFinite(num) ? num : 0;
}

export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function formatCurrency(amount: number): string {
  const formatted = amount.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
  return `${CURRENCY_SYMBOL}${formatted}`;
}

export function sumAmounts(amounts: number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}
