import { tryDecodeDpd } from '@bureau-insights/report-parser';
import {
  DPD_DELINQUENCY_THRESHOLD,
  type DpdDecodeFailure,
  type DpdMonth,
  type Loan,
} from '@bureau-insights/types';

export interface DelinquentMonthsResult {
  dpdMonths: DpdMonth[];
  decodeErrors: DpdDecodeFailure[];
}

/**
 * Collects the months of a loan at or beyond the delinquency threshold.
 * A payment whose status cannot be decoded is skipped and reported, so one
 * bad entry never hides the rest of the loan's history.
 */
export function findDelinquentMonths(
  loan: Loan,
  loanIndex: number,
  threshold: number = DPD_DELINQUENCY_THRESHOLD
): DelinquentMonthsResult {
  const dpdMonths: DpdMonth[] = [];
  const decodeErrors: DpdDecodeFailure[] = [];

  for (const payment of loan.payment_history) {
    const decoded = tryDecodeDpd(payment.status_code);
    if (!decoded.ok) {
      decodeErrors.push({
        loanIndex,
        date: payment.date,
        statusCode: payment.status_code,
        message: decoded.error.message,
      });
      continue;
    }

    if (decoded.dpd >= threshold) {
      dpdMonths.push({ date: payment.date, dpd: decoded.dpd });
    }
  }

  return { dpdMonths, decodeErrors };
}
