import type {
  AnalysisDocument,
  DpdDecodeFailure,
  MaxDpdLoanDetail,
  MaxDpdMonthsStats,
} from '@bureau-insights/types';
import { findDelinquentMonths } from './delinquent-months.js';

/**
 * Largest number of 30+ DPD months recorded on any single trade.
 */
export function analyzeMaxDpdMonths(doc: AnalysisDocument): MaxDpdMonthsStats {
  const loanDetails: MaxDpdLoanDetail[] = [];
  const decodeErrors: DpdDecodeFailure[] = [];
  let maxDpdMonths = 0;

  doc.loans.forEach((loan, index) => {
    const result = findDelinquentMonths(loan, index);
    decodeErrors.push(...result.decodeErrors);

    const dpdCount = result.dpdMonths.length;
    loanDetails.push({
      type: loan.account_type,
      disbursedDate: loan.disbursed_date,
      dpdCount,
      dpdMonths: result.dpdMonths,
    });
    maxDpdMonths = Math.max(maxDpdMonths, dpdCount);
  });

  return { maxDpdMonths, loanDetails, decodeErrors };
}
