import {
  roundToTwoDecimals,
  type AnalysisDocument,
  type DpdDecodeFailure,
  type DpdIncidenceLoanDetail,
  type DpdIncidenceStats,
} from '@bureau-insights/types';
import { findDelinquentMonths } from './delinquent-months.js';

/**
 * Share of a customer's trades that were ever 30+ days past due.
 */
export function analyzeDpdIncidence(doc: AnalysisDocument): DpdIncidenceStats {
  const loanDetails: DpdIncidenceLoanDetail[] = [];
  const decodeErrors: DpdDecodeFailure[] = [];

  doc.loans.forEach((loan, index) => {
    const result = findDelinquentMonths(loan, index);
    decodeErrors.push(...result.decodeErrors);
    loanDetails.push({
      type: loan.account_type,
      status: loan.status,
      dpdMonths: result.dpdMonths,
      has30PlusDpd: result.dpdMonths.length > 0,
    });
  });

  const totalTrades = doc.loans.length;
  const tradesWith30PlusDpd = loanDetails.filter((loan) => loan.has30PlusDpd).length;
  const percentage = totalTrades > 0 ? roundToTwoDecimals((tradesWith30PlusDpd / totalTrades) * 100) : 0;

  return {
    totalTrades,
    tradesWith30PlusDpd,
    percentage,
    loanDetails,
    decodeErrors,
  };
}
