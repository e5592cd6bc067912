import {
  parseAmount,
  type AnalysisDocument,
  type DisbursementLoanDetail,
  type DisbursementStats,
} from '@bureau-insights/types';

export function analyzeDisbursements(doc: AnalysisDocument): DisbursementStats {
  const loanDetails: DisbursementLoanDetail[] = doc.loans.map((loan) => ({
    type: loan.account_type,
    amount: parseAmount(loan.amount),
    date: loan.disbursed_date,
    status: loan.status,
  }));

  return {
    totalDisbursed: loanDetails.reduce((sum, loan) => sum + loan.amount, 0),
    loanCount: loanDetails.length,
    loanDetails,
  };
}
