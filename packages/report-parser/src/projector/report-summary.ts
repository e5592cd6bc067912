import { CURRENCY_SYMBOL, type AnalysisDocument } from '@bureau-insights/types';

function show(value: string | null): string {
  return value ?? 'N/A';
}

/**
 * Renders the key insights of a projected report, one line per fact.
 */
export function formatReportSummary(fileName: string, doc: AnalysisDocument): string[] {
  const { credit_score: score, summary } = doc;
  return [
    `Credit Report Summary for ${fileName}:`,
    '-'.repeat(50),
    `Report Date: ${show(doc.report_date)}`,
    `Credit Score: ${show(score.value)} (${show(score.comments)})`,
    `Total Accounts: ${show(summary.total_accounts)}`,
    `Active Accounts: ${show(summary.active_accounts)}`,
    `Credit History: ${show(summary.credit_history_years)} years`,
    `Recent Inquiries: ${show(summary.recent_inquiries)}`,
    `Current Total Balance: ${CURRENCY_SYMBOL}${show(summary.total_balance)}`,
    `Loans: ${doc.loans.length}`,
  ];
}
