import { formatCurrency, type CustomerResult, type DisbursementStats } from '@bureau-insights/types';
import { renderCsv, type CsvFile, type CsvOptions } from './csv.js';
import { average } from './format.js';

const SUMMARY_HEADER = ['Customer ID', 'Total Disbursed', 'Number of Loans', 'Average per Loan'] as const;
const DETAILS_HEADER = ['Customer ID', 'Loan Type', 'Amount', 'Date', 'Status'] as const;
const STATS_HEADER = ['Metric', 'Value'] as const;

/**
 * Renders `disbursement_summary.csv`, `disbursement_details.csv` and
 * `disbursement_overall_stats.csv`.
 */
export function renderDisbursementReports(
  results: readonly CustomerResult<DisbursementStats>[],
  options: CsvOptions = {}
): CsvFile[] {
  const summaryRows = results.map(({ customerId, stats }) => [
    customerId,
    formatCurrency(stats.totalDisbursed),
    stats.loanCount,
    formatCurrency(average(stats.totalDisbursed, stats.loanCount)),
  ]);

  const detailRows = results.flatMap(({ customerId, stats }) =>
    stats.loanDetails.map(loan => [customerId, loan.type, formatCurrency(loan.amount), loan.date, loan.status])
  );

  const grandTotal = results.reduce((sum, r) => sum + r.stats.totalDisbursed, 0);
  const totalLoans = results.reduce((sum, r) => sum + r.stats.loanCount, 0);

  return [
    { filename: 'disbursement_summary.csv', content: renderCsv(SUMMARY_HEADER, summaryRows, options) },
    { filename: 'disbursement_details.csv', content: renderCsv(DETAILS_HEADER, detailRows, options) },
    {
      filename: 'disbursement_overall_stats.csv',
      content: renderCsv(STATS_HEADER, [
        ['Total Disbursed Across All Customers', formatCurrency(grandTotal)],
        ['Average Disbursed per Customer', formatCurrency(average(grandTotal, results.length))],
        ['Average Number of Loans per Customer', average(totalLoans, results.length).toFixed(2)],
      ], options),
    },
  ];
}
