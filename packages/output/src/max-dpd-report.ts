import type { CustomerResult, MaxDpdMonthsStats } from '@bureau-insights/types';
import { renderCsv, type CsvFile, type CsvOptions } from './csv.js';
import { formatDpdMonths } from './format.js';

const SUMMARY_HEADER = ['Customer ID', 'Maximum 30+ DPD Months'] as const;
const DETAILS_HEADER = [
  'Customer ID',
  'Loan Type',
  'Disbursed Date',
  'Number of 30+ DPD Months',
  'DPD Details',
] as const;
const STATS_HEADER = ['Metric', 'Value'] as const;

/**
 * Renders `max_dpd_summary.csv`, `max_dpd_details.csv` (delinquent loans only)
 * and `max_dpd_overall_stats.csv`. An empty batch reports a maximum of 0.
 */
export function renderMaxDpdReports(
  results: readonly CustomerResult<MaxDpdMonthsStats>[],
  options: CsvOptions = {}
): CsvFile[] {
  const summaryRows = results.map(({ customerId, stats }) => [customerId, stats.maxDpdMonths]);

  const detailRows = results.flatMap(({ customerId, stats }) =>
    stats.loanDetails
      .filter(loan => loan.dpdCount > 0)
      .map(loan => [customerId, loan.type, loan.disbursedDate, loan.dpdCount, formatDpdMonths(loan.dpdMonths)])
  );

  const overallMax = results.reduce((max, r) => Math.max(max, r.stats.maxDpdMonths), 0);
  const customersAtMax = results
    .filter(r => r.stats.maxDpdMonths === overallMax)
    .map(r => r.customerId);

  return [
    { filename: 'max_dpd_summary.csv', content: renderCsv(SUMMARY_HEADER, summaryRows, options) },
    { filename: 'max_dpd_details.csv', content: renderCsv(DETAILS_HEADER, detailRows, options) },
    {
      filename: 'max_dpd_overall_stats.csv',
      content: renderCsv(STATS_HEADER, [
        ['Overall Maximum 30+ DPD Months', overallMax],
        ['Customers with Maximum DPD', customersAtMax.join(', ')],
        ['Total Customers Analyzed', results.length],
      ], options),
    },
  ];
}
