import { roundToTwoDecimals, type CustomerResult, type DpdIncidenceStats } from '@bureau-insights/types';
import { renderCsv, type CsvFile, type CsvOptions } from './csv.js';
import { formatDpdMonths, formatPercentage } from './format.js';

const SUMMARY_HEADER = ['Customer ID', 'Total Trades', '30+ DPD Trades', 'Percentage'] as const;
const DETAILS_HEADER = ['Customer ID', 'Loan Type', 'Loan Status', 'Has 30+ DPD', 'DPD Months'] as const;
const STATS_HEADER = ['Metric', 'Value'] as const;

/**
 * Renders `dpd_summary.csv`, `dpd_details.csv` and `dpd_overall_stats.csv`.
 */
export function renderDpdReports(
  results: readonly CustomerResult<DpdIncidenceStats>[],
  options: CsvOptions = {}
): CsvFile[] {
  const summaryRows = results.map(({ customerId, stats }) => [
    customerId,
    stats.totalTrades,
    stats.tradesWith30PlusDpd,
    formatPercentage(stats.percentage),
  ]);

  const detailRows = results.flatMap(({ customerId, stats }) =>
    stats.loanDetails.map(loan => [
      customerId,
      loan.type,
      loan.status,
      loan.has30PlusDpd ? 'Yes' : 'No',
      loan.dpdMonths.length > 0 ? formatDpdMonths(loan.dpdMonths) : 'None',
    ])
  );

  const totalTrades = results.reduce((sum, r) => sum + r.stats.totalTrades, 0);
  const delinquentTrades = results.reduce((sum, r) => sum + r.stats.tradesWith30PlusDpd, 0);
  const overallPercentage = totalTrades > 0 ? roundToTwoDecimals((delinquentTrades / totalTrades) * 100) : 0;

  return [
    { filename: 'dpd_summary.csv', content: renderCsv(SUMMARY_HEADER, summaryRows, options) },
    { filename: 'dpd_details.csv', content: renderCsv(DETAILS_HEADER, detailRows, options) },
    {
      filename: 'dpd_overall_stats.csv',
      content: renderCsv(STATS_HEADER, [
        ['Total Trades', totalTrades],
        ['Trades with 30+ DPD', delinquentTrades],
        ['Overall Percentage', formatPercentage(overallPercentage)],
      ], options),
    },
  ];
}
