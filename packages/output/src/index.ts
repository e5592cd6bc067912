/**
 * Output module - renders per-customer analysis results as CSV reports.
 */

export {
  escapeCsvValue,
  rowToCsvLine,
  renderCsv,
  type CsvValue,
  type CsvOptions,
  type CsvFile,
} from './csv.js';

export { formatDpdMonths, formatPercentage, average } from './format.js';

export { renderDpdReports } from './dpd-report.js';
export { renderMaxDpdReports } from './max-dpd-report.js';
export { renderDisbursementReports } from './disbursement-report.js';

export {
  REPORT_RENDERERS,
  analysisOutputDir,
  writeCsvFiles,
  writeAnalysisReports,
  type ReportRenderer,
} from './writer.js';
