export { analyzeDpdIncidence } from './dpd-incidence.js';
export { analyzeMaxDpdMonths } from './max-dpd-months.js';
export { analyzeDisbursements } from './disbursements.js';
export { findDelinquentMonths, type DelinquentMonthsResult } from './delinquent-months.js';
export {
  ANALYSES,
  ANALYSIS_NAMES,
  isAnalysisName,
  describeDecodeFailure,
  type AnalysisDefinition,
  type AnalysisRegistry,
} from './registry.js';
