export type {
  DpdMonth,
  DpdDecodeFailure,
  DpdIncidenceLoanDetail,
  DpdIncidenceStats,
  MaxDpdLoanDetail,
  MaxDpdMonthsStats,
  DisbursementLoanDetail,
  DisbursementStats,
  CustomerResult,
  AnalysisName,
  AnalysisStatsByName,
} from './analysis.js';
