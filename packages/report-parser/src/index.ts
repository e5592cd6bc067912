// Tree reading and normalization
export { createRawNode, type RawNode } from './tree/raw-node.js';
export { parseXmlDocument } from './tree/xml-reader.js';
export {
  normalize,
  leaf,
  getEntry,
  getPath,
  scalarOf,
  asSequence,
  toPlainValue,
  TEXT_ENTRY_KEY,
  type NormalizedValue,
  type NormalizedLeaf,
  type NormalizedObject,
  type NormalizedList,
  type PlainValue,
} from './tree/normalizer.js';

// Projection
export {
  projectReport,
  projectLoan,
  REPORT_CONTAINER_PATH,
  REPORT_DATE_PATH,
  CREDIT_SCORE_FIELDS,
  SUMMARY_FIELDS,
  RESPONSES_PATH,
  LOAN_DETAILS_KEY,
  LOAN_FIELDS,
} from './projector/report-projector.js';
export { parsePaymentHistory } from './projector/payment-history.js';
export { decodeDpd, tryDecodeDpd, DPD_CODE_TABLE } from './projector/dpd.js';
export { formatReportSummary } from './projector/report-summary.js';

// Interim documents
export {
  interimFileName,
  customerIdFromFileName,
  serializeAnalysisDocument,
  deserializeAnalysisDocument,
  writeAnalysisDocument,
  readAnalysisDocument,
} from './interim/interim-store.js';

// Directory scanner
export {
  scanDirectoryForReports,
  validateDirectory,
  type ReportFileInfo,
  type ScanResult,
  type ScanOptions,
} from './directory-scanner.js';

// Batch processor
export {
  analyzeCreditReport,
  processReportBatch,
  type ReportProcessError,
  type ProcessedReport,
  type ReportBatchResult,
  type ReportBatchOptions,
} from './batch-processor.js';
