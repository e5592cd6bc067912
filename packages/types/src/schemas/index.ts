export {
  PaymentRecordSchema,
  LoanSchema,
  CreditScoreSchema,
  AccountSummarySchema,
  AnalysisDocumentSchema,
} from './analysis-document.js';

export type {
  PaymentRecord,
  Loan,
  CreditScore,
  AccountSummary,
  AnalysisDocument,
} from './analysis-document.js';

export {
  getSchemaPath,
  getSchema,
  isValidSchemaVersion,
  assertValidSchemaVersion,
  AVAILABLE_SCHEMA_VERSIONS,
  DEFAULT_SCHEMA_VERSION,
  type SchemaVersion,
} from './schema-registry.js';
