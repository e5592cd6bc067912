export {
  validateAnalysisDocument,
  validateAnalysisDocumentOrThrow,
  formatValidationErrors,
  type ValidationResult,
  type ValidationError,
} from './ajv-validator.js';
