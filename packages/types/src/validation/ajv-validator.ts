/**
 * AJV-based JSON Schema validation for persisted interim documents.
 * Schemas live in `packages/types/schemas` and are selected by version.
 */

import Ajv from 'ajv';
import type { AnalysisDocument } from '../schemas/analysis-document.js';
import { getSchema, DEFAULT_SCHEMA_VERSION, type SchemaVersion } from '../schemas/schema-registry.js';
import { InterimDocumentError } from '../errors.js';

interface AjvErrorObject {
  instancePath: string;
  message?: string;
  keyword: string;
  params: Record<string, unknown>;
}

interface AjvValidateFunction {
  (data: unknown): boolean;
  errors?: AjvErrorObject[] | null;
}

interface AjvInstance {
  compile: (schema: object) => AjvValidateFunction;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

const validatorCache = new Map<SchemaVersion, AjvValidateFunction>();

function getValidator(version: SchemaVersion): AjvValidateFunction {
  const cached = validatorCache.get(version);
  if (cached !== undefined) {
    return cached;
  }

  // ajv ships CommonJS; under NodeNext the default import is the module object
  const ajv = new (Ajv as unknown as new (opts: object) => AjvInstance)({
    allErrors: true,
    strict: false,
  });

  const validate = ajv.compile(getSchema(version));
  validatorCache.set(version, validate);
  return validate;
}

export function validateAnalysisDocument(
  payload: unknown,
  version: SchemaVersion = DEFAULT_SCHEMA_VERSION
): ValidationResult {
  const validate = getValidator(version);
  const valid = validate(payload);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

export function validateAnalysisDocumentOrThrow(
  payload: unknown,
  version: SchemaVersion = DEFAULT_SCHEMA_VERSION
): asserts payload is AnalysisDocument {
  const result = validateAnalysisDocument(payload, version);
  if (!result.valid) {
    throw new InterimDocumentError(
      `Schema validation failed for version "${version}":\n${formatValidationErrors(result.errors.slice(0, 10)).join('\n')}`,
      result.errors
    );
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `  [${e.keyword}] ${e.path}: ${e.message}`);
}
