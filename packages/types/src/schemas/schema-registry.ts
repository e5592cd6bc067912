import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type SchemaVersion = 'v1';

export const AVAILABLE_SCHEMA_VERSIONS: readonly SchemaVersion[] = ['v1'] as const;
export const DEFAULT_SCHEMA_VERSION: SchemaVersion = 'v1';

const schemaCache = new Map<SchemaVersion, object>();

/**
 * Get the file path for an interim document schema version
 */
export function getSchemaPath(version: SchemaVersion): string {
  const schemaDir = resolve(__dirname, '../../schemas');
  return resolve(schemaDir, `analysis_document.${version}.schema.json`);
}

/**
 * Load and return the JSON schema for a given version
 */
export function getSchema(version: SchemaVersion): object {
  assertValidSchemaVersion(version);

  const cached = schemaCache.get(version);
  if (cached !== undefined) {
    return cached;
  }

  const schemaPath = getSchemaPath(version);
  const schemaContent = readFileSync(schemaPath, 'utf-8');
  const schema: object = JSON.parse(schemaContent);
  schemaCache.set(version, schema);
  return schema;
}

/**
 * Check if a version string is a valid schema version
 */
export function isValidSchemaVersion(version: string): version is SchemaVersion {
  return AVAILABLE_SCHEMA_VERSIONS.some((available) => available === version);
}

/**
 * Validate that a version string is valid, throwing an error if not
 */
export function assertValidSchemaVersion(version: string): asserts version is SchemaVersion {
  if (!isValidSchemaVersion(version)) {
    throw new Error(
      `Invalid schema version: "${version}". Available versions: ${AVAILABLE_SCHEMA_VERSIONS.join(', ')}`
    );
  }
}
