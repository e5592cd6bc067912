import { readFile, writeFile, mkdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import {
  InterimDocumentError,
  INTERIM_FILE_EXTENSION,
  INTERIM_FILE_PREFIX,
  errorMessage,
  validateAnalysisDocumentOrThrow,
  type AnalysisDocument,
} from '@bureau-insights/types';

/**
 * `1001_2024.xml` → `formatted_1001_2024.json`. The whole source stem is
 * kept so that distinct reports never share an interim file.
 */
export function interimFileName(sourceFileName: string): string {
  const name = basename(sourceFileName);
  const stem = name.slice(0, name.length - extname(name).length);
  return `${INTERIM_FILE_PREFIX}${stem}${INTERIM_FILE_EXTENSION}`;
}

/**
 * Recovers the customer identifier from an interim file name: the first
 * `_`-separated token after the `formatted_` prefix, without extension.
 * `formatted_1001.json` and `formatted_1001_2024.json` both give `1001`.
 */
export function customerIdFromFileName(fileName: string): string {
  const name = basename(fileName);
  const withoutPrefix = name.startsWith(INTERIM_FILE_PREFIX) ? name.slice(INTERIM_FILE_PREFIX.length) : name;
  const [token = ''] = withoutPrefix.split('_');
  const [customerId = ''] = token.split('.');
  return customerId;
}

export function serializeAnalysisDocument(doc: AnalysisDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

/**
 * Parses an interim document and checks it against the published JSON schema.
 *
 * @throws InterimDocumentError when the text is not JSON or does not match the schema
 */
export function deserializeAnalysisDocument(text: string): AnalysisDocument {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new InterimDocumentError(`Interim document is not valid JSON: ${errorMessage(error)}`);
  }

  validateAnalysisDocumentOrThrow(payload);
  return payload;
}

export async function writeAnalysisDocument(
  doc: AnalysisDocument,
  outputDir: string,
  sourceFileName: string
): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const outputPath = join(outputDir, interimFileName(sourceFileName));
  await writeFile(outputPath, serializeAnalysisDocument(doc), 'utf-8');
  return outputPath;
}

export async function readAnalysisDocument(filePath: string): Promise<AnalysisDocument> {
  const text = await readFile(filePath, 'utf-8');
  return deserializeAnalysisDocument(text);
}
