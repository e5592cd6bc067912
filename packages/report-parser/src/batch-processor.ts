import { readFile } from 'fs/promises';
import {
  AnalysisDocumentSchema,
  InterimDocumentError,
  isPipelineError,
  type AnalysisDocument,
} from '@bureau-insights/types';
import type { ReportFileInfo } from './directory-scanner.js';
import { parseXmlDocument } from './tree/xml-reader.js';
import { normalize } from './tree/normalizer.js';
import { projectReport } from './projector/report-projector.js';
import { writeAnalysisDocument } from './interim/interim-store.js';

export interface ReportProcessError {
  fileName: string;
  filePath: string;
  error: string;
  /** Pipeline error code, or `UNEXPECTED` for anything else (I/O, runtime). */
  code: string;
  stack: string | undefined;
  timestamp: string;
}

export interface ProcessedReport {
  fileName: string;
  filePath: string;
  outputPath: string;
  document: AnalysisDocument;
}

export interface ReportBatchResult {
  processed: ProcessedReport[];
  errors: ReportProcessError[];
  summary: {
    totalReportsFound: number;
    reportsSucceeded: number;
    reportsFailed: number;
    totalLoans: number;
  };
}

export interface ReportBatchOptions {
  outputDir: string;
  /** Check each projected document against the zod contract before writing. */
  strict?: boolean;
  onProgress?: (current: number, total: number, fileName: string) => void;
  onProcessed?: (report: ProcessedReport) => void;
  onError?: (error: ReportProcessError) => void;
}

/**
 * Parses, normalizes and projects one report file's contents.
 */
export function analyzeCreditReport(xml: string | Buffer): AnalysisDocument {
  return projectReport(normalize(parseXmlDocument(xml)));
}

/**
 * Converts each report into an interim document in `outputDir`.
 *
 * Processing is sequential and files are independent: a report that fails
 * to parse or project is recorded in `errors` and the batch moves on.
 * Interim file names derive from the source file name, so reruns overwrite
 * the same files.
 */
export async function processReportBatch(
  files: ReportFileInfo[],
  options: ReportBatchOptions
): Promise<ReportBatchResult> {
  const processed: ProcessedReport[] = [];
  const errors: ReportProcessError[] = [];

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    if (file === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, files.length, file.fileName);
    }

    try {
      const report = await processSingleReport(file, options);
      processed.push(report);

      if (options.onProcessed !== undefined) {
        options.onProcessed(report);
      }
    } catch (error) {
      const processError = createProcessError(file, error);
      errors.push(processError);

      if (options.onError !== undefined) {
        options.onError(processError);
      }
    }
  }

  return {
    processed,
    errors,
    summary: {
      totalReportsFound: files.length,
      reportsSucceeded: processed.length,
      reportsFailed: errors.length,
      totalLoans: processed.reduce((sum, report) => sum + report.document.loans.length, 0),
    },
  };
}

async function processSingleReport(file: ReportFileInfo, options: ReportBatchOptions): Promise<ProcessedReport> {
  const xml = await readFile(file.filePath);
  const document = analyzeCreditReport(xml);

  if (options.strict === true) {
    const validation = AnalysisDocumentSchema.safeParse(document);
    if (!validation.success) {
      const issues = validation.error.issues.map((issue) => ({
        path: `/${issue.path.join('/')}`,
        message: issue.message,
      }));
      throw new InterimDocumentError(
        `Projected document failed validation: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
        issues
      );
    }
  }

  const outputPath = await writeAnalysisDocument(document, options.outputDir, file.fileName);
  return {
    fileName: file.fileName,
    filePath: file.filePath,
    outputPath,
    document,
  };
}

function createProcessError(file: ReportFileInfo, error: unknown): ReportProcessError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    fileName: file.fileName,
    filePath: file.filePath,
    error: message,
    code: isPipelineError(error) ? error.code : 'UNEXPECTED',
    stack,
    timestamp: new Date().toISOString(),
  };
}
