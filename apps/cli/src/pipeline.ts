import { mkdir } from 'fs/promises';
import { basename } from 'path';
import {
  customerIdFromFileName,
  formatReportSummary,
  processReportBatch,
  readAnalysisDocument,
  scanDirectoryForReports,
  type ReportBatchResult,
} from '@bureau-insights/report-parser';
import { ANALYSES, ANALYSIS_NAMES } from '@bureau-insights/analysis';
import { writeAnalysisReports } from '@bureau-insights/output';
import {
  INTERIM_FILE_EXTENSION,
  INTERIM_FILE_PREFIX,
  REPORT_FILE_EXTENSION,
  errorMessage,
  type AnalysisDocument,
  type AnalysisName,
  type AnalysisStatsByName,
  type CustomerResult,
} from '@bureau-insights/types';
import type { PipelineConfig } from './config.js';
import type { Logger } from './logger.js';

export interface InterimFileRef {
  filePath: string;
  fileName: string;
}

export interface RunAnalysesOptions {
  names?: readonly AnalysisName[];
  /** Interim documents to analyze (default: every `formatted_*.json` in the interim directory). */
  files?: readonly InterimFileRef[];
}

export interface CustomerDocument {
  customerId: string;
  fileName: string;
  document: AnalysisDocument;
}

export interface AnalysisRunSummary {
  name: AnalysisName;
  customersAnalyzed: number;
  customersFailed: number;
  warnings: number;
  outputFiles: string[];
  /** Set when the analysis could not write its reports. */
  error?: string;
}

export interface PipelineResult {
  batch: ReportBatchResult;
  analyses: AnalysisRunSummary[];
}

/**
 * Create the input, interim and results directories if they don't exist.
 */
export async function setupDirectoryStructure(config: PipelineConfig): Promise<void> {
  for (const dir of [config.inputDir, config.interimDir, config.resultsDir]) {
    await mkdir(dir, { recursive: true });
  }
}

/**
 * Converts every XML report in the input directory into an interim document.
 */
export async function formatReports(config: PipelineConfig, logger: Logger): Promise<ReportBatchResult> {
  const scan = await scanDirectoryForReports(config.inputDir, { extension: REPORT_FILE_EXTENSION });

  for (const skip of scan.skipped) {
    logger.warn(`Skipped ${skip.fileName}: ${skip.reason}`);
  }
  if (scan.files.length === 0) {
    logger.warn(`No report files found in ${scan.directoryPath}`);
  } else {
    logger.info(`Found ${scan.files.length} report file(s) in ${scan.directoryPath}`);
  }

  const batch = await processReportBatch(scan.files, {
    outputDir: config.interimDir,
    strict: config.strict,
    onProgress: (current, total, fileName) => {
      logger.debug(`Formatting ${current}/${total}: ${fileName}`);
    },
    onProcessed: (report) => {
      logger.info(`Formatted ${report.fileName} -> ${report.outputPath}`);
      for (const line of formatReportSummary(report.fileName, report.document)) {
        logger.debug(line);
      }
    },
    onError: (error) => {
      logger.error(`Error processing ${error.fileName} [${error.code}]: ${error.error}`);
    },
  });

  logger.info(
    `Formatted ${batch.summary.reportsSucceeded}/${batch.summary.totalReportsFound} report(s), ` +
      `${batch.summary.reportsFailed} failed, ${batch.summary.totalLoans} loan(s) total`
  );
  return batch;
}

export async function findInterimFiles(interimDir: string): Promise<InterimFileRef[]> {
  const scan = await scanDirectoryForReports(interimDir, {
    extension: INTERIM_FILE_EXTENSION,
    prefix: INTERIM_FILE_PREFIX,
  });
  return scan.files;
}

/**
 * Reads interim documents; a file that cannot be read or validated is logged
 * and left out.
 */
export async function loadCustomerDocuments(
  files: readonly InterimFileRef[],
  logger: Logger
): Promise<CustomerDocument[]> {
  const documents: CustomerDocument[] = [];
  for (const file of files) {
    try {
      const document = await readAnalysisDocument(file.filePath);
      documents.push({ customerId: customerIdFromFileName(file.fileName), fileName: file.fileName, document });
    } catch (error) {
      logger.error(`Error reading ${file.filePath}: ${errorMessage(error)}`);
    }
  }
  return documents;
}

/**
 * Runs one analysis over every customer and writes its CSV reports.
 * A customer whose analysis throws is logged and excluded from the reports.
 */
export async function runAnalysis<N extends AnalysisName>(
  name: N,
  documents: readonly CustomerDocument[],
  resultsDir: string,
  logger: Logger
): Promise<AnalysisRunSummary> {
  const definition = ANALYSES[name];
  const results: CustomerResult<AnalysisStatsByName[N]>[] = [];
  let customersFailed = 0;
  let warnings = 0;

  for (const customer of documents) {
    try {
      const stats = definition.analyze(customer.document);
      results.push({ customerId: customer.customerId, stats });

      for (const warning of definition.warnings(stats)) {
        warnings++;
        logger.warn(`${name}: customer ${customer.customerId}: skipped payment (${warning})`);
      }
      logger.debug(`${name}: analyzed ${customer.fileName}`);
    } catch (error) {
      customersFailed++;
      logger.error(`${name}: error analyzing ${customer.fileName}: ${errorMessage(error)}`);
    }
  }

  const summary: AnalysisRunSummary = {
    name,
    customersAnalyzed: results.length,
    customersFailed,
    warnings,
    outputFiles: [],
  };

  try {
    summary.outputFiles = await writeAnalysisReports(name, results, resultsDir);
    logger.info(`${name}: wrote ${summary.outputFiles.length} report(s) for ${results.length} customer(s)`);
  } catch (error) {
    summary.error = errorMessage(error);
    logger.error(`Error in ${name} analysis: ${summary.error}`);
  }

  return summary;
}

export async function runAnalyses(
  config: PipelineConfig,
  logger: Logger,
  options: RunAnalysesOptions = {}
): Promise<AnalysisRunSummary[]> {
  const names = options.names ?? ANALYSIS_NAMES;
  const files = options.files ?? (await findInterimFiles(config.interimDir));
  logger.info(`Analyzing ${files.length} interim document(s)`);

  const documents = await loadCustomerDocuments(files, logger);

  const summaries: AnalysisRunSummary[] = [];
  for (const name of names) {
    summaries.push(await runAnalysis(name, documents, config.resultsDir, logger));
  }
  return summaries;
}

/**
 * Full pass: prepare directories, format raw reports, analyze interim documents.
 */
export async function runPipeline(config: PipelineConfig, logger: Logger): Promise<PipelineResult> {
  await setupDirectoryStructure(config);
  logger.info('Directory structure created successfully');

  const batch = await formatReports(config, logger);
  const files = batch.processed.map((report) => ({
    filePath: report.outputPath,
    fileName: basename(report.outputPath),
  }));
  const analyses = await runAnalyses(config, logger, { files });
  logger.info('Analysis completed successfully');

  return { batch, analyses };
}
