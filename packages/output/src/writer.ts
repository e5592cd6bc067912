import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { AnalysisName, AnalysisStatsByName, CustomerResult } from '@bureau-insights/types';
import type { CsvFile, CsvOptions } from './csv.js';
import { renderDpdReports } from './dpd-report.js';
import { renderMaxDpdReports } from './max-dpd-report.js';
import { renderDisbursementReports } from './disbursement-report.js';

export type ReportRenderer<N extends AnalysisName> = (
  results: readonly CustomerResult<AnalysisStatsByName[N]>[],
  options?: CsvOptions
) => CsvFile[];

export const REPORT_RENDERERS: { readonly [N in AnalysisName]: ReportRenderer<N> } = {
  dpd: renderDpdReports,
  max_dpd_months: renderMaxDpdReports,
  disbursements: renderDisbursementReports,
};

/** `<resultsDir>/<analysis>_analysis` */
export function analysisOutputDir(resultsDir: string, name: AnalysisName): string {
  return join(resultsDir, `${name}_analysis`);
}

export async function writeCsvFiles(files: readonly CsvFile[], outputDir: string): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });
  const written: string[] = [];
  for (const file of files) {
    const filePath = join(outputDir, file.filename);
    await writeFile(filePath, file.content, 'utf-8');
    written.push(filePath);
  }
  return written;
}

/**
 * Renders one analysis' results and writes them under its own directory.
 * Returns the written file paths.
 */
export async function writeAnalysisReports<N extends AnalysisName>(
  name: N,
  results: readonly CustomerResult<AnalysisStatsByName[N]>[],
  resultsDir: string,
  options: CsvOptions = {}
): Promise<string[]> {
  const render: ReportRenderer<N> = REPORT_RENDERERS[name];
  return writeCsvFiles(render(results, options), analysisOutputDir(resultsDir, name));
}
