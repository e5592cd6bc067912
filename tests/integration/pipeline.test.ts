import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createLogger, type Logger } from '../../apps/cli/src/logger.js';
import type { PipelineConfig } from '../../apps/cli/src/config.js';
import { findInterimFiles, runAnalyses, runPipeline } from '../../apps/cli/src/pipeline.js';
import { GOLD_LOAN, reportXml, responseXml } from '../fixtures/reports.js';

describe('pipeline', () => {
  let testDir: string;
  let config: PipelineConfig;
  let lines: string[];
  let logger: Logger;

  beforeEach(async () => {
    testDir = join(tmpdir(), `pipeline-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    config = {
      inputDir: join(testDir, 'raw_files', 'xml'),
      interimDir: join(testDir, 'interim'),
      resultsDir: join(testDir, 'results'),
      logDir: join(testDir, 'logs'),
      verbose: false,
      strict: false,
    };
    lines = [];
    logger = createLogger({ write: (line) => lines.push(line) });
    await mkdir(config.inputDir, { recursive: true });
  });

  afterEach(async () => {
    await logger.close();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should format reports and write every analysis', async () => {
    await writeFile(join(config.inputDir, '1001.xml'), reportXml());
    await writeFile(join(config.inputDir, '1002.xml'), reportXml([responseXml(GOLD_LOAN)]));
    await writeFile(join(config.inputDir, '1003.xml'), '<broken>');

    const result = await runPipeline(config, logger);

    expect(result.batch.summary.reportsSucceeded).toBe(2);
    expect(result.batch.errors.map((error) => error.fileName)).toEqual(['1003.xml']);
    expect(result.analyses.map((summary) => [summary.name, summary.customersAnalyzed])).toEqual([
      ['dpd', 2],
      ['max_dpd_months', 2],
      ['disbursements', 2],
    ]);

    expect((await readdir(config.resultsDir)).sort()).toEqual([
      'disbursements_analysis',
      'dpd_analysis',
      'max_dpd_months_analysis',
    ]);
    expect(await readFile(join(config.resultsDir, 'dpd_analysis', 'dpd_summary.csv'), 'utf-8')).toBe(
      'Customer ID,Total Trades,30+ DPD Trades,Percentage\n1001,2,1,50%\n1002,1,0,0%\n'
    );
    expect(lines).toContain('[INFO] Formatted 2/3 report(s), 1 failed, 3 loan(s) total');
  });

  it('should analyze only the reports formatted in the run', async () => {
    await mkdir(config.interimDir, { recursive: true });
    await writeFile(join(config.interimDir, 'formatted_9999.json'), '{}');
    await writeFile(join(config.inputDir, '1001.xml'), reportXml());

    const result = await runPipeline(config, logger);

    expect(result.analyses[0]?.customersAnalyzed).toBe(1);
    expect(lines.some((line) => line.startsWith('[ERROR]'))).toBe(false);
  });

  it('should log undecodable payments and keep the customer', async () => {
    await writeFile(
      join(config.inputDir, '1004.xml'),
      reportXml([responseXml({ type: 'Credit Card', history: '01-2022,ABC/STD|02-2022,030/SMA' })])
    );

    const result = await runPipeline(config, logger);

    expect(result.analyses[0]).toMatchObject({ name: 'dpd', customersAnalyzed: 1, warnings: 1 });
    expect(lines).toContain(
      '[WARN] dpd: customer 1004: skipped payment (loan 1, 01-2022: Malformed status code "ABC/STD": unknown days-past-due value "ABC")'
    );
    expect(await readFile(join(config.resultsDir, 'dpd_analysis', 'dpd_summary.csv'), 'utf-8')).toBe(
      'Customer ID,Total Trades,30+ DPD Trades,Percentage\n1004,1,1,100%\n'
    );
  });

  it('should run selected analyses over the interim directory', async () => {
    await mkdir(config.interimDir, { recursive: true });
    await writeFile(join(config.inputDir, '1001.xml'), reportXml());
    await runPipeline(config, logger);
    await writeFile(join(config.interimDir, 'formatted_2002.json'), '{"loans": []}');
    await rm(config.resultsDir, { recursive: true, force: true });

    const files = await findInterimFiles(config.interimDir);
    expect(files.map((file) => file.fileName)).toEqual(['formatted_1001.json', 'formatted_2002.json']);

    const summaries = await runAnalyses(config, logger, { names: ['disbursements'] });

    expect(summaries).toHaveLength(1);
    expect(summaries[0]?.customersAnalyzed).toBe(1);
    expect(await readdir(config.resultsDir)).toEqual(['disbursements_analysis']);
    expect(lines.some((line) => line.startsWith(`[ERROR] Error reading ${join(config.interimDir, 'formatted_2002.json')}`))).toBe(
      true
    );
  });
});
