#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { access, constants, readFile, writeFile, mkdir } from 'fs/promises';
import { resolve } from 'path';
import {
  normalize,
  parseXmlDocument,
  projectReport,
  serializeAnalysisDocument,
  toPlainValue,
  validateDirectory,
} from '@bureau-insights/report-parser';
import { ANALYSIS_NAMES, isAnalysisName } from '@bureau-insights/analysis';
import { PIPELINE_VERSION, errorMessage, type AnalysisName } from '@bureau-insights/types';
import { DEFAULT_DIRECTORIES, resolveConfig, type CliConfigOptions, type PipelineConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { formatReports, runAnalyses, runPipeline, setupDirectoryStructure } from './pipeline.js';

const program = new Command();

program
  .name('bureau-insights')
  .description('Normalize credit bureau XML reports and compute delinquency and disbursement metrics')
  .version(PIPELINE_VERSION);

function addPipelineOptions(command: Command): Command {
  return command
    .option('-i, --input-dir <directory>', `Directory containing XML reports (env BUREAU_INPUT_DIR, default ${DEFAULT_DIRECTORIES.input})`)
    .option('--interim-dir <directory>', `Directory for interim JSON documents (env BUREAU_INTERIM_DIR, default ${DEFAULT_DIRECTORIES.interim})`)
    .option('-r, --results-dir <directory>', `Directory for CSV results (env BUREAU_RESULTS_DIR, default ${DEFAULT_DIRECTORIES.results})`)
    .option('--log-dir <directory>', `Directory for run logs (env BUREAU_LOG_DIR, default ${DEFAULT_DIRECTORIES.logs})`)
    .option('-v, --verbose', 'Enable verbose output (env BUREAU_VERBOSE)')
    .option('-s, --strict', 'Validate every projected document before writing it (env BUREAU_STRICT)');
}

/**
 * Resolves configuration, opens the run log, and runs `task`. Setup failures
 * exit with status 1; failures inside the task are per-file and only logged.
 */
async function withPipeline(
  options: CliConfigOptions,
  task: (config: PipelineConfig, logger: Logger) => Promise<void>
): Promise<void> {
  let config: PipelineConfig;
  try {
    config = resolveConfig(options);
  } catch (error) {
    console.error(`[ERROR] Invalid configuration: ${errorMessage(error)}`);
    process.exit(1);
  }

  const logger = createLogger({ verbose: config.verbose, logDir: config.logDir });
  let failed = false;
  try {
    logger.debug(`Pipeline version: ${PIPELINE_VERSION}`);
    logger.debug(`Strict mode: ${config.strict ? 'enabled' : 'disabled'}`);
    await task(config, logger);
  } catch (error) {
    failed = true;
    logger.error(`Pipeline failed: ${errorMessage(error)}`);
    if (config.verbose && error instanceof Error && error.stack !== undefined) {
      logger.error(error.stack);
    }
  } finally {
    await logger.close();
  }

  if (failed) {
    process.exit(1);
  }
}

async function requireDirectory(path: string): Promise<void> {
  const validation = await validateDirectory(path);
  if (!validation.valid) {
    throw new Error(validation.error ?? `Cannot access directory: ${path}`);
  }
}

addPipelineOptions(
  program
    .command('run', { isDefault: true })
    .description('Format all XML reports, then run every analysis')
).action(async (options: CliConfigOptions) => {
  await withPipeline(options, async (config, logger) => {
    logger.info('Starting analysis pipeline...');
    await runPipeline(config, logger);

    console.log('\nAnalysis pipeline completed! Results can be found in:');
    console.log(`1. Interim data: ${config.interimDir}`);
    console.log(`2. Analysis results: ${config.resultsDir}`);
    console.log(`3. Logs: ${logger.logFile ?? config.logDir}`);
  });
});

addPipelineOptions(
  program
    .command('format')
    .description('Convert XML reports into interim JSON documents')
).action(async (options: CliConfigOptions) => {
  await withPipeline(options, async (config, logger) => {
    await requireDirectory(config.inputDir);
    await mkdir(config.interimDir, { recursive: true });
    const batch = await formatReports(config, logger);
    console.log(`\nProcessed ${batch.summary.reportsSucceeded} files successfully`);
  });
});

addPipelineOptions(
  program
    .command('analyze')
    .description('Run analyses over interim JSON documents and write CSV results')
    .option('-a, --analysis <name...>', `Analyses to run (${ANALYSIS_NAMES.join(', ')})`)
).action(async (options: CliConfigOptions & { analysis?: string[] }) => {
  await withPipeline(options, async (config, logger) => {
    const names: AnalysisName[] = [];
    for (const name of options.analysis ?? ANALYSIS_NAMES) {
      if (!isAnalysisName(name)) {
        throw new Error(`Unknown analysis "${name}". Available: ${ANALYSIS_NAMES.join(', ')}`);
      }
      names.push(name);
    }

    await requireDirectory(config.interimDir);
    const summaries = await runAnalyses(config, logger, { names });
    for (const summary of summaries) {
      console.log(`${summary.name}: ${summary.customersAnalyzed} customer(s), ${summary.outputFiles.length} file(s)`);
    }
  });
});

program
  .command('inspect')
  .description('Print the projected analysis document (or normalized tree) of one XML report')
  .argument('<xml-file>', 'Path to the bureau XML report')
  .option('--tree', 'Print the normalized tree instead of the projected document', false)
  .action(async (xmlFile: string, options: { tree: boolean }) => {
    try {
      const xml = await readFile(resolve(xmlFile));
      const tree = normalize(parseXmlDocument(xml));
      const output = options.tree
        ? `${JSON.stringify(toPlainValue(tree), null, 2)}\n`
        : serializeAnalysisDocument(projectReport(tree));
      process.stdout.write(output);
    } catch (error) {
      console.error(`[ERROR] ${errorMessage(error)}`);
      process.exit(1);
    }
  });

// Init command - create directory layout and .env template
program
  .command('init')
  .description('Create the data directories and a .env file')
  .option('--force', 'Overwrite an existing .env file', false)
  .action(async (options: { force: boolean }) => {
    const cwd = process.cwd();

    console.log('Initializing bureau-insights...\n');

    const envPath = resolve(cwd, '.env');
    if ((await fileExists(envPath)) && !options.force) {
      console.log('  [SKIP] .env already exists (use --force to overwrite)');
    } else {
      await writeFile(envPath, generateEnvTemplate(), 'utf-8');
      console.log('  [CREATE] .env');
    }

    const config = resolveConfig();
    await setupDirectoryStructure(config);
    await mkdir(config.logDir, { recursive: true });
    for (const dir of [config.inputDir, config.interimDir, config.resultsDir, config.logDir]) {
      console.log(`  [READY] ${dir}/`);
    }

    console.log(`\nNext steps:`);
    console.log(`  1. Place bureau XML reports in ./${config.inputDir}/`);
    console.log(`  2. Run: bureau-insights run`);
  });

// Helper to check if file exists
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function generateEnvTemplate(): string {
  return `# bureau-insights environment variables
# Generated by: bureau-insights init

# Directory containing bureau XML reports (equivalent to --input-dir)
BUREAU_INPUT_DIR=${DEFAULT_DIRECTORIES.input}

# Directory for interim JSON documents (equivalent to --interim-dir)
BUREAU_INTERIM_DIR=${DEFAULT_DIRECTORIES.interim}

# Directory for CSV results (equivalent to --results-dir)
BUREAU_RESULTS_DIR=${DEFAULT_DIRECTORIES.results}

# Directory for run logs (equivalent to --log-dir)
BUREAU_LOG_DIR=${DEFAULT_DIRECTORIES.logs}

# Enable verbose output (true/false)
# BUREAU_VERBOSE=false

# Validate projected documents before writing (true/false)
# BUREAU_STRICT=false
`;
}

program.parseAsync().catch((error: unknown) => {
  console.error(`[ERROR] ${errorMessage(error)}`);
  process.exit(1);
});
