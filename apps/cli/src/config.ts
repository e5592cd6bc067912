import { z } from 'zod';

export const DEFAULT_DIRECTORIES = {
  input: 'data/raw_files/xml',
  interim: 'data/interim',
  results: 'data/results',
  logs: 'logs',
} as const;

export const PipelineConfigSchema = z.object({
  inputDir: z.string().min(1, 'Input directory must not be empty'),
  interimDir: z.string().min(1, 'Interim directory must not be empty'),
  resultsDir: z.string().min(1, 'Results directory must not be empty'),
  logDir: z.string().min(1, 'Log directory must not be empty'),
  verbose: z.boolean(),
  strict: z.boolean(),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface CliConfigOptions {
  inputDir?: string | undefined;
  interimDir?: string | undefined;
  resultsDir?: string | undefined;
  logDir?: string | undefined;
  verbose?: boolean | undefined;
  strict?: boolean | undefined;
}

type Env = Record<string, string | undefined>;

// Helper to parse boolean env vars
export const envBool = (env: Env, key: string, defaultVal: boolean): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

const envString = (env: Env, key: string): string | undefined => {
  const val = env[key];
  return val === undefined || val === '' ? undefined : val;
};

/**
 * Resolve pipeline configuration with precedence:
 * 1. CLI flag
 * 2. Environment variable (BUREAU_*)
 * 3. Default
 */
export function resolveConfig(cli: CliConfigOptions = {}, env: Env = process.env): PipelineConfig {
  return PipelineConfigSchema.parse({
    inputDir: cli.inputDir ?? envString(env, 'BUREAU_INPUT_DIR') ?? DEFAULT_DIRECTORIES.input,
    interimDir: cli.interimDir ?? envString(env, 'BUREAU_INTERIM_DIR') ?? DEFAULT_DIRECTORIES.interim,
    resultsDir: cli.resultsDir ?? envString(env, 'BUREAU_RESULTS_DIR') ?? DEFAULT_DIRECTORIES.results,
    logDir: cli.logDir ?? envString(env, 'BUREAU_LOG_DIR') ?? DEFAULT_DIRECTORIES.logs,
    verbose: cli.verbose ?? envBool(env, 'BUREAU_VERBOSE', false),
    strict: cli.strict ?? envBool(env, 'BUREAU_STRICT', false),
  });
}
