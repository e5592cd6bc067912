import { describe, it, expect } from 'vitest';
import { DEFAULT_DIRECTORIES, envBool, resolveConfig } from '../../apps/cli/src/config.js';

describe('envBool', () => {
  it('should parse true and 1 as enabled', () => {
    expect(envBool({ FLAG: 'true' }, 'FLAG', false)).toBe(true);
    expect(envBool({ FLAG: '1' }, 'FLAG', false)).toBe(true);
    expect(envBool({ FLAG: 'yes' }, 'FLAG', true)).toBe(false);
  });

  it('should fall back to the default when unset or empty', () => {
    expect(envBool({}, 'FLAG', true)).toBe(true);
    expect(envBool({ FLAG: '' }, 'FLAG', false)).toBe(false);
  });
});

describe('resolveConfig', () => {
  it('should use defaults without flags or environment', () => {
    expect(resolveConfig({}, {})).toEqual({
      inputDir: DEFAULT_DIRECTORIES.input,
      interimDir: 'data/interim',
      resultsDir: 'data/results',
      logDir: 'logs',
      verbose: false,
      strict: false,
    });
  });

  it('should read BUREAU_ environment variables', () => {
    const config = resolveConfig(
      {},
      {
        BUREAU_INPUT_DIR: 'in',
        BUREAU_INTERIM_DIR: 'mid',
        BUREAU_RESULTS_DIR: 'out',
        BUREAU_LOG_DIR: 'log',
        BUREAU_VERBOSE: 'true',
        BUREAU_STRICT: '1',
      }
    );
    expect(config).toEqual({
      inputDir: 'in',
      interimDir: 'mid',
      resultsDir: 'out',
      logDir: 'log',
      verbose: true,
      strict: true,
    });
  });

  it('should prefer CLI flags over the environment', () => {
    const config = resolveConfig(
      { inputDir: 'cli-in', verbose: false },
      { BUREAU_INPUT_DIR: 'env-in', BUREAU_VERBOSE: 'true', BUREAU_RESULTS_DIR: 'env-out' }
    );
    expect(config.inputDir).toBe('cli-in');
    expect(config.verbose).toBe(false);
    expect(config.resultsDir).toBe('env-out');
  });

  it('should ignore empty environment values', () => {
    expect(resolveConfig({}, { BUREAU_INTERIM_DIR: '' }).interimDir).toBe('data/interim');
  });

  it('should reject an empty directory flag', () => {
    expect(() => resolveConfig({ resultsDir: '' }, {})).toThrow('Results directory must not be empty');
  });
});
