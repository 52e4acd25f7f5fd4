import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { join } from 'path';
import { getConfig, resetConfig } from '@/core/config';
import { getEnvConfig, loadEnvConfig, resetEnvConfig } from '@/core/env';
import { ConfigurationError } from '@/core/errors';

const KEYS = ['TICKERS_FILE', 'OUTPUT_DIR', 'FMP_API_KEY', 'POLYGON_API_KEY', 'SCORING_PRESET', 'LOG_LEVEL'];
const originalEnv: Record<string, string | undefined> = {};

beforeEach(() => {
  for (const key of KEYS) {
    originalEnv[key] = process.env[key];
    delete process.env[key];
  }
  resetConfig();
  resetEnvConfig();
});

afterEach(() => {
  for (const key of KEYS) {
    if (originalEnv[key] === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = originalEnv[key];
    }
  }
  resetConfig();
  resetEnvConfig();
});

describe('app config', () => {
  it('resolves default paths from the working directory', () => {
    const root = process.cwd();
    const config = getConfig();

    expect(config.presetsDir).toBe(join(root, 'config', 'presets'));
    expect(config.tickersFile).toBe(join(root, 'config', 'tickers.txt'));
    expect(config.outputDir).toBe(join(root, 'output'));
  });

  it('takes relative and absolute overrides', () => {
    process.env.TICKERS_FILE = 'lists/energy.txt';
    process.env.OUTPUT_DIR = '/tmp/scans';

    const config = getConfig();

    expect(config.tickersFile).toBe(join(process.cwd(), 'lists', 'energy.txt'));
    expect(config.outputDir).toBe('/tmp/scans');
  });

  it('caches until reset', () => {
    const first = getConfig();
    process.env.OUTPUT_DIR = '/tmp/other';

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().outputDir).toBe('/tmp/other');
  });
});

describe('env config', () => {
  it('requires the FMP key', () => {
    expect(() => loadEnvConfig()).toThrow(ConfigurationError);
    expect(() => loadEnvConfig()).toThrow('Missing required environment variable: FMP_API_KEY');
  });

  it('treats optional values as null and falls back on unknown log levels', () => {
    process.env.FMP_API_KEY = 'test-secret';
    process.env.POLYGON_API_KEY = '   ';
    process.env.LOG_LEVEL = 'verbose';

    const env = getEnvConfig();

    expect(env.fmpApiKey).toBe('test-secret');
    expect(env.polygonApiKey).toBeNull();
    expect(env.scoringPreset).toBeNull();
    expect(env.logLevel).toBe('info');
  });

  it('reads the preset and log level', () => {
    process.env.FMP_API_KEY = 'test-secret';
    process.env.POLYGON_API_KEY = 'test-polygon';
    process.env.SCORING_PRESET = 'squeeze';
    process.env.LOG_LEVEL = 'debug';

    expect(loadEnvConfig()).toMatchObject({
      polygonApiKey: 'test-polygon',
      scoringPreset: 'squeeze',
      logLevel: 'debug',
      nodeEnv: 'test',
    });
  });
});
