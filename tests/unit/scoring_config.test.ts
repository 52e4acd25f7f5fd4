import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '@/core/errors';
import {
  DEFAULT_CONFIG,
  MAX_TIMER_MS,
  assertValidScoringConfig,
  loadScoringConfig,
  requiredHistoryBars,
  weightSum,
} from '@/scoring/scoring_config';

const PRESETS_DIR = fileURLToPath(new URL('../../config/presets', import.meta.url));
const BUNDLED_CONFIG = fileURLToPath(new URL('../../config/scoring.json', import.meta.url));

let tempDir: string;
let originalPreset: string | undefined;

function captureConfigError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('scoring config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'scoring-config-'));
    mkdirSync(join(tempDir, 'presets'), { recursive: true });
    originalPreset = process.env.SCORING_PRESET;
    delete process.env.SCORING_PRESET;
  });

  afterEach(() => {
    if (originalPreset === undefined) {
      delete process.env.SCORING_PRESET;
    } else {
      process.env.SCORING_PRESET = originalPreset;
    }
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const path = join(tempDir, 'scoring.json');
    writeFileSync(path, JSON.stringify(content));
    return path;
  }

  it('loads defaults when no scoring.json exists', () => {
    const config = loadScoringConfig({ configPath: join(tempDir, 'missing.json'), presetName: null });

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(weightSum(config.weights)).toBeCloseTo(1, 10);
  });

  it('loads the bundled configuration', () => {
    const config = loadScoringConfig({ configPath: BUNDLED_CONFIG, presetName: null });

    expect(config.sectorEtfs.Technology).toBe('XLK');
    expect(config.preset).toBeNull();
  });

  it('overrides defaults from snake_case keys', () => {
    const config = loadScoringConfig({
      configPath: writeConfig({ rsi: { period: 10 }, filters: { min_price: 3 }, benchmark: 'QQQ' }),
      presetName: null,
    });

    expect(config.rsi).toEqual({ period: 10, oversold: 30, overbought: 70 });
    expect(config.filters.minPrice).toBe(3);
    expect(config.filters.maxPrice).toBe(DEFAULT_CONFIG.filters.maxPrice);
    expect(config.benchmark).toBe('QQQ');
  });

  it('rejects weights that do not sum to 1 instead of normalizing them', () => {
    const error = captureConfigError(() =>
      loadScoringConfig({ configPath: writeConfig({ weights: { momentum: 0.5 } }), presetName: null })
    );

    expect(error.message).toMatch(/weights must sum to 1.0/);
  });

  it('rejects schema violations', () => {
    const error = captureConfigError(() =>
      loadScoringConfig({ configPath: writeConfig({ weights: { momentum: 'high' } }), presetName: null })
    );

    expect(error.message).toMatch(/^scoring_config_invalid_schema:/);
    expect(error.details.length).toBeGreaterThan(0);
  });

  it('rejects a run timeout setTimeout cannot hold', () => {
    expect(() =>
      loadScoringConfig({
        configPath: writeConfig({ pipeline: { run_timeout_ms: 3_000_000_000 } }),
        presetName: null,
      })
    ).toThrow(/^scoring_config_invalid_schema:/);
  });

  it('rejects unknown keys', () => {
    expect(() =>
      loadScoringConfig({ configPath: writeConfig({ weigths: {} }), presetName: null })
    ).toThrow(/scoring_config_invalid_schema/);
  });

  it('applies a bundled preset by name', () => {
    const config = loadScoringConfig({
      configPath: join(tempDir, 'missing.json'),
      presetsDir: PRESETS_DIR,
      presetName: 'quality_swing',
    });

    expect(config.preset).toBe('quality_swing');
    expect(config.weights.fundamental_quality).toBe(0.16);
    expect(config.filters.minPrice).toBe(5);
    expect(config.filters.minAvgVolume).toBe(250000);
  });

  it('reads the preset name from SCORING_PRESET', () => {
    process.env.SCORING_PRESET = 'momentum';

    const config = loadScoringConfig({ configPath: join(tempDir, 'missing.json'), presetsDir: PRESETS_DIR });

    expect(config.preset).toBe('momentum');
    expect(config.weights.momentum).toBe(0.26);
  });

  it('fails on an unknown preset', () => {
    expect(() =>
      loadScoringConfig({ configPath: join(tempDir, 'missing.json'), presetsDir: PRESETS_DIR, presetName: 'yolo' })
    ).toThrow(/^preset_not_found:/);
  });

  it('fails on a preset missing a dimension', () => {
    writeFileSync(join(tempDir, 'presets', 'partial.json'), JSON.stringify({ weights: { momentum: 1 } }));

    expect(() =>
      loadScoringConfig({
        configPath: join(tempDir, 'missing.json'),
        presetsDir: join(tempDir, 'presets'),
        presetName: 'partial',
      })
    ).toThrow(/^preset_invalid_schema:/);
  });

  it('bundled presets all sum to 1', () => {
    for (const name of ['momentum', 'quality_swing', 'squeeze']) {
      const config = loadScoringConfig({
        configPath: join(tempDir, 'missing.json'),
        presetsDir: PRESETS_DIR,
        presetName: name,
      });
      expect(weightSum(config.weights)).toBeCloseTo(1, 6);
    }
  });
});

describe('assertValidScoringConfig', () => {
  it('accepts the defaults', () => {
    expect(() => assertValidScoringConfig(DEFAULT_CONFIG)).not.toThrow();
  });

  it('lists every problem found', () => {
    const error = captureConfigError(() =>
      assertValidScoringConfig({
        ...DEFAULT_CONFIG,
        filters: { ...DEFAULT_CONFIG.filters, minPrice: 50, maxPrice: 10 },
        volatilityBand: { low: 40, peak: 30, high: 90 },
      })
    );

    expect(error.details).toEqual([
      'filters.min_price (50) exceeds max_price (10)',
      'volatility_band must satisfy low < peak < high',
    ]);
  });

  it('caps the run timeout at the largest timer delay', () => {
    expect(() =>
      assertValidScoringConfig({ ...DEFAULT_CONFIG, pipeline: { ...DEFAULT_CONFIG.pipeline, runTimeoutMs: MAX_TIMER_MS } })
    ).not.toThrow();

    const error = captureConfigError(() =>
      assertValidScoringConfig({
        ...DEFAULT_CONFIG,
        pipeline: { ...DEFAULT_CONFIG.pipeline, runTimeoutMs: 3_000_000_000 },
      })
    );
    expect(error.details).toEqual(['pipeline.run_timeout_ms (3000000000) exceeds 2147483647']);
  });

  it('requires min history to cover the indicator windows', () => {
    expect(requiredHistoryBars(DEFAULT_CONFIG)).toBe(61);

    const error = captureConfigError(() =>
      assertValidScoringConfig({
        ...DEFAULT_CONFIG,
        lookbacks: { ...DEFAULT_CONFIG.lookbacks, minHistoryBars: 30 },
      })
    );
    expect(error.details).toEqual([
      'lookbacks.min_history_bars (30) is below the 61 bars the indicators need',
    ]);
  });
});
