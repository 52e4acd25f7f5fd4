/**
 * Scoring configuration loader with named presets.
 *
 * config/scoring.json (snake_case) is validated against its JSON schema,
 * merged over the defaults, then a preset from config/presets/<name>.json may
 * replace the weights and tighten filters. The merged result must pass
 * assertValidScoringConfig; weights are never rescaled to sum to 1.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { getConfig } from '@/core/config';
import { ConfigurationError } from '@/core/errors';
import { validatePreset, validateScoringConfig } from '@/validation/ajv_instance';
import type { RateLimiterConfig } from '@/providers/rate_limiter';
import type { RetryConfig } from '@/providers/http_client';
import type { VolatilityBand } from '@/indicators';
import { DIMENSIONS, type DimensionWeights } from './types';

export const WEIGHT_SUM_TOLERANCE = 1e-6;

// Longest delay setTimeout honours; larger values fire at once
export const MAX_TIMER_MS = 2_147_483_647;

export interface LookbackConfig {
  short: number;
  medium: number;
  long: number;
  relativeStrength: number;
  volumeBaseline: number;
  volumeRecent: number;
  volatilityWindow: number;
  /** Bars requested per symbol */
  historyBars: number;
  /** Fewer bars than this rejects the symbol */
  minHistoryBars: number;
}

export interface FilterConfig {
  minPrice: number;
  maxPrice: number;
  minAvgVolume: number;
  excludeSectors: string[];
}

export interface ScoringConfig {
  rateLimits: {
    fmp: RateLimiterConfig;
    polygon: RateLimiterConfig;
  };
  retry: RetryConfig;
  lookbacks: LookbackConfig;
  rsi: {
    period: number;
    oversold: number;
    overbought: number;
  };
  volumeSpikeMultiplier: number;
  breakout: {
    period: number;
    thresholdFraction: number;
  };
  volatilityBand: VolatilityBand;
  weights: DimensionWeights;
  filters: FilterConfig;
  features: {
    enableOptions: boolean;
    enableFundamentals: boolean;
  };
  pipeline: {
    maxConcurrency: number;
    runTimeoutMs: number;
    topN: number;
    minCompositeScore: number;
  };
  benchmark: string;
  sectorEtfs: Record<string, string>;
  /** Name of the applied preset, if any */
  preset: string | null;
}

interface RawRateLimit {
  requests_per_minute?: number;
  max_concurrent?: number;
}

interface RawFilters {
  min_price?: number;
  max_price?: number;
  min_avg_volume?: number;
  exclude_sectors?: string[];
}

export interface RawScoringConfig {
  rate_limits?: { fmp?: RawRateLimit; polygon?: RawRateLimit };
  retry?: { max_attempts?: number; initial_backoff_ms?: number };
  lookbacks?: {
    short?: number;
    medium?: number;
    long?: number;
    relative_strength?: number;
    volume_baseline?: number;
    volume_recent?: number;
    volatility_window?: number;
    history_bars?: number;
    min_history_bars?: number;
  };
  rsi?: { period?: number; oversold?: number; overbought?: number };
  volume_spike_multiplier?: number;
  breakout?: { period?: number; threshold_fraction?: number };
  volatility_band?: Partial<VolatilityBand>;
  weights?: Partial<DimensionWeights>;
  filters?: RawFilters;
  features?: { enable_options?: boolean; enable_fundamentals?: boolean };
  pipeline?: {
    max_concurrency?: number;
    run_timeout_ms?: number;
    top_n?: number;
    min_composite_score?: number;
  };
  benchmark?: string;
  sector_etfs?: Record<string, string>;
}

export interface RawPresetConfig {
  name?: string;
  description?: string;
  weights: DimensionWeights;
  filters?: RawFilters;
}

export const DEFAULT_CONFIG: ScoringConfig = {
  rateLimits: {
    fmp: { maxRequestsPerMinute: 300, maxConcurrent: 5 },
    polygon: { maxRequestsPerMinute: 100, maxConcurrent: 3 },
  },
  retry: { maxAttempts: 3, initialBackoffMs: 1000 },
  lookbacks: {
    short: 5,
    medium: 20,
    long: 60,
    relativeStrength: 5,
    volumeBaseline: 20,
    volumeRecent: 5,
    volatilityWindow: 20,
    historyBars: 120,
    minHistoryBars: 65,
  },
  rsi: { period: 14, oversold: 30, overbought: 70 },
  volumeSpikeMultiplier: 2.0,
  breakout: { period: 20, thresholdFraction: 0.01 },
  volatilityBand: { low: 15, peak: 40, high: 90 },
  weights: {
    momentum: 0.18,
    volume: 0.1,
    technical: 0.15,
    volatility: 0.08,
    relative_strength: 0.1,
    sentiment: 0.08,
    liquidity: 0.06,
    fundamental_quality: 0.09,
    short_interest: 0.05,
    growth: 0.05,
    options: 0.06,
  },
  filters: {
    minPrice: 2,
    maxPrice: 10000,
    minAvgVolume: 100000,
    excludeSectors: [],
  },
  features: { enableOptions: true, enableFundamentals: true },
  pipeline: {
    maxConcurrency: 4,
    runTimeoutMs: 30 * 60 * 1000,
    topN: 25,
    minCompositeScore: 0,
  },
  benchmark: 'SPY',
  sectorEtfs: {},
  preset: null,
};

// Longest moving average in the stack
export const SLOW_MA_PERIOD = 50;

export const ATR_PERIOD = 14;
// Bars between the two ATR readings compared for expansion
export const ATR_EXPANSION_LOOKBACK = 14;

/** Bars the indicator set needs for the configured windows */
export function requiredHistoryBars(config: ScoringConfig): number {
  const { lookbacks, rsi, breakout } = config;
  return Math.max(
    lookbacks.short + 1,
    lookbacks.medium + 1,
    lookbacks.long + 1,
    lookbacks.relativeStrength + 1,
    lookbacks.volumeBaseline + lookbacks.volumeRecent,
    lookbacks.volumeBaseline + 1,
    lookbacks.volatilityWindow + 1,
    rsi.period + 1,
    breakout.period + 1,
    SLOW_MA_PERIOD,
    ATR_PERIOD + ATR_EXPANSION_LOOKBACK + 1
  );
}

export function weightSum(weights: DimensionWeights): number {
  return DIMENSIONS.reduce((sum, dimension) => sum + weights[dimension], 0);
}

/**
 * Throws ConfigurationError listing every problem found.
 */
export function assertValidScoringConfig(config: ScoringConfig): void {
  const problems: string[] = [];

  const total = weightSum(config.weights);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`weights must sum to 1.0 (got ${total})`);
  }
  for (const dimension of DIMENSIONS) {
    const weight = config.weights[dimension];
    if (!Number.isFinite(weight) || weight < 0) {
      problems.push(`weights.${dimension} must be a non-negative number`);
    }
  }

  const { filters, lookbacks, rsi, volatilityBand: band } = config;
  if (filters.minPrice > filters.maxPrice) {
    problems.push(`filters.min_price (${filters.minPrice}) exceeds max_price (${filters.maxPrice})`);
  }
  if (!(band.low < band.peak && band.peak < band.high)) {
    problems.push('volatility_band must satisfy low < peak < high');
  }
  if (rsi.oversold >= rsi.overbought) {
    problems.push('rsi.oversold must be below rsi.overbought');
  }
  if (!(lookbacks.short <= lookbacks.medium && lookbacks.medium <= lookbacks.long)) {
    problems.push('lookbacks must satisfy short <= medium <= long');
  }
  if (lookbacks.minHistoryBars > lookbacks.historyBars) {
    problems.push('lookbacks.min_history_bars exceeds history_bars');
  }
  const required = requiredHistoryBars(config);
  if (lookbacks.minHistoryBars < required) {
    problems.push(
      `lookbacks.min_history_bars (${lookbacks.minHistoryBars}) is below the ${required} bars the indicators need`
    );
  }

  if (config.pipeline.runTimeoutMs > MAX_TIMER_MS) {
    problems.push(`pipeline.run_timeout_ms (${config.pipeline.runTimeoutMs}) exceeds ${MAX_TIMER_MS}`);
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid scoring configuration: ${problems.join('; ')}`, problems);
  }
}

function mergeRateLimit(base: RateLimiterConfig, override?: RawRateLimit): RateLimiterConfig {
  if (!override) return base;
  return {
    maxRequestsPerMinute: override.requests_per_minute ?? base.maxRequestsPerMinute,
    maxConcurrent: override.max_concurrent ?? base.maxConcurrent,
  };
}

function mergeFilters(base: FilterConfig, override?: RawFilters): FilterConfig {
  if (!override) return base;
  return {
    minPrice: override.min_price ?? base.minPrice,
    maxPrice: override.max_price ?? base.maxPrice,
    minAvgVolume: override.min_avg_volume ?? base.minAvgVolume,
    excludeSectors: override.exclude_sectors ?? base.excludeSectors,
  };
}

function mergeWeights(
  base: DimensionWeights,
  override?: Partial<DimensionWeights>
): DimensionWeights {
  if (!override) return base;
  const merged: DimensionWeights = { ...base };
  for (const dimension of DIMENSIONS) {
    merged[dimension] = override[dimension] ?? base[dimension];
  }
  return merged;
}

export function mergeScoringConfig(
  base: ScoringConfig,
  raw: RawScoringConfig
): ScoringConfig {
  const lb = raw.lookbacks ?? {};
  return {
    rateLimits: {
      fmp: mergeRateLimit(base.rateLimits.fmp, raw.rate_limits?.fmp),
      polygon: mergeRateLimit(base.rateLimits.polygon, raw.rate_limits?.polygon),
    },
    retry: {
      maxAttempts: raw.retry?.max_attempts ?? base.retry.maxAttempts,
      initialBackoffMs: raw.retry?.initial_backoff_ms ?? base.retry.initialBackoffMs,
    },
    lookbacks: {
      short: lb.short ?? base.lookbacks.short,
      medium: lb.medium ?? base.lookbacks.medium,
      long: lb.long ?? base.lookbacks.long,
      relativeStrength: lb.relative_strength ?? base.lookbacks.relativeStrength,
      volumeBaseline: lb.volume_baseline ?? base.lookbacks.volumeBaseline,
      volumeRecent: lb.volume_recent ?? base.lookbacks.volumeRecent,
      volatilityWindow: lb.volatility_window ?? base.lookbacks.volatilityWindow,
      historyBars: lb.history_bars ?? base.lookbacks.historyBars,
      minHistoryBars: lb.min_history_bars ?? base.lookbacks.minHistoryBars,
    },
    rsi: {
      period: raw.rsi?.period ?? base.rsi.period,
      oversold: raw.rsi?.oversold ?? base.rsi.oversold,
      overbought: raw.rsi?.overbought ?? base.rsi.overbought,
    },
    volumeSpikeMultiplier: raw.volume_spike_multiplier ?? base.volumeSpikeMultiplier,
    breakout: {
      period: raw.breakout?.period ?? base.breakout.period,
      thresholdFraction: raw.breakout?.threshold_fraction ?? base.breakout.thresholdFraction,
    },
    volatilityBand: { ...base.volatilityBand, ...raw.volatility_band },
    weights: mergeWeights(base.weights, raw.weights),
    filters: mergeFilters(base.filters, raw.filters),
    features: {
      enableOptions: raw.features?.enable_options ?? base.features.enableOptions,
      enableFundamentals: raw.features?.enable_fundamentals ?? base.features.enableFundamentals,
    },
    pipeline: {
      maxConcurrency: raw.pipeline?.max_concurrency ?? base.pipeline.maxConcurrency,
      runTimeoutMs: raw.pipeline?.run_timeout_ms ?? base.pipeline.runTimeoutMs,
      topN: raw.pipeline?.top_n ?? base.pipeline.topN,
      minCompositeScore: raw.pipeline?.min_composite_score ?? base.pipeline.minCompositeScore,
    },
    benchmark: raw.benchmark ?? base.benchmark,
    sectorEtfs: raw.sector_etfs ?? base.sectorEtfs,
    preset: base.preset,
  };
}

export function applyPreset(
  base: ScoringConfig,
  preset: RawPresetConfig,
  presetName: string
): ScoringConfig {
  return {
    ...base,
    weights: mergeWeights(base.weights, preset.weights),
    filters: mergeFilters(base.filters, preset.filters),
    preset: presetName,
  };
}

function readJson(path: string, label: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${label}_invalid_json: ${path}: ${detail}`);
  }
}

export function loadRawConfig(path: string): RawScoringConfig | null {
  if (!existsSync(path)) {
    return null;
  }
  const result = validateScoringConfig(readJson(path, 'scoring_config'));
  if (!result.valid) {
    throw new ConfigurationError(
      `scoring_config_invalid_schema: ${path}: ${result.errors.join('; ')}`,
      result.errors
    );
  }
  return result.data;
}

export function loadPreset(presetsDir: string, name: string): RawPresetConfig {
  const presetPath = join(presetsDir, `${name}.json`);
  if (!existsSync(presetPath)) {
    throw new ConfigurationError(`preset_not_found: ${presetPath}`);
  }
  const result = validatePreset(readJson(presetPath, 'preset'));
  if (!result.valid) {
    throw new ConfigurationError(
      `preset_invalid_schema: ${presetPath}: ${result.errors.join('; ')}`,
      result.errors
    );
  }
  return result.data;
}

export interface LoadScoringConfigOptions {
  configPath?: string;
  presetsDir?: string;
  presetName?: string | null;
}

/**
 * Defaults, then scoring.json, then the preset. Throws ConfigurationError
 * before anything is fetched when the result is unusable.
 */
export function loadScoringConfig(options: LoadScoringConfigOptions = {}): ScoringConfig {
  const appConfig = getConfig();
  const configPath = options.configPath ?? join(appConfig.configDir, 'scoring.json');
  const presetsDir = options.presetsDir ?? appConfig.presetsDir;
  const presetName =
    options.presetName === undefined
      ? (process.env.SCORING_PRESET || '').trim() || null
      : options.presetName;

  const raw = loadRawConfig(configPath);
  let config = raw ? mergeScoringConfig(DEFAULT_CONFIG, raw) : DEFAULT_CONFIG;

  if (presetName) {
    config = applyPreset(config, loadPreset(presetsDir, presetName), presetName);
  }

  assertValidScoringConfig(config);
  return config;
}
