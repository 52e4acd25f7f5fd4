/**
 * Price and volume sub-scores: momentum, volume, technical, volatility,
 * relative strength and liquidity.
 *
 * Callers pass series that already passed the history filter, so these
 * functions do not re-check lengths. Percent inputs are mapped to 0-100 by
 * reference points, blended, then reported on 0-10.
 */

import type { OHLCVBar, Quote, ReferenceSeries } from '@/providers/types';
import {
  acceleration,
  atrExpansion,
  atrPercent,
  averageDollarVolume,
  bandScore,
  breakout,
  highVolumeClusterPct,
  movingAverageStack,
  realizedVolatility,
  relativeStrength,
  returnOverWindow,
  rsi,
  sma,
  volumeRatio,
  volumeTrend,
} from '@/indicators';
import { interpolateReferencePoints, inverseReferencePoints, linearScale, toSubScore } from './normalize';
import {
  ATR_EXPANSION_LOOKBACK,
  ATR_PERIOD,
  SLOW_MA_PERIOD,
  type ScoringConfig,
} from './scoring_config';
import { NEUTRAL_SCORE, makeSubScore, type SubScore } from './types';

const SHORT_RETURN_REFS = [-10, -5, -2, 0, 2, 5, 10, 20];
const MEDIUM_RETURN_REFS = [-20, -10, -5, 0, 5, 10, 20, 40];
const ACCELERATION_REFS = [-10, -5, -2, 0, 2, 5, 10, 20];

const VOLUME_RATIO_REFS = [0.5, 0.7, 0.9, 1.0, 1.2, 1.5, 2.0, 3.0];
const VOLUME_TREND_REFS = [0.5, 0.7, 0.85, 1.0, 1.1, 1.25, 1.5, 2.0];
const VOLUME_CLUSTER_REFS = [0, 10, 20, 30, 40, 60, 80, 100];

// Latest ATR over the ATR ATR_EXPANSION_LOOKBACK bars earlier
const ATR_EXPANSION_REFS = [0.8, 0.9, 0.95, 1.0, 1.05, 1.1, 1.2, 1.5];

const EXCESS_RETURN_REFS = [-10, -5, -2, 0, 2, 5, 10, 20];

// A benchmark that went nowhere over CHOP_ROC_WINDOW bars while its range widened
const CHOP_ROC_WINDOW = 20;
const CHOP_THRESHOLD_PCT = 1;
const CHOP_ATR_PERIOD = 20;
const CHOP_ATR_LOOKBACK = 10;
// Share of the benchmark-heavy blend; the rest weighs benchmark and sector equally
const BENCHMARK_TILT = 0.5;
const BENCHMARK_TILT_CHOPPY = 0.7;

// Dollar volume in millions; spread in percent of mid
const DOLLAR_VOLUME_REFS = [0.5, 1, 2, 5, 10, 25, 50, 100];
const SPREAD_REFS = [0.02, 0.05, 0.1, 0.2, 0.5, 1, 2, 5];

const FAST_MA_PERIOD = 10;
const MID_MA_PERIOD = 20;

function closesOf(bars: readonly OHLCVBar[]): number[] {
  return bars.map((bar) => bar.close);
}

function volumesOf(bars: readonly OHLCVBar[]): number[] {
  return bars.map((bar) => bar.volume);
}

export function scoreMomentum(bars: readonly OHLCVBar[], config: ScoringConfig): SubScore {
  const { short, medium, long } = config.lookbacks;
  const closes = closesOf(bars);

  const shortReturnPct = returnOverWindow(closes, short) * 100;
  const mediumReturnPct = returnOverWindow(closes, medium) * 100;
  const accelerationPct = acceleration(closes, short, long) * 100;

  const score =
    0.4 * interpolateReferencePoints(shortReturnPct, SHORT_RETURN_REFS) +
    0.4 * interpolateReferencePoints(mediumReturnPct, MEDIUM_RETURN_REFS) +
    0.2 * interpolateReferencePoints(accelerationPct, ACCELERATION_REFS);

  return makeSubScore('momentum', toSubScore(score), {
    shortReturnPct,
    mediumReturnPct,
    accelerationPct,
  });
}

export function scoreVolume(bars: readonly OHLCVBar[], config: ScoringConfig): SubScore {
  const { volumeBaseline, volumeRecent } = config.lookbacks;
  const volumes = volumesOf(bars);

  const ratio = volumeRatio(volumes, volumeBaseline);
  const trend = volumeTrend(volumes, volumeRecent, volumeBaseline);
  const clusterPct = highVolumeClusterPct(
    volumes,
    volumeRecent,
    volumeBaseline,
    config.volumeSpikeMultiplier
  );

  const score =
    0.5 * interpolateReferencePoints(ratio, VOLUME_RATIO_REFS) +
    0.3 * interpolateReferencePoints(trend, VOLUME_TREND_REFS) +
    0.2 * interpolateReferencePoints(clusterPct, VOLUME_CLUSTER_REFS);

  return makeSubScore('volume', toSubScore(score), {
    volumeRatio: ratio,
    volumeTrend: trend,
    highVolumeClusterPct: clusterPct,
  });
}

/**
 * RSI zone on 0-100. Strength up to the overbought line scores highest;
 * oversold and deeply overbought readings score low.
 */
export function rsiZoneScore(value: number, oversold: number, overbought: number): number {
  if (value < oversold) return 40;
  if (value <= 50) return linearScale(value, oversold, 50, 40, 60);
  if (value <= overbought) return linearScale(value, 50, overbought, 60, 100);
  return Math.max(30, 100 - 3 * (value - overbought));
}

const STACK_SCORES = { bullish: 100, mixed: 50, bearish: 0 } as const;

export function scoreTechnical(bars: readonly OHLCVBar[], config: ScoringConfig): SubScore {
  const closes = closesOf(bars);
  const price = closes[closes.length - 1];

  const rsiValue = rsi(closes, config.rsi.period);
  const rsiScore = rsiZoneScore(rsiValue, config.rsi.oversold, config.rsi.overbought);

  const fast = sma(closes, FAST_MA_PERIOD);
  const mid = sma(closes, MID_MA_PERIOD);
  const slow = sma(closes, SLOW_MA_PERIOD);
  const stack = movingAverageStack(price, fast, mid, slow);

  const expansion = atrExpansion(bars, ATR_PERIOD, ATR_EXPANSION_LOOKBACK);
  const expansionScore = expansion === null ? 50 : interpolateReferencePoints(expansion, ATR_EXPANSION_REFS);

  const range = breakout(bars, config.breakout.period, config.breakout.thresholdFraction);
  let breakoutScore = 50;
  if (range) {
    breakoutScore = range.isBreakout ? 100 : range.rangePosition * 80;
  }

  const score = 0.25 * (rsiScore + expansionScore + STACK_SCORES[stack] + breakoutScore);

  return makeSubScore('technical', toSubScore(score), {
    rsi: rsiValue,
    atrExpansion: expansion,
    maStack: stack,
    sma10: fast,
    sma20: mid,
    sma50: slow,
    isBreakout: range?.isBreakout ?? false,
    distanceFromHighPct: range?.distanceFromHighPct ?? null,
  });
}

export function scoreVolatility(bars: readonly OHLCVBar[], config: ScoringConfig): SubScore {
  const closes = closesOf(bars);
  const realizedVolPct = realizedVolatility(closes, config.lookbacks.volatilityWindow);

  return makeSubScore('volatility', bandScore(realizedVolPct, config.volatilityBand), {
    realizedVolPct,
    atrPct: atrPercent(bars),
  });
}

/** Flat over the ROC window while the ATR grows */
export function isChoppyMarket(bars: readonly OHLCVBar[]): boolean {
  const rocPct = returnOverWindow(closesOf(bars), CHOP_ROC_WINDOW) * 100;
  if (Math.abs(rocPct) >= CHOP_THRESHOLD_PCT) return false;
  const expansion = atrExpansion(bars, CHOP_ATR_PERIOD, CHOP_ATR_LOOKBACK);
  return expansion !== null && expansion > 1;
}

export function scoreRelativeStrength(
  bars: readonly OHLCVBar[],
  benchmark: ReferenceSeries | null,
  sector: ReferenceSeries | null,
  config: ScoringConfig
): SubScore {
  const window = config.lookbacks.relativeStrength;
  if (!benchmark) {
    return makeSubScore('relative_strength', NEUTRAL_SCORE, {}, ['benchmark unavailable']);
  }
  const vsBenchmark = relativeStrength(bars, benchmark.bars, window);
  if (!vsBenchmark) {
    return makeSubScore('relative_strength', NEUTRAL_SCORE, {}, ['benchmark shares too few dates']);
  }

  const benchmarkExcessPct = vsBenchmark.excessReturn * 100;
  const benchmarkScore = interpolateReferencePoints(benchmarkExcessPct, EXCESS_RETURN_REFS);

  const vsSector = sector ? relativeStrength(bars, sector.bars, window) : null;
  const sectorExcessPct = vsSector ? vsSector.excessReturn * 100 : null;
  const choppy = isChoppyMarket(benchmark.bars);

  let score = benchmarkScore;
  if (sectorExcessPct !== null) {
    const sectorScore = interpolateReferencePoints(sectorExcessPct, EXCESS_RETURN_REFS);
    // Leaders against the index count for more when the index is chopping
    const tilt = choppy ? BENCHMARK_TILT_CHOPPY : BENCHMARK_TILT;
    score =
      tilt * (0.6 * benchmarkScore + 0.4 * sectorScore) +
      (1 - tilt) * 0.5 * (benchmarkScore + sectorScore);
  }

  return makeSubScore('relative_strength', toSubScore(score), {
    benchmark: benchmark.symbol,
    benchmarkExcessPct,
    sector: vsSector ? (sector?.symbol ?? null) : null,
    sectorExcessPct,
    choppyMarket: choppy,
  });
}

export function scoreLiquidity(
  bars: readonly OHLCVBar[],
  quote: Quote,
  config: ScoringConfig
): SubScore {
  const dollarVolumeM = averageDollarVolume(bars, config.lookbacks.volumeBaseline) / 1_000_000;
  const dollarScore = interpolateReferencePoints(dollarVolumeM, DOLLAR_VOLUME_REFS);

  const notes: string[] = [];
  let spreadPct: number | null = null;
  let spreadScore = 50;
  if (quote.bid !== null && quote.ask !== null && quote.ask >= quote.bid && quote.bid > 0) {
    const mid = (quote.bid + quote.ask) / 2;
    spreadPct = ((quote.ask - quote.bid) / mid) * 100;
    spreadScore = inverseReferencePoints(spreadPct, SPREAD_REFS);
  } else {
    notes.push('no bid/ask; spread scored neutral');
  }

  return makeSubScore(
    'liquidity',
    toSubScore(0.6 * dollarScore + 0.4 * spreadScore),
    { avgDollarVolumeM: dollarVolumeM, spreadPct },
    notes
  );
}
