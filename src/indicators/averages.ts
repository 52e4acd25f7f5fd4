/**
 * Moving averages, moving-average stack and breakout detection
 */

import type { OHLCVBar } from '@/providers/types';

/** Mean of the last n values; needs n values, otherwise null */
export function sma(values: readonly number[], n: number): number | null {
  if (n <= 0 || values.length < n) return null;
  let sum = 0;
  for (let i = values.length - n; i < values.length; i++) {
    sum += values[i];
  }
  return sum / n;
}

export type MovingAverageStack = 'bullish' | 'bearish' | 'mixed';

/** Price above fast above mid above slow is bullish; the mirror is bearish */
export function movingAverageStack(
  price: number,
  fast: number | null,
  mid: number | null,
  slow: number | null
): MovingAverageStack {
  if (fast === null || mid === null || slow === null) return 'mixed';
  if (price > fast && fast > mid && mid > slow) return 'bullish';
  if (price < fast && fast < mid && mid < slow) return 'bearish';
  return 'mixed';
}

export interface BreakoutResult {
  isBreakout: boolean;
  priorHigh: number;
  priorLow: number;
  /** Latest close within the prior range, 0 at the low and 1 at the high (clamped) */
  rangePosition: number;
  /** Latest close relative to the prior high, percent */
  distanceFromHighPct: number;
}

/**
 * Compares the latest close with the high/low of the `period` bars before it.
 * A breakout is a close above priorHigh * (1 + thresholdFraction).
 * Needs period + 1 bars.
 */
export function breakout(
  bars: readonly OHLCVBar[],
  period: number,
  thresholdFraction: number
): BreakoutResult | null {
  if (period <= 0 || bars.length < period + 1) return null;

  const latest = bars[bars.length - 1];
  const prior = bars.slice(bars.length - 1 - period, bars.length - 1);

  let priorHigh = -Infinity;
  let priorLow = Infinity;
  for (const bar of prior) {
    priorHigh = Math.max(priorHigh, bar.high);
    priorLow = Math.min(priorLow, bar.low);
  }

  const range = priorHigh - priorLow;
  const rangePosition =
    range > 0 ? Math.min(Math.max((latest.close - priorLow) / range, 0), 1) : 0.5;

  return {
    isBreakout: latest.close > priorHigh * (1 + thresholdFraction),
    priorHigh,
    priorLow,
    rangePosition,
    distanceFromHighPct: priorHigh > 0 ? (latest.close / priorHigh - 1) * 100 : 0,
  };
}
