/**
 * Realized volatility, average true range, ATR expansion and the volatility band score
 */

import type { OHLCVBar } from '@/providers/types';

const TRADING_DAYS_PER_YEAR = 252;

/** Simple period-over-period returns; pairs with a non-positive base are skipped */
export function periodReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const base = closes[i - 1];
    if (base > 0) {
      returns.push((closes[i] - base) / base);
    }
  }
  return returns;
}

function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Annualized standard deviation of the last `window` daily returns, in percent.
 * Needs window + 1 closes; uses what is there when shorter.
 */
export function realizedVolatility(closes: readonly number[], window: number): number {
  const tail = closes.slice(Math.max(0, closes.length - window - 1));
  return populationStdDev(periodReturns(tail)) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
}

/** Mean true range over the last `period` bars; needs period + 1 bars */
export function averageTrueRange(bars: readonly OHLCVBar[], period: number = 14): number | null {
  if (period <= 0 || bars.length < period + 1) return null;

  let sum = 0;
  for (let i = bars.length - period; i < bars.length; i++) {
    const { high, low } = bars[i];
    const prevClose = bars[i - 1].close;
    sum += Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
  }
  return sum / period;
}

/**
 * Latest ATR over the ATR `lookback` bars earlier. Above 1 the range is
 * widening. Needs period + lookback + 1 bars; null when shorter or flat.
 */
export function atrExpansion(
  bars: readonly OHLCVBar[],
  period: number = 14,
  lookback: number = 14
): number | null {
  if (lookback <= 0 || bars.length < period + lookback + 1) return null;

  const current = averageTrueRange(bars, period);
  const earlier = averageTrueRange(bars.slice(0, bars.length - lookback), period);
  if (current === null || earlier === null || earlier <= 0) return null;
  return current / earlier;
}

export function atrPercent(bars: readonly OHLCVBar[], period: number = 14): number | null {
  const atr = averageTrueRange(bars, period);
  const last = bars[bars.length - 1];
  if (atr === null || !last || last.close <= 0) return null;
  return (atr / last.close) * 100;
}

export interface VolatilityBand {
  low: number;
  peak: number;
  high: number;
}

/**
 * Triangular sweet-spot score on 0-10: rises from 0 to 2 up to `low`, to 10
 * at `peak`, falls back to 2 at `high` and towards 0 beyond it.
 * Expects 0 < low < peak < high.
 */
export function bandScore(value: number, band: VolatilityBand): number {
  const { low, peak, high } = band;
  if (!Number.isFinite(value) || value <= 0) return 0;

  if (value <= low) return (2 * value) / low;
  if (value <= peak) return 2 + (8 * (value - low)) / (peak - low);
  if (value <= high) return 10 - (8 * (value - peak)) / (high - peak);
  return Math.max(0, 2 - (2 * (value - high)) / high);
}
