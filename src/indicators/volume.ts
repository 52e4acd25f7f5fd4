/**
 * Volume ratio, trend and clustering
 */

import type { OHLCVBar } from '@/providers/types';

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Mean of the last `window` values (all values when shorter) */
export function averageVolume(volumes: readonly number[], window: number): number {
  return mean(volumes.slice(Math.max(0, volumes.length - window)));
}

/**
 * Latest volume over the mean of the `window` volumes before it.
 * Needs window + 1 values; 1 when the baseline is zero.
 */
export function volumeRatio(volumes: readonly number[], window: number): number {
  if (volumes.length < 2) return 1;
  const latest = volumes[volumes.length - 1];
  const baseline = mean(volumes.slice(Math.max(0, volumes.length - 1 - window), volumes.length - 1));
  return baseline > 0 ? latest / baseline : 1;
}

/**
 * Mean of the last `recent` volumes over the mean of the `prior` volumes
 * before them. Needs recent + prior values; 1 when the prior mean is zero.
 */
export function volumeTrend(volumes: readonly number[], recent: number, prior: number): number {
  const end = volumes.length;
  const recentMean = mean(volumes.slice(Math.max(0, end - recent)));
  const priorMean = mean(volumes.slice(Math.max(0, end - recent - prior), Math.max(0, end - recent)));
  return priorMean > 0 ? recentMean / priorMean : 1;
}

/**
 * Share of the last `recent` bars, in percent, whose volume is at least
 * `multiplier` times the mean of the `baselineWindow` volumes before them.
 */
export function highVolumeClusterPct(
  volumes: readonly number[],
  recent: number,
  baselineWindow: number,
  multiplier: number
): number {
  const end = volumes.length;
  const recentSlice = volumes.slice(Math.max(0, end - recent));
  const baseline = mean(
    volumes.slice(Math.max(0, end - recent - baselineWindow), Math.max(0, end - recent))
  );
  if (baseline <= 0 || recentSlice.length === 0) return 0;

  const spikes = recentSlice.filter((v) => v >= baseline * multiplier).length;
  return (spikes / recentSlice.length) * 100;
}

/** Mean close x volume over the last `window` bars */
export function averageDollarVolume(bars: readonly OHLCVBar[], window: number): number {
  const tail = bars.slice(Math.max(0, bars.length - window));
  return mean(tail.map((bar) => bar.close * bar.volume));
}
