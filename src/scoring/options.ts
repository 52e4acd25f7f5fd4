/**
 * Options sentiment from the chain snapshot, on a 10-point scale:
 * put/call ratio up to 4, implied volatility band up to 3, traded volume
 * up to 2, call delta up to 1.
 */

import type { FetchOutcome, OptionsSnapshot } from '@/providers/types';
import { makeSubScore, missingReason, neutralSubScore, type SubScore } from './types';

export function putCallPoints(ratio: number | null): number {
  if (ratio === null) return 0;
  if (ratio < 0.7) return 4;
  if (ratio < 0.85) return 3;
  if (ratio < 1.0) return 2;
  if (ratio < 1.2) return 1.5;
  if (ratio < 1.5) return 1;
  return 0;
}

/** Mid-range IV is preferred over very quiet or very stressed chains */
export function impliedVolatilityPoints(iv: number | null): number {
  if (iv === null) return 0;
  const ivPct = iv < 1 ? iv * 100 : iv;
  if (ivPct >= 20 && ivPct <= 40) return 3;
  if (ivPct > 40 && ivPct <= 50) return 2;
  if ((ivPct >= 15 && ivPct < 20) || (ivPct > 50 && ivPct <= 60)) return 1;
  return 0.5;
}

export function optionsVolumePoints(totalVolume: number): number {
  if (totalVolume > 10_000) return 2;
  if (totalVolume > 5_000) return 1.5;
  if (totalVolume > 1_000) return 1;
  if (totalVolume > 100) return 0.5;
  return 0;
}

export function netDeltaPoints(netDelta: number): number {
  if (netDelta > 100) return 1;
  if (netDelta > 0) return 0.7;
  if (netDelta > -100) return 0.3;
  return 0;
}

export function scoreOptions(outcome: FetchOutcome<OptionsSnapshot>, enabled: boolean = true): SubScore {
  if (!enabled) return neutralSubScore('options', 'options scoring disabled');
  if (outcome.status !== 'present') {
    return neutralSubScore('options', missingReason('options', outcome));
  }

  const data = outcome.value;
  const totalVolume = data.totalCallVolume + data.totalPutVolume;
  const points =
    putCallPoints(data.putCallRatio) +
    impliedVolatilityPoints(data.atmImpliedVolatility) +
    optionsVolumePoints(totalVolume) +
    netDeltaPoints(data.netDelta);

  return makeSubScore('options', Math.min(points, 10), {
    putCallRatio: data.putCallRatio,
    atmImpliedVolatility: data.atmImpliedVolatility,
    totalVolume,
    netDelta: data.netDelta,
  });
}
