/**
 * Admission filters applied between fetching and scoring.
 * The history check runs first so nothing touches a truncated series.
 */

import type { Instrument, OHLCVBar, Quote } from '@/providers/types';
import { averageVolume } from '@/indicators';
import type { ScoringConfig } from './scoring_config';
import type { Rejection } from './types';

export interface AdmissionInput {
  bars: readonly OHLCVBar[];
  quote: Quote | null;
  instrument: Instrument | null;
}

export function checkHistory(bars: readonly OHLCVBar[], config: ScoringConfig): Rejection | null {
  const required = config.lookbacks.minHistoryBars;
  if (bars.length < required) {
    return {
      code: 'insufficient_history',
      message: `${bars.length} bars available, ${required} required`,
    };
  }
  return null;
}

export function checkAdmission(input: AdmissionInput, config: ScoringConfig): Rejection | null {
  const { lookbacks, filters } = config;

  const historyRejection = checkHistory(input.bars, config);
  if (historyRejection) return historyRejection;

  const price = input.quote?.price;
  if (price === undefined || !Number.isFinite(price) || price <= 0) {
    return { code: 'missing_quote', message: 'no usable quote price' };
  }

  if (price < filters.minPrice || price > filters.maxPrice) {
    return {
      code: 'price_out_of_range',
      message: `price ${price} outside [${filters.minPrice}, ${filters.maxPrice}]`,
    };
  }

  const avgVolume = averageVolume(
    input.bars.map((bar) => bar.volume),
    lookbacks.volumeBaseline
  );
  if (avgVolume < filters.minAvgVolume) {
    return {
      code: 'low_volume',
      message: `average volume ${Math.round(avgVolume)} below ${filters.minAvgVolume}`,
    };
  }

  const sector = input.instrument?.sector;
  if (sector && filters.excludeSectors.some((s) => s.toLowerCase() === sector.toLowerCase())) {
    return { code: 'excluded_sector', message: `sector ${sector} is excluded` };
  }

  return null;
}
