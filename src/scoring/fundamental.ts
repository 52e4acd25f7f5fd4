/**
 * Fundamental quality and growth sub-scores.
 * Weights renormalize over the fields the provider reported.
 */

import type { FetchOutcome, FundamentalsData, GrowthData } from '@/providers/types';
import { interpolateReferencePoints, inverseReferencePoints, toSubScore, weightedMean } from './normalize';
import { makeSubScore, missingReason, neutralSubScore, type SubScore } from './types';

const ROIC_REFS = [0, 5, 10, 15, 20, 30, 40, 60];
const FCF_YIELD_REFS = [0, 2, 4, 6, 8, 10, 15, 25];
const DEBT_TO_EQUITY_REFS = [0, 0.2, 0.5, 1.0, 1.5, 2.0, 3.0, 5.0];

const REVENUE_GROWTH_REFS = [-10, 0, 5, 10, 15, 25, 40, 60];
const EPS_GROWTH_REFS = [-20, 0, 10, 20, 30, 50, 75, 100];
const REVENUE_GROWTH_5Y_REFS = [-5, 0, 5, 10, 15, 20, 30, 50];

function missingFields<T extends object>(data: T, fields: ReadonlyArray<keyof T & string>): string[] {
  return fields.filter((field) => data[field] === null);
}

export function scoreFundamentalQuality(
  outcome: FetchOutcome<FundamentalsData>,
  enabled: boolean = true
): SubScore {
  if (!enabled) return neutralSubScore('fundamental_quality', 'fundamental scoring disabled');
  if (outcome.status !== 'present') {
    return neutralSubScore('fundamental_quality', missingReason('fundamentals', outcome));
  }

  const data = outcome.value;
  const score = weightedMean([
    { score: data.roic === null ? null : interpolateReferencePoints(data.roic, ROIC_REFS), weight: 0.4 },
    {
      score: data.fcfYield === null ? null : interpolateReferencePoints(data.fcfYield, FCF_YIELD_REFS),
      weight: 0.4,
    },
    {
      score:
        data.debtToEquity === null
          ? null
          : inverseReferencePoints(data.debtToEquity, DEBT_TO_EQUITY_REFS),
      weight: 0.2,
    },
  ]);

  if (score === null) {
    return neutralSubScore('fundamental_quality', 'no fundamental fields reported');
  }

  const missing = missingFields(data, ['roic', 'fcfYield', 'debtToEquity']);
  return makeSubScore(
    'fundamental_quality',
    toSubScore(score),
    { roicPct: data.roic, fcfYieldPct: data.fcfYield, debtToEquity: data.debtToEquity },
    missing.length > 0 ? [`missing: ${missing.join(', ')}`] : []
  );
}

export function scoreGrowth(outcome: FetchOutcome<GrowthData>, enabled: boolean = true): SubScore {
  if (!enabled) return neutralSubScore('growth', 'fundamental scoring disabled');
  if (outcome.status !== 'present') {
    return neutralSubScore('growth', missingReason('growth', outcome));
  }

  const data = outcome.value;
  const score = weightedMean([
    {
      score:
        data.revenueGrowth === null
          ? null
          : interpolateReferencePoints(data.revenueGrowth, REVENUE_GROWTH_REFS),
      weight: 0.4,
    },
    {
      score: data.epsGrowth === null ? null : interpolateReferencePoints(data.epsGrowth, EPS_GROWTH_REFS),
      weight: 0.4,
    },
    {
      score:
        data.revenueGrowth5y === null
          ? null
          : interpolateReferencePoints(data.revenueGrowth5y, REVENUE_GROWTH_5Y_REFS),
      weight: 0.2,
    },
  ]);

  if (score === null) {
    return neutralSubScore('growth', 'no growth fields reported');
  }

  const missing = missingFields(data, ['revenueGrowth', 'epsGrowth', 'revenueGrowth5y']);
  return makeSubScore(
    'growth',
    toSubScore(score),
    {
      revenueGrowthPct: data.revenueGrowth,
      epsGrowthPct: data.epsGrowth,
      revenueGrowth5yPct: data.revenueGrowth5y,
    },
    missing.length > 0 ? [`missing: ${missing.join(', ')}`] : []
  );
}
