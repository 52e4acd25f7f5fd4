/**
 * Short-interest posture.
 *
 * Not monotonic: a moderate short float that can be covered quickly is a
 * squeeze setup and scores highest, a negligible short float scores in the
 * middle, and heavy short positioning scores low. Shorts being added
 * penalizes; shorts being covered rewards.
 */

import type { FetchOutcome, ShortInterestData } from '@/providers/types';
import { inverseReferencePoints, piecewiseLinear, toSubScore, weightedMean } from './normalize';
import { makeSubScore, missingReason, neutralSubScore, type SubScore } from './types';

// [short float %, score 0-100]
const SHORT_FLOAT_CURVE: ReadonlyArray<readonly [number, number]> = [
  [0, 55],
  [5, 75],
  [10, 90],
  [20, 85],
  [30, 50],
  [40, 30],
  [60, 15],
];

const DAYS_TO_COVER_REFS = [0, 1, 2, 3, 5, 7, 10, 15];
const SHORT_CHANGE_REFS = [-50, -25, -10, 0, 10, 25, 50, 100];

export type ShortInterestTrend = 'increasing' | 'decreasing' | 'stable';

/** More than a 5% move between settlements counts as a trend */
export function shortInterestTrend(changePct: number | null): ShortInterestTrend {
  if (changePct === null) return 'stable';
  if (changePct > 5) return 'increasing';
  if (changePct < -5) return 'decreasing';
  return 'stable';
}

export function scoreShortInterest(outcome: FetchOutcome<ShortInterestData>): SubScore {
  if (outcome.status !== 'present') {
    return neutralSubScore('short_interest', missingReason('short interest', outcome));
  }

  const data = outcome.value;
  const score = weightedMean([
    {
      score: data.shortFloatPct === null ? null : piecewiseLinear(data.shortFloatPct, SHORT_FLOAT_CURVE),
      weight: 0.4,
    },
    {
      score: data.daysToCover === null ? null : inverseReferencePoints(data.daysToCover, DAYS_TO_COVER_REFS),
      weight: 0.4,
    },
    {
      score: data.changePct === null ? null : inverseReferencePoints(data.changePct, SHORT_CHANGE_REFS),
      weight: 0.2,
    },
  ]);

  if (score === null) {
    return neutralSubScore('short_interest', 'short interest record has no usable fields');
  }

  const notes: string[] = [];
  if (data.shortFloatPct === null) notes.push('missing: shortFloatPct');
  if (data.daysToCover === null) notes.push('missing: daysToCover');
  if (data.changePct === null) notes.push('missing: changePct');

  return makeSubScore(
    'short_interest',
    toSubScore(score),
    {
      shortFloatPct: data.shortFloatPct,
      daysToCover: data.daysToCover,
      changePct: data.changePct,
      trend: shortInterestTrend(data.changePct),
      settlementDate: data.settlementDate,
    },
    notes
  );
}
