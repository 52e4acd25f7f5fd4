/**
 * Result types shared by the scoring modules
 */

import type { FetchOutcome, Instrument } from '@/providers/types';
import { clamp, roundScore } from './normalize';

export const DIMENSIONS = [
  'momentum',
  'volume',
  'technical',
  'volatility',
  'relative_strength',
  'sentiment',
  'liquidity',
  'fundamental_quality',
  'short_interest',
  'growth',
  'options',
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export type DimensionWeights = Record<Dimension, number>;

/** Neutral value for a sub-score whose input is missing */
export const NEUTRAL_SCORE = 5.0;

export interface SubScore {
  dimension: Dimension;
  /** 0-10 */
  value: number;
  /** Raw indicator values behind the score */
  metrics: Record<string, number | string | boolean | null>;
  /** True when the score fell back to neutral or used partial inputs */
  degraded: boolean;
  notes: string[];
}

export type SubScores = Record<Dimension, SubScore>;

export type RejectionCode =
  | 'not_found'
  | 'insufficient_history'
  | 'transient'
  | 'missing_quote'
  | 'price_out_of_range'
  | 'low_volume'
  | 'excluded_sector'
  | 'below_min_score'
  | 'run_timeout'
  | 'internal_error';

export interface Rejection {
  code: RejectionCode;
  message: string;
}

export type SymbolState = 'admitted' | 'rejected';

export interface CompositeResult {
  symbol: string;
  state: SymbolState;
  passedFilters: boolean;
  instrument: Instrument | null;
  /** Null when the symbol was rejected before scoring */
  subScores: SubScores | null;
  /** 0-10; null when never scored */
  weightedTotal: number | null;
  rejection?: Rejection;
}

export function makeSubScore(
  dimension: Dimension,
  value: number,
  metrics: SubScore['metrics'] = {},
  notes: string[] = []
): SubScore {
  return {
    dimension,
    value: Number.isFinite(value) ? roundScore(clamp(value, 0, 10), 2) : NEUTRAL_SCORE,
    metrics,
    degraded: notes.length > 0,
    notes,
  };
}

export function neutralSubScore(dimension: Dimension, reason: string): SubScore {
  return makeSubScore(dimension, NEUTRAL_SCORE, {}, [reason]);
}

/** Note explaining why an auxiliary input is missing */
export function missingReason(label: string, outcome: FetchOutcome<unknown>): string {
  switch (outcome.status) {
    case 'unavailable':
      return outcome.reason ? `${label} unavailable: ${outcome.reason}` : `${label} unavailable`;
    case 'error':
      return `${label} fetch failed (${outcome.kind}): ${outcome.message}`;
    default:
      return `${label} present`;
  }
}
