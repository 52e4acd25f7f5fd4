/**
 * Run summary and per-symbol narrative context
 */

import { DIMENSIONS, type CompositeResult, type Dimension, type RejectionCode } from '@/scoring/types';

export interface RunSummary {
  total: number;
  admitted: number;
  rejected: number;
  rejectionsByCode: Partial<Record<RejectionCode, number>>;
}

export function buildRunSummary(results: readonly CompositeResult[]): RunSummary {
  const rejectionsByCode: Partial<Record<RejectionCode, number>> = {};
  let admitted = 0;
  for (const result of results) {
    if (result.state === 'admitted') {
      admitted++;
    } else if (result.rejection) {
      const code = result.rejection.code;
      rejectionsByCode[code] = (rejectionsByCode[code] ?? 0) + 1;
    }
  }
  return {
    total: results.length,
    admitted,
    rejected: results.length - admitted,
    rejectionsByCode,
  };
}

export type NarrativeValue = number | string | boolean | null;

export interface NarrativeContext {
  symbol: string;
  companyName: string | null;
  sector: string | null;
  weightedTotal: number | null;
  scores: Partial<Record<Dimension, number>>;
  /** Raw metrics keyed `<dimension>.<metric>` */
  metrics: Record<string, NarrativeValue>;
  /** Dimensions that fell back to neutral or used partial inputs */
  degraded: Dimension[];
  notes: string[];
}

/**
 * Flat view of one result for a qualitative write-up.
 */
export function buildNarrativeContext(result: CompositeResult): NarrativeContext {
  const context: NarrativeContext = {
    symbol: result.symbol,
    companyName: result.instrument?.companyName ?? null,
    sector: result.instrument?.sector ?? null,
    weightedTotal: result.weightedTotal,
    scores: {},
    metrics: {},
    degraded: [],
    notes: [],
  };

  if (result.rejection) {
    context.notes.push(`rejected (${result.rejection.code}): ${result.rejection.message}`);
  }
  if (!result.subScores) return context;

  for (const dimension of DIMENSIONS) {
    const subScore = result.subScores[dimension];
    context.scores[dimension] = subScore.value;
    for (const [name, value] of Object.entries(subScore.metrics)) {
      context.metrics[`${dimension}.${name}`] = value;
    }
    if (subScore.degraded) {
      context.degraded.push(dimension);
      context.notes.push(...subScore.notes.map((note) => `${dimension}: ${note}`));
    }
  }

  return context;
}
