import type { CompositeResult } from './types';

/** Admitted results by weighted total, descending; ties by symbol */
export function rankResults(results: readonly CompositeResult[]): CompositeResult[] {
  return results
    .filter((result) => result.state === 'admitted')
    .sort((a, b) => {
      const totalA = a.weightedTotal ?? 0;
      const totalB = b.weightedTotal ?? 0;
      if (totalB !== totalA) return totalB - totalA;
      return a.symbol.localeCompare(b.symbol);
    });
}

export function sortRejected(results: readonly CompositeResult[]): CompositeResult[] {
  return results
    .filter((result) => result.state === 'rejected')
    .sort((a, b) => a.symbol.localeCompare(b.symbol));
}

export function selectTopK(ranked: readonly CompositeResult[], k: number): CompositeResult[] {
  return ranked.slice(0, Math.max(0, k));
}
