/**
 * Relative strength against a reference series over identical dates
 */

import type { OHLCVBar } from '@/providers/types';
import { returnOverWindow } from './returns';

export interface RelativeStrength {
  symbolReturn: number;
  referenceReturn: number;
  /** symbolReturn - referenceReturn, as a fraction */
  excessReturn: number;
}

/**
 * Window return of the symbol minus the reference's over the same dates.
 * Only dates present in both series count; null with fewer than window + 1 of them.
 */
export function relativeStrength(
  bars: readonly OHLCVBar[],
  reference: readonly OHLCVBar[],
  window: number
): RelativeStrength | null {
  const referenceCloses = new Map<string, number>();
  for (const bar of reference) {
    referenceCloses.set(bar.date, bar.close);
  }

  const symbolCloses: number[] = [];
  const alignedReference: number[] = [];
  for (const bar of bars) {
    const refClose = referenceCloses.get(bar.date);
    if (refClose === undefined) continue;
    symbolCloses.push(bar.close);
    alignedReference.push(refClose);
  }

  if (window <= 0 || symbolCloses.length < window + 1) return null;

  const symbolReturn = returnOverWindow(symbolCloses, window);
  const referenceReturn = returnOverWindow(alignedReference, window);
  return { symbolReturn, referenceReturn, excessReturn: symbolReturn - referenceReturn };
}
