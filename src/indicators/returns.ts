/**
 * Price returns over trailing windows. Series are oldest first.
 */

/**
 * Fractional return from `window` bars ago to the latest close.
 * Needs window + 1 closes; 0 when shorter or when the base price is not positive.
 */
export function returnOverWindow(closes: readonly number[], window: number): number {
  const last = closes.length - 1;
  if (window <= 0 || window > last) return 0;

  const base = closes[last - window];
  if (base <= 0) return 0;
  return (closes[last] - base) / base;
}

/**
 * Short-window return minus the long-window return pro-rated to the short window.
 * Positive when the move is speeding up. Needs longWindow + 1 closes.
 */
export function acceleration(
  closes: readonly number[],
  shortWindow: number,
  longWindow: number
): number {
  if (longWindow <= 0) return 0;
  const shortReturn = returnOverWindow(closes, shortWindow);
  const longReturn = returnOverWindow(closes, longWindow);
  return shortReturn - longReturn * (shortWindow / longWindow);
}
