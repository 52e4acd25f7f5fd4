/**
 * Score normalization utilities
 * Intermediate scores use a 0-100 scale; sub-scores are reported on 0-10
 */

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function linearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMin + normalized * (outputMax - outputMin), outputMin, outputMax);
}

/**
 * Maps a value onto 0-100 by linear interpolation between ascending
 * reference points spaced evenly across the scale. At or below the first
 * point is 0, at or above the last is 100. Non-finite input scores 50.
 */
export function interpolateReferencePoints(value: number, referencePoints: readonly number[]): number {
  if (!Number.isFinite(value) || referencePoints.length < 2) return 50;

  const refs = [...referencePoints].sort((a, b) => a - b);
  const last = refs.length - 1;

  if (value <= refs[0]) return 0;
  if (value >= refs[last]) return 100;

  for (let i = 0; i < last; i++) {
    const lower = refs[i];
    const upper = refs[i + 1];
    if (value >= lower && value <= upper) {
      const pctLower = (i / last) * 100;
      const pctUpper = ((i + 1) / last) * 100;
      const ratio = upper === lower ? 0 : (value - lower) / (upper - lower);
      return pctLower + (pctUpper - pctLower) * ratio;
    }
  }

  return 50;
}

/** Inverse of interpolateReferencePoints: lower values score higher */
export function inverseReferencePoints(value: number, referencePoints: readonly number[]): number {
  return 100 - interpolateReferencePoints(value, referencePoints);
}

/**
 * Piecewise-linear curve through [x, y] knots (ascending x). Values outside
 * the knots take the nearest end value.
 */
export function piecewiseLinear(value: number, knots: ReadonlyArray<readonly [number, number]>): number {
  if (knots.length === 0 || !Number.isFinite(value)) return 50;

  const [firstX, firstY] = knots[0];
  if (value <= firstX) return firstY;

  for (let i = 1; i < knots.length; i++) {
    const [x0, y0] = knots[i - 1];
    const [x1, y1] = knots[i];
    if (value <= x1) {
      return x1 === x0 ? y1 : y0 + ((value - x0) / (x1 - x0)) * (y1 - y0);
    }
  }

  return knots[knots.length - 1][1];
}

/** Weighted mean over the components that are present; null when none are */
export function weightedMean(
  components: ReadonlyArray<{ score: number | null; weight: number }>
): number | null {
  let total = 0;
  let weightSum = 0;
  for (const { score, weight } of components) {
    if (score === null || !Number.isFinite(score)) continue;
    total += score * weight;
    weightSum += weight;
  }
  return weightSum > 0 ? total / weightSum : null;
}

/** 0-100 scale to a 0-10 sub-score */
export function toSubScore(score100: number): number {
  return clamp(score100 / 10, 0, 10);
}

export function roundScore(score: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
