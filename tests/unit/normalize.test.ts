import { describe, expect, it } from 'vitest';
import {
  clamp,
  interpolateReferencePoints,
  inverseReferencePoints,
  linearScale,
  piecewiseLinear,
  roundScore,
  toSubScore,
  weightedMean,
} from '@/scoring/normalize';

describe('normalize', () => {
  it('clamps to the range', () => {
    expect(clamp(150)).toBe(100);
    expect(clamp(-5)).toBe(0);
    expect(clamp(5, 0, 10)).toBe(5);
  });

  it('scales linearly and clamps to the output range', () => {
    expect(linearScale(50, 0, 100)).toBe(50);
    expect(linearScale(200, 0, 100)).toBe(100);
    expect(linearScale(40, 30, 50, 40, 60)).toBe(50);
    expect(linearScale(5, 5, 5)).toBe(50);
  });

  it('interpolates between evenly spaced reference points', () => {
    const refs = [0, 10, 20, 30, 40];
    expect(interpolateReferencePoints(-1, refs)).toBe(0);
    expect(interpolateReferencePoints(20, refs)).toBe(50);
    expect(interpolateReferencePoints(25, refs)).toBe(62.5);
    expect(interpolateReferencePoints(99, refs)).toBe(100);
    expect(interpolateReferencePoints(Number.NaN, refs)).toBe(50);
  });

  it('inverts reference points', () => {
    expect(inverseReferencePoints(25, [0, 10, 20, 30, 40])).toBe(37.5);
  });

  it('follows a piecewise-linear curve', () => {
    const knots = [
      [0, 55],
      [10, 90],
      [30, 50],
    ] as const;
    expect(piecewiseLinear(5, knots)).toBe(72.5);
    expect(piecewiseLinear(20, knots)).toBe(70);
    expect(piecewiseLinear(-3, knots)).toBe(55);
    expect(piecewiseLinear(80, knots)).toBe(50);
  });

  it('renormalizes the weighted mean over present components', () => {
    expect(
      weightedMean([
        { score: 80, weight: 0.4 },
        { score: null, weight: 0.4 },
        { score: 20, weight: 0.2 },
      ])
    ).toBeCloseTo(60, 10);
    expect(weightedMean([{ score: null, weight: 1 }])).toBeNull();
  });

  it('maps 0-100 onto a 0-10 sub-score and rounds', () => {
    expect(toSubScore(83.2)).toBeCloseTo(8.32, 10);
    expect(toSubScore(130)).toBe(10);
    expect(roundScore(8.3203, 2)).toBe(8.32);
    expect(roundScore(8.36)).toBe(8.4);
  });
});
