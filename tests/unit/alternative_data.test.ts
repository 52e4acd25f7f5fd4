import { describe, expect, it } from 'vitest';
import { present, unavailable } from '@/providers/types';
import {
  impliedVolatilityPoints,
  netDeltaPoints,
  optionsVolumePoints,
  putCallPoints,
  scoreOptions,
} from '@/scoring/options';
import { scoreShortInterest, shortInterestTrend } from '@/scoring/short_interest';

describe('short interest', () => {
  it('rewards a moderate, quickly covered short float that is shrinking', () => {
    const score = scoreShortInterest(
      present({
        settlementDate: '2024-05-15',
        shortInterest: 1_000_000,
        shortFloatPct: 10,
        daysToCover: 2,
        changePct: -10,
      })
    );

    expect(score.value).toBe(7.89);
    expect(score.metrics.trend).toBe('decreasing');
    expect(score.degraded).toBe(false);
  });

  it('scores a crowded short below a moderate one', () => {
    const crowded = scoreShortInterest(
      present({ settlementDate: '2024-05-15', shortInterest: 1, shortFloatPct: 45, daysToCover: 12, changePct: 30 })
    );
    const moderate = scoreShortInterest(
      present({ settlementDate: '2024-05-15', shortInterest: 1, shortFloatPct: 10, daysToCover: 2, changePct: 0 })
    );

    expect(crowded.value).toBeLessThan(moderate.value);
  });

  it('classifies the trend with a 5% dead band', () => {
    expect(shortInterestTrend(6)).toBe('increasing');
    expect(shortInterestTrend(-6)).toBe('decreasing');
    expect(shortInterestTrend(5)).toBe('stable');
    expect(shortInterestTrend(null)).toBe('stable');
  });

  it('is neutral when Polygon is not configured', () => {
    const score = scoreShortInterest(unavailable('polygon not configured'));

    expect(score.value).toBe(5);
    expect(score.notes).toEqual(['short interest unavailable: polygon not configured']);
  });
});

describe('options', () => {
  it('awards points per signal', () => {
    expect(putCallPoints(0.5)).toBe(4);
    expect(putCallPoints(1.1)).toBe(1.5);
    expect(putCallPoints(2)).toBe(0);
    expect(impliedVolatilityPoints(0.3)).toBe(3);
    expect(impliedVolatilityPoints(45)).toBe(2);
    expect(impliedVolatilityPoints(0.8)).toBe(0.5);
    expect(optionsVolumePoints(12_000)).toBe(2);
    expect(optionsVolumePoints(50)).toBe(0);
    expect(netDeltaPoints(150)).toBe(1);
    expect(netDeltaPoints(-200)).toBe(0);
  });

  it('sums the points into the sub-score', () => {
    const bullish = scoreOptions(
      present({
        totalCallVolume: 8_000,
        totalPutVolume: 4_000,
        putCallRatio: 0.5,
        atmImpliedVolatility: 0.3,
        netDelta: 150,
        contractCount: 40,
      })
    );
    expect(bullish.value).toBe(10);

    const bearish = scoreOptions(
      present({
        totalCallVolume: 20,
        totalPutVolume: 30,
        putCallRatio: 1.5,
        atmImpliedVolatility: 0.8,
        netDelta: -200,
        contractCount: 4,
      })
    );
    expect(bearish.value).toBe(0.5);
  });

  it('is neutral when disabled or missing', () => {
    expect(scoreOptions(unavailable('no listed options')).value).toBe(5);
    expect(scoreOptions(unavailable(), false).notes).toEqual(['options scoring disabled']);
  });
});
