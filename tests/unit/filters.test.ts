import { describe, expect, it } from 'vitest';
import { checkAdmission } from '@/scoring/filters';
import { DEFAULT_CONFIG, type ScoringConfig } from '@/scoring/scoring_config';
import { makeBars, makeQuote } from '../fixtures/market';

const config: ScoringConfig = {
  ...DEFAULT_CONFIG,
  filters: { minPrice: 5, maxPrice: 500, minAvgVolume: 100_000, excludeSectors: ['Utilities'] },
};

const closes = (n: number, price: number) => Array.from({ length: n }, () => price);

describe('checkAdmission', () => {
  const bars = makeBars(closes(90, 50));

  it('admits a liquid symbol in range', () => {
    expect(
      checkAdmission({ bars, quote: makeQuote('AAA', 50), instrument: { symbol: 'AAA', sector: 'Technology' } }, config)
    ).toBeNull();
  });

  it('checks history before anything else', () => {
    expect(checkAdmission({ bars: makeBars(closes(10, 50)), quote: null, instrument: null }, config)).toEqual({
      code: 'insufficient_history',
      message: '10 bars available, 65 required',
    });
  });

  it('rejects a missing or unusable quote', () => {
    expect(checkAdmission({ bars, quote: null, instrument: null }, config)?.code).toBe('missing_quote');
    expect(checkAdmission({ bars, quote: makeQuote('AAA', 0), instrument: null }, config)?.code).toBe(
      'missing_quote'
    );
  });

  it('rejects prices outside the band', () => {
    expect(checkAdmission({ bars, quote: makeQuote('AAA', 2), instrument: null }, config)).toEqual({
      code: 'price_out_of_range',
      message: 'price 2 outside [5, 500]',
    });
    expect(checkAdmission({ bars, quote: makeQuote('AAA', 900), instrument: null }, config)?.code).toBe(
      'price_out_of_range'
    );
  });

  it('rejects thin volume', () => {
    const thin = makeBars(closes(90, 50), closes(90, 5_000));
    expect(checkAdmission({ bars: thin, quote: makeQuote('AAA', 50), instrument: null }, config)).toEqual({
      code: 'low_volume',
      message: 'average volume 5000 below 100000',
    });
  });

  it('rejects excluded sectors regardless of case', () => {
    expect(
      checkAdmission({ bars, quote: makeQuote('AAA', 50), instrument: { symbol: 'AAA', sector: 'utilities' } }, config)
    ).toEqual({ code: 'excluded_sector', message: 'sector utilities is excluded' });
  });
});
