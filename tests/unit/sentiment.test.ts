import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigurationError } from '@/core/errors';
import type { Headline } from '@/providers/types';
import { KeywordSentimentScorer, daysToNearestEarnings, loadSentimentKeywords } from '@/scoring/sentiment';

const scorer = new KeywordSentimentScorer({
  positive: ['beat', 'strong'],
  negative: ['miss', 'lawsuit'],
  majorPositive: ['fda approval'],
  majorNegative: ['sec subpoena'],
  majorPositiveBonus: 15,
  majorNegativeCap: 30,
  earningsWindowDays: 3,
  earningsFloor: 70,
});

const headline = (title: string, text: string = ''): Headline => ({ title, text, publishedAt: null });

describe('KeywordSentimentScorer', () => {
  it('is exactly neutral for an empty headline set', () => {
    const score = scorer.score([]);

    expect(score.value).toBe(5);
    expect(score.notes).toEqual(['no headlines']);
    expect(score.degraded).toBe(true);
  });

  it('scores positive keyword hits', () => {
    const score = scorer.score([headline('Revenue beat on strong demand')]);

    expect(score.value).toBe(10);
    expect(score.metrics.positiveHits).toBe(2);
  });

  it('averages per-headline polarity, counting no hits as neutral', () => {
    const score = scorer.score([headline('Earnings miss'), headline('Quiet trading day')]);

    expect(score.value).toBe(2.5);
  });

  it('matches whole words only', () => {
    // "beats" and "missile" contain keywords but are different words
    const score = scorer.score([headline('Drummer beats record', 'missile test')]);

    expect(score.metrics.positiveHits).toBe(0);
    expect(score.metrics.negativeHits).toBe(0);
    expect(score.value).toBe(5);
  });

  it('adds the bonus for major positive news, case-insensitively', () => {
    const score = scorer.score([headline('Company wins FDA  Approval')]);

    expect(score.value).toBe(6.5);
    expect(score.metrics.majorPositive).toBe(true);
  });

  it('caps the score when major negative news appears', () => {
    const score = scorer.score([headline('Strong quarter', 'but an SEC subpoena looms')]);

    expect(score.value).toBe(3);
    expect(score.metrics.majorNegative).toBe(true);
  });
});

describe('earnings window', () => {
  it('lifts the score to the floor within the window on either side', () => {
    const quiet = [headline('Quiet trading day')];

    expect(scorer.score(quiet, { daysToEarnings: 2 }).value).toBe(7);
    expect(scorer.score(quiet, { daysToEarnings: -3 }).value).toBe(7);
    expect(scorer.score(quiet, { daysToEarnings: 2 }).metrics.nearEarnings).toBe(true);
    expect(scorer.score(quiet, { daysToEarnings: 5 }).value).toBe(5);
    expect(scorer.score(quiet, { daysToEarnings: null }).value).toBe(5);
  });

  it('leaves a score above the floor alone', () => {
    const score = scorer.score([headline('Revenue beat')], { daysToEarnings: 0 });

    expect(score.value).toBe(10);
  });

  it('applies the major positive bonus on top of the floor', () => {
    const score = scorer.score([headline('Company wins FDA approval')], { daysToEarnings: 1 });

    expect(score.value).toBe(8.5);
  });

  it('still caps major negative news near earnings', () => {
    const score = scorer.score([headline('SEC subpoena issued')], { daysToEarnings: 1 });

    expect(score.value).toBe(3);
  });

  it('keeps an empty headline set neutral', () => {
    const score = scorer.score([], { daysToEarnings: 0 });

    expect(score.value).toBe(5);
    expect(score.notes).toEqual(['no headlines']);
  });
});

describe('daysToNearestEarnings', () => {
  it('picks the closest date, past or upcoming', () => {
    expect(daysToNearestEarnings(['2024-02-01', '2024-05-03', '2024-07-30'], '2024-05-01')).toBe(2);
    expect(daysToNearestEarnings(['2024-04-29', '2024-07-30'], '2024-05-01')).toBe(-2);
  });

  it('is null without dates', () => {
    expect(daysToNearestEarnings([], '2024-05-01')).toBeNull();
  });
});

describe('loadSentimentKeywords', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it('reads the bundled keyword file', () => {
    const keywords = loadSentimentKeywords();

    expect(keywords.positive).toContain('beat');
    expect(keywords.majorNegative).toContain('guidance cut');
    expect(keywords.majorPositiveBonus).toBe(15);
    expect(keywords.earningsWindowDays).toBe(3);
    expect(keywords.earningsFloor).toBe(70);
  });

  it('rejects a malformed keyword file', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'sentiment-'));
    const path = join(tempDir, 'keywords.json');
    writeFileSync(path, JSON.stringify({ positive: 'beat' }));

    expect(() => loadSentimentKeywords(path)).toThrow(ConfigurationError);
  });
});
