/**
 * Headline sentiment scoring.
 *
 * The engine only sees HeadlineSentimentScorer, so the keyword scorer can be
 * replaced by a richer model without touching scoring.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Headline } from '@/providers/types';
import { ConfigurationError } from '@/core/errors';
import { calendarDaysBetween } from '@/core/time';
import { isRecord } from '@/providers/payload';
import { clamp } from './normalize';
import { NEUTRAL_SCORE, makeSubScore, type SubScore } from './types';

export interface SentimentContext {
  /** Signed calendar days to the nearest earnings date; null when unknown */
  daysToEarnings: number | null;
}

export interface HeadlineSentimentScorer {
  /** Sub-score for the headline set; an empty set is exactly NEUTRAL_SCORE */
  score(headlines: readonly Headline[], context?: SentimentContext): SubScore;
}

export interface SentimentKeywords {
  positive: string[];
  negative: string[];
  majorPositive: string[];
  majorNegative: string[];
  /** Points (0-100 scale) added when a major positive phrase appears */
  majorPositiveBonus: number;
  /** Ceiling (0-100 scale) applied when a major negative phrase appears */
  majorNegativeCap: number;
  /** Earnings this many calendar days away, either side, lift the score to earningsFloor */
  earningsWindowDays: number;
  earningsFloor: number;
}

const DEFAULT_KEYWORDS_PATH = fileURLToPath(
  new URL('../../config/sentiment_keywords.json', import.meta.url)
);

function stringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigurationError(`sentiment keywords: ${field} must be a list of strings`);
  }
  return value;
}

function numberField(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`sentiment keywords: ${field} must be a number`);
  }
  return value;
}

export function loadSentimentKeywords(path: string = DEFAULT_KEYWORDS_PATH): SentimentKeywords {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`sentiment keywords: ${path} must hold an object`);
  }
  return {
    positive: stringList(parsed.positive, 'positive'),
    negative: stringList(parsed.negative, 'negative'),
    majorPositive: stringList(parsed.major_positive, 'major_positive'),
    majorNegative: stringList(parsed.major_negative, 'major_negative'),
    majorPositiveBonus: numberField(parsed.major_positive_bonus, 'major_positive_bonus'),
    majorNegativeCap: numberField(parsed.major_negative_cap, 'major_negative_cap'),
    earningsWindowDays: numberField(parsed.earnings_window_days, 'earnings_window_days'),
    earningsFloor: numberField(parsed.earnings_floor, 'earnings_floor'),
  };
}

/**
 * Signed days from `asOf` to the closest earnings date, past or upcoming.
 * Null for an empty calendar.
 */
export function daysToNearestEarnings(dates: readonly string[], asOf: string): number | null {
  let nearest: number | null = null;
  for (const date of dates) {
    const days = calendarDaysBetween(asOf, date);
    if (nearest === null || Math.abs(days) < Math.abs(nearest)) {
      nearest = days;
    }
  }
  return nearest;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive matcher for a word or phrase */
function phraseMatcher(phrase: string): RegExp {
  const pattern = phrase.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`\\b${pattern}\\b`, 'i');
}

/**
 * Keyword polarity per headline: positive / (positive + negative) on 0-100,
 * 50 when neither appears. The mean over headlines is raised to the earnings
 * floor near a report, gets a bonus for major positive news and is capped
 * when major negative news appears, in that order.
 */
export class KeywordSentimentScorer implements HeadlineSentimentScorer {
  private readonly positive: RegExp[];
  private readonly negative: RegExp[];
  private readonly majorPositive: RegExp[];
  private readonly majorNegative: RegExp[];

  constructor(private readonly keywords: SentimentKeywords = loadSentimentKeywords()) {
    this.positive = keywords.positive.map(phraseMatcher);
    this.negative = keywords.negative.map(phraseMatcher);
    this.majorPositive = keywords.majorPositive.map(phraseMatcher);
    this.majorNegative = keywords.majorNegative.map(phraseMatcher);
  }

  score(headlines: readonly Headline[], context: SentimentContext = { daysToEarnings: null }): SubScore {
    if (headlines.length === 0) {
      return makeSubScore('sentiment', NEUTRAL_SCORE, { headlineCount: 0 }, ['no headlines']);
    }

    let total = 0;
    let hasMajorPositive = false;
    let hasMajorNegative = false;
    let positiveHits = 0;
    let negativeHits = 0;

    for (const headline of headlines) {
      const text = `${headline.title} ${headline.text}`;
      const pos = this.positive.filter((re) => re.test(text)).length;
      const neg = this.negative.filter((re) => re.test(text)).length;
      positiveHits += pos;
      negativeHits += neg;
      total += pos + neg === 0 ? 50 : (pos / (pos + neg)) * 100;

      hasMajorPositive ||= this.majorPositive.some((re) => re.test(text));
      hasMajorNegative ||= this.majorNegative.some((re) => re.test(text));
    }

    let score = total / headlines.length;
    const { daysToEarnings } = context;
    const nearEarnings =
      daysToEarnings !== null && Math.abs(daysToEarnings) <= this.keywords.earningsWindowDays;
    if (nearEarnings) {
      score = Math.max(score, this.keywords.earningsFloor);
    }
    if (hasMajorPositive) {
      score = Math.min(score + this.keywords.majorPositiveBonus, 100);
    }
    if (hasMajorNegative) {
      score = Math.min(score, this.keywords.majorNegativeCap);
    }

    return makeSubScore('sentiment', clamp(score) / 10, {
      headlineCount: headlines.length,
      positiveHits,
      negativeHits,
      majorPositive: hasMajorPositive,
      majorNegative: hasMajorNegative,
      daysToEarnings,
      nearEarnings,
    });
  }
}
