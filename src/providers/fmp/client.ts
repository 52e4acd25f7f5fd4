/**
 * Financial Modeling Prep API client
 * Quotes, daily history, profile, news and statement-derived metrics
 */

import { createChildLogger } from '@/utils/logger';
import { ProviderError } from '../types';
import type { JsonHttpClient } from '../http_client';
import { isRecord, readNumber, readString, recordsOf, type JsonRecord } from '../payload';
import type {
  FmpEarningsEvent,
  FmpFinancialGrowth,
  FmpHistoricalBar,
  FmpKeyMetrics,
  FmpNewsItem,
  FmpProfile,
  FmpQuote,
  FmpRatios,
} from './types';

const logger = createChildLogger('fmp');

export const FMP_BASE_URL = 'https://financialmodelingprep.com/api/v3';

export class FmpClient {
  constructor(private readonly http: JsonHttpClient) {}

  getRequestCount(): number {
    return this.http.getRequestCount();
  }

  private malformed(symbol: string, method: string, detail: string): ProviderError {
    return new ProviderError(`FMP ${method}: ${detail}`, 'malformed_payload', 'fmp', symbol, method);
  }

  private async get(
    path: string,
    params: Record<string, string | number>,
    symbol: string,
    method: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    const data = await this.http.getJson(path, params, { symbol, method, signal });
    // FMP reports plan and key problems in a 200 body
    if (isRecord(data) && typeof data['Error Message'] === 'string') {
      throw new ProviderError(
        `FMP ${method}: ${data['Error Message']}`,
        'transient',
        'fmp',
        symbol,
        method
      );
    }
    return data;
  }

  /** First element of a list endpoint, or null when the list is empty */
  private async getFirst(
    path: string,
    params: Record<string, string | number>,
    symbol: string,
    method: string,
    signal?: AbortSignal
  ): Promise<JsonRecord | null> {
    const data = await this.get(path, params, symbol, method, signal);
    if (!Array.isArray(data)) {
      throw this.malformed(symbol, method, 'expected an array');
    }
    const [first] = recordsOf(data);
    return first ?? null;
  }

  async fetchQuote(symbol: string, signal?: AbortSignal): Promise<FmpQuote | null> {
    const row = await this.getFirst(`/quote/${symbol}`, {}, symbol, 'fetchQuote', signal);
    if (!row) return null;

    const price = readNumber(row, 'price');
    if (price === null) {
      throw this.malformed(symbol, 'fetchQuote', 'price missing');
    }
    return {
      symbol: readString(row, 'symbol') ?? symbol,
      price,
      volume: readNumber(row, 'volume') ?? 0,
      changesPercentage: readNumber(row, 'changesPercentage') ?? 0,
      sharesOutstanding: readNumber(row, 'sharesOutstanding'),
    };
  }

  /**
   * Daily bars, oldest first. The endpoint returns newest first, so the
   * result is reversed here. Returns null for unknown symbols.
   */
  async fetchHistory(
    symbol: string,
    bars: number,
    signal?: AbortSignal
  ): Promise<FmpHistoricalBar[] | null> {
    const data = await this.get(
      `/historical-price-full/${symbol}`,
      { timeseries: bars },
      symbol,
      'fetchHistory',
      signal
    );
    if (!isRecord(data)) {
      throw this.malformed(symbol, 'fetchHistory', 'expected an object');
    }
    if (!('historical' in data)) {
      return null;
    }

    const parsed: FmpHistoricalBar[] = [];
    let skipped = 0;
    for (const row of recordsOf(data.historical)) {
      const date = readString(row, 'date');
      const open = readNumber(row, 'open');
      const high = readNumber(row, 'high');
      const low = readNumber(row, 'low');
      const close = readNumber(row, 'close');
      if (date === null || open === null || high === null || low === null || close === null) {
        skipped++;
        continue;
      }
      parsed.push({ date, open, high, low, close, volume: readNumber(row, 'volume') ?? 0 });
    }

    if (skipped > 0) {
      logger.warn({ symbol, skipped }, 'Dropped incomplete historical bars');
    }

    return parsed.sort((a, b) => a.date.localeCompare(b.date));
  }

  async fetchProfile(symbol: string, signal?: AbortSignal): Promise<FmpProfile | null> {
    const row = await this.getFirst(`/profile/${symbol}`, {}, symbol, 'fetchProfile', signal);
    if (!row) return null;
    return {
      companyName: readString(row, 'companyName'),
      sector: readString(row, 'sector'),
      industry: readString(row, 'industry'),
      mktCap: readNumber(row, 'mktCap'),
    };
  }

  async fetchNews(symbol: string, limit: number, signal?: AbortSignal): Promise<FmpNewsItem[]> {
    const data = await this.get(
      '/news/stock',
      { symbols: symbol, limit },
      symbol,
      'fetchNews',
      signal
    );
    if (!Array.isArray(data)) {
      throw this.malformed(symbol, 'fetchNews', 'expected an array');
    }
    return recordsOf(data).map((row) => ({
      title: readString(row, 'title') ?? '',
      text: readString(row, 'text') ?? '',
      publishedDate: readString(row, 'publishedDate'),
    }));
  }

  /** Past and upcoming report dates; rows without a date are dropped */
  async fetchEarningsCalendar(
    symbol: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<FmpEarningsEvent[]> {
    const data = await this.get(
      `/historical/earning_calendar/${symbol}`,
      { limit },
      symbol,
      'fetchEarningsCalendar',
      signal
    );
    if (!Array.isArray(data)) {
      throw this.malformed(symbol, 'fetchEarningsCalendar', 'expected an array');
    }
    const events: FmpEarningsEvent[] = [];
    for (const row of recordsOf(data)) {
      const date = readString(row, 'date');
      if (date) events.push({ date, epsEstimated: readNumber(row, 'epsEstimated') });
    }
    return events;
  }

  async fetchKeyMetrics(symbol: string, signal?: AbortSignal): Promise<FmpKeyMetrics | null> {
    const row = await this.getFirst(
      `/key-metrics/${symbol}`,
      { limit: 1 },
      symbol,
      'fetchKeyMetrics',
      signal
    );
    if (!row) return null;
    return {
      roic: readNumber(row, 'roic'),
      freeCashFlowYield: readNumber(row, 'freeCashFlowYield'),
    };
  }

  async fetchRatios(symbol: string, signal?: AbortSignal): Promise<FmpRatios | null> {
    const row = await this.getFirst(`/ratios/${symbol}`, { limit: 1 }, symbol, 'fetchRatios', signal);
    if (!row) return null;
    return {
      returnOnCapitalEmployed: readNumber(row, 'returnOnCapitalEmployed'),
      debtEquityRatio: readNumber(row, 'debtEquityRatio'),
    };
  }

  async fetchFinancialGrowth(
    symbol: string,
    signal?: AbortSignal
  ): Promise<FmpFinancialGrowth | null> {
    const row = await this.getFirst(
      `/financial-growth/${symbol}`,
      { limit: 1 },
      symbol,
      'fetchFinancialGrowth',
      signal
    );
    if (!row) return null;
    return {
      revenueGrowth: readNumber(row, 'revenueGrowth'),
      epsgrowth: readNumber(row, 'epsgrowth'),
      fiveYRevenueGrowthPerShare: readNumber(row, 'fiveYRevenueGrowthPerShare'),
    };
  }
}
