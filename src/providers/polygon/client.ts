/**
 * Polygon.io API client - options chain snapshot and short interest
 */

import { ProviderError } from '../types';
import type { JsonHttpClient } from '../http_client';
import { isRecord, readNumber, readRecord, readString, recordsOf, type JsonRecord } from '../payload';
import type { PolygonOptionContract, PolygonShortInterestRecord } from './types';

export const POLYGON_BASE_URL = 'https://api.polygon.io';

const EMPTY: JsonRecord = {};

export interface OptionsChainQuery {
  /** Earliest expiration date to include, YYYY-MM-DD */
  expirationDateGte: string;
  limit: number;
}

export class PolygonClient {
  constructor(private readonly http: JsonHttpClient) {}

  getRequestCount(): number {
    return this.http.getRequestCount();
  }

  private async getResults(
    path: string,
    params: Record<string, string | number>,
    symbol: string,
    method: string,
    signal?: AbortSignal
  ): Promise<unknown[]> {
    const data = await this.http.getJson(path, params, { symbol, method, signal });
    if (!isRecord(data)) {
      throw new ProviderError(
        `Polygon ${method}: expected an object`,
        'malformed_payload',
        'polygon',
        symbol,
        method
      );
    }
    return Array.isArray(data.results) ? data.results : [];
  }

  async fetchOptionsChain(
    symbol: string,
    query: OptionsChainQuery,
    signal?: AbortSignal
  ): Promise<PolygonOptionContract[]> {
    const results = await this.getResults(
      `/v3/snapshot/options/${symbol}`,
      { 'expiration_date.gte': query.expirationDateGte, limit: query.limit },
      symbol,
      'fetchOptionsChain',
      signal
    );

    return recordsOf(results).map((row) => {
      const details = readRecord(row, 'details') ?? EMPTY;
      const day = readRecord(row, 'day') ?? EMPTY;
      const greeks = readRecord(row, 'greeks') ?? EMPTY;
      const underlying = readRecord(row, 'underlying_asset') ?? EMPTY;
      const type = readString(details, 'contract_type');

      return {
        contractType: type === 'call' || type === 'put' ? type : null,
        strikePrice: readNumber(details, 'strike_price'),
        expirationDate: readString(details, 'expiration_date'),
        dayVolume: readNumber(day, 'volume') ?? 0,
        impliedVolatility: readNumber(row, 'implied_volatility'),
        delta: readNumber(greeks, 'delta'),
        underlyingPrice: readNumber(underlying, 'price'),
      };
    });
  }

  /** Short interest settlements, newest first */
  async fetchShortInterest(
    symbol: string,
    limit: number,
    signal?: AbortSignal
  ): Promise<PolygonShortInterestRecord[]> {
    const results = await this.getResults(
      '/stocks/v1/short-interest',
      { ticker: symbol, limit, sort: 'settlement_date.desc' },
      symbol,
      'fetchShortInterest',
      signal
    );

    const records: PolygonShortInterestRecord[] = [];
    for (const row of recordsOf(results)) {
      const settlementDate = readString(row, 'settlement_date');
      const shortInterest = readNumber(row, 'short_interest');
      if (settlementDate === null || shortInterest === null) continue;
      records.push({
        settlementDate,
        shortInterest,
        avgDailyVolume: readNumber(row, 'avg_daily_volume'),
        daysToCover: readNumber(row, 'days_to_cover'),
      });
    }

    return records.sort((a, b) => b.settlementDate.localeCompare(a.settlementDate));
  }
}
