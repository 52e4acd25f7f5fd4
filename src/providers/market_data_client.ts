/**
 * Market data client combining FMP (prices, profile, news, statements)
 * with Polygon (options chain, short interest).
 *
 * Critical data (quote, history) fails with ProviderError. Everything else
 * comes back as a FetchOutcome so callers can tell missing from failed.
 */

import { createChildLogger } from '@/utils/logger';
import { systemClock, type Clock } from '@/core/clock';
import { daysFrom } from '@/core/time';
import { toPercent } from './payload';
import type { FmpClient } from './fmp/client';
import type { PolygonClient } from './polygon/client';
import type { PolygonOptionContract, PolygonShortInterestRecord } from './polygon/types';
import {
  ProviderError,
  present,
  toFailedOutcome,
  unavailable,
  type AuxiliaryKind,
  type AuxiliaryPayloads,
  type EarningsCalendar,
  type FetchOutcome,
  type FundamentalsData,
  type GrowthData,
  type Headline,
  type HistoryResult,
  type Instrument,
  type MarketDataClient,
  type OptionsSnapshot,
  type Quote,
  type RequestOptions,
  type ShortInterestData,
} from './types';

const logger = createChildLogger('market_data_client');

export interface MarketDataClientOptions {
  newsLimit: number;
  /** Earnings calendar rows requested, past and upcoming */
  earningsLimit: number;
  /** Options contracts must expire at least this many days out */
  optionsMinDaysToExpiry: number;
  optionsChainLimit: number;
  /** Strike distance from the underlying, as a fraction, counted as at-the-money */
  atmBandFraction: number;
  shortInterestRecords: number;
}

const DEFAULT_OPTIONS: MarketDataClientOptions = {
  newsLimit: 5,
  earningsLimit: 8,
  optionsMinDaysToExpiry: 7,
  optionsChainLimit: 250,
  atmBandFraction: 0.05,
  shortInterestRecords: 4,
};

// Sentinel ratio when puts traded but calls did not
export const PUT_ONLY_RATIO = 999;

type AuxiliaryHandlers = {
  [K in AuxiliaryKind]: (
    symbol: string,
    signal?: AbortSignal
  ) => Promise<FetchOutcome<AuxiliaryPayloads[K]>>;
};

export function summarizeOptionsChain(
  contracts: readonly PolygonOptionContract[],
  atmBandFraction: number = DEFAULT_OPTIONS.atmBandFraction
): OptionsSnapshot | null {
  if (contracts.length === 0) return null;

  let totalCallVolume = 0;
  let totalPutVolume = 0;
  let netDelta = 0;
  for (const contract of contracts) {
    if (contract.contractType === 'call') {
      totalCallVolume += contract.dayVolume;
      netDelta += contract.delta ?? 0;
    } else if (contract.contractType === 'put') {
      totalPutVolume += contract.dayVolume;
    }
  }

  let putCallRatio: number;
  if (totalCallVolume > 0) {
    putCallRatio = totalPutVolume / totalCallVolume;
  } else if (totalPutVolume > 0) {
    putCallRatio = PUT_ONLY_RATIO;
  } else {
    putCallRatio = 1.0;
  }

  const underlying = contracts.find((c) => c.underlyingPrice !== null && c.underlyingPrice > 0);
  let atmImpliedVolatility: number | null = null;
  const price = underlying?.underlyingPrice ?? null;
  if (price !== null) {
    const ivs: number[] = [];
    for (const contract of contracts) {
      if (contract.strikePrice === null || contract.impliedVolatility === null) continue;
      if (Math.abs(contract.strikePrice - price) / price <= atmBandFraction) {
        ivs.push(contract.impliedVolatility);
      }
    }
    if (ivs.length > 0) {
      atmImpliedVolatility = ivs.reduce((sum, iv) => sum + iv, 0) / ivs.length;
    }
  }

  return {
    totalCallVolume,
    totalPutVolume,
    putCallRatio,
    atmImpliedVolatility,
    netDelta,
    contractCount: contracts.length,
  };
}

export function summarizeShortInterest(
  records: readonly PolygonShortInterestRecord[],
  sharesOutstanding: number | null
): ShortInterestData | null {
  const [latest, previous] = records;
  if (!latest) return null;

  let changePct: number | null = null;
  if (previous && previous.shortInterest > 0) {
    changePct = ((latest.shortInterest - previous.shortInterest) / previous.shortInterest) * 100;
  }

  let daysToCover = latest.daysToCover;
  if (daysToCover === null && latest.avgDailyVolume) {
    daysToCover = latest.shortInterest / latest.avgDailyVolume;
  }

  return {
    settlementDate: latest.settlementDate,
    shortInterest: latest.shortInterest,
    daysToCover,
    shortFloatPct:
      sharesOutstanding && sharesOutstanding > 0
        ? (latest.shortInterest / sharesOutstanding) * 100
        : null,
    changePct,
  };
}

export class CompositeMarketDataClient implements MarketDataClient {
  private readonly options: MarketDataClientOptions;
  // Shares outstanding seen on quotes in this run, used for short float
  private readonly sharesOutstanding = new Map<string, number>();
  private readonly handlers: AuxiliaryHandlers;

  constructor(
    private readonly fmp: FmpClient,
    private readonly polygon: PolygonClient | null,
    options: Partial<MarketDataClientOptions> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.handlers = {
      fundamentals: (symbol, signal) => this.fetchFundamentals(symbol, signal),
      growth: (symbol, signal) => this.fetchGrowth(symbol, signal),
      short_interest: (symbol, signal) => this.fetchShortInterest(symbol, signal),
      options: (symbol, signal) => this.fetchOptions(symbol, signal),
      headlines: (symbol, signal) => this.fetchHeadlines(symbol, signal),
      earnings: (symbol, signal) => this.fetchEarnings(symbol, signal),
    };
  }

  getRequestCount(): number {
    return this.fmp.getRequestCount() + (this.polygon?.getRequestCount() ?? 0);
  }

  async fetchQuote(symbol: string, options: RequestOptions = {}): Promise<Quote> {
    const quote = await this.fmp.fetchQuote(symbol, options.signal);
    if (!quote) {
      throw new ProviderError(`No quote for ${symbol}`, 'not_found', 'fmp', symbol, 'fetchQuote');
    }
    if (quote.sharesOutstanding !== null) {
      this.sharesOutstanding.set(symbol, quote.sharesOutstanding);
    }
    return {
      symbol,
      price: quote.price,
      bid: null,
      ask: null,
      volume: quote.volume,
      dayChangePct: quote.changesPercentage,
    };
  }

  async fetchHistory(
    symbol: string,
    lookbackBars: number,
    options: RequestOptions = {}
  ): Promise<HistoryResult> {
    const bars = await this.fmp.fetchHistory(symbol, lookbackBars, options.signal);
    if (bars === null) {
      throw new ProviderError(`No history for ${symbol}`, 'not_found', 'fmp', symbol, 'fetchHistory');
    }
    if (bars.length < lookbackBars) {
      logger.debug({ symbol, received: bars.length, requested: lookbackBars }, 'Short history');
      return { status: 'insufficient_history', bars, requested: lookbackBars };
    }
    return { status: 'complete', bars: bars.slice(bars.length - lookbackBars) };
  }

  async fetchInstrument(
    symbol: string,
    options: RequestOptions = {}
  ): Promise<FetchOutcome<Instrument>> {
    try {
      const profile = await this.fmp.fetchProfile(symbol, options.signal);
      if (!profile) return unavailable('no profile');
      const instrument: Instrument = { symbol };
      if (profile.companyName) instrument.companyName = profile.companyName;
      if (profile.sector) instrument.sector = profile.sector;
      if (profile.industry) instrument.industry = profile.industry;
      if (profile.mktCap !== null) instrument.marketCap = profile.mktCap;
      return present(instrument);
    } catch (error) {
      return toFailedOutcome(error);
    }
  }

  async fetchAuxiliary<K extends AuxiliaryKind>(
    symbol: string,
    kind: K,
    options: RequestOptions = {}
  ): Promise<FetchOutcome<AuxiliaryPayloads[K]>> {
    const handler: AuxiliaryHandlers[K] = this.handlers[kind];
    try {
      return await handler(symbol, options.signal);
    } catch (error) {
      logger.warn(
        { symbol, kind, error: error instanceof Error ? error.message : String(error) },
        'Auxiliary fetch failed'
      );
      return toFailedOutcome<AuxiliaryPayloads[K]>(error);
    }
  }

  private async fetchFundamentals(
    symbol: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome<FundamentalsData>> {
    const metrics = await this.fmp.fetchKeyMetrics(symbol, signal);
    const ratios = await this.fmp.fetchRatios(symbol, signal);

    const data: FundamentalsData = {
      roic: toPercent(metrics?.roic ?? ratios?.returnOnCapitalEmployed ?? null),
      fcfYield: toPercent(metrics?.freeCashFlowYield ?? null),
      debtToEquity: ratios?.debtEquityRatio ?? null,
    };
    if (data.roic === null && data.fcfYield === null && data.debtToEquity === null) {
      return unavailable('no fundamentals reported');
    }
    return present(data);
  }

  private async fetchGrowth(symbol: string, signal?: AbortSignal): Promise<FetchOutcome<GrowthData>> {
    const growth = await this.fmp.fetchFinancialGrowth(symbol, signal);
    if (!growth) return unavailable('no growth statements');

    const data: GrowthData = {
      revenueGrowth: toPercent(growth.revenueGrowth),
      epsGrowth: toPercent(growth.epsgrowth),
      revenueGrowth5y: toPercent(growth.fiveYRevenueGrowthPerShare),
    };
    if (data.revenueGrowth === null && data.epsGrowth === null && data.revenueGrowth5y === null) {
      return unavailable('no growth figures reported');
    }
    return present(data);
  }

  private async fetchShortInterest(
    symbol: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome<ShortInterestData>> {
    if (!this.polygon) return unavailable('polygon not configured');

    const records = await this.polygon.fetchShortInterest(
      symbol,
      this.options.shortInterestRecords,
      signal
    );
    const summary = summarizeShortInterest(records, this.sharesOutstanding.get(symbol) ?? null);
    return summary ? present(summary) : unavailable<ShortInterestData>('no short interest records');
  }

  private async fetchOptions(
    symbol: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome<OptionsSnapshot>> {
    if (!this.polygon) return unavailable('polygon not configured');

    const contracts = await this.polygon.fetchOptionsChain(
      symbol,
      {
        expirationDateGte: daysFrom(new Date(this.clock.now()), this.options.optionsMinDaysToExpiry),
        limit: this.options.optionsChainLimit,
      },
      signal
    );
    const snapshot = summarizeOptionsChain(contracts, this.options.atmBandFraction);
    return snapshot ? present(snapshot) : unavailable<OptionsSnapshot>('no listed options');
  }

  private async fetchHeadlines(
    symbol: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome<Headline[]>> {
    const news = await this.fmp.fetchNews(symbol, this.options.newsLimit, signal);
    // An empty list is a real answer: no recent headlines
    return present(
      news.map((item) => ({ title: item.title, text: item.text, publishedAt: item.publishedDate }))
    );
  }

  private async fetchEarnings(
    symbol: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome<EarningsCalendar>> {
    const events = await this.fmp.fetchEarningsCalendar(symbol, this.options.earningsLimit, signal);
    if (events.length === 0) return unavailable('no earnings dates');
    // ISO dates sort as strings
    const dates = [...new Set(events.map((event) => event.date))].sort();
    return present({ dates });
  }
}
