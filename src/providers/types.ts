/**
 * Shared types and interfaces for market data providers.
 *
 * Adapters normalize vendor payloads into these shapes so the scoring engine
 * never sees a vendor schema. Price series are always ordered oldest first:
 * the newest bar is the last element.
 */

import { AbortError } from '@/core/clock';

export interface OHLCVBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Quote {
  symbol: string;
  price: number;
  bid: number | null;
  ask: number | null;
  volume: number;
  dayChangePct: number;
}

export interface Instrument {
  symbol: string;
  companyName?: string;
  sector?: string;
  industry?: string;
  marketCap?: number;
}

export interface ReferenceSeries {
  symbol: string;
  bars: readonly OHLCVBar[];
}

export interface FundamentalsData {
  /** Return on invested capital, percent */
  roic: number | null;
  /** Free cash flow yield, percent */
  fcfYield: number | null;
  debtToEquity: number | null;
}

export interface GrowthData {
  revenueGrowth: number | null;
  epsGrowth: number | null;
  revenueGrowth5y: number | null;
}

export interface ShortInterestData {
  settlementDate: string;
  shortInterest: number;
  daysToCover: number | null;
  /** Short interest as percent of float; null when float is unknown */
  shortFloatPct: number | null;
  /** Change vs. the previous settlement, percent */
  changePct: number | null;
}

export interface OptionsSnapshot {
  totalCallVolume: number;
  totalPutVolume: number;
  putCallRatio: number | null;
  /** Mean implied volatility of near-the-money contracts, as a fraction */
  atmImpliedVolatility: number | null;
  netDelta: number;
  contractCount: number;
}

export interface Headline {
  title: string;
  text: string;
  publishedAt: string | null;
}

export interface EarningsCalendar {
  /** Reported and scheduled earnings dates, YYYY-MM-DD, ascending */
  dates: string[];
}

export interface AuxiliaryPayloads {
  fundamentals: FundamentalsData;
  growth: GrowthData;
  short_interest: ShortInterestData;
  options: OptionsSnapshot;
  headlines: Headline[];
  earnings: EarningsCalendar;
}

export type AuxiliaryKind = keyof AuxiliaryPayloads;

export type ProviderErrorKind = 'not_found' | 'transient' | 'malformed_payload';

/**
 * Result of a fetch whose absence is a normal outcome.
 * 'unavailable' means the data does not exist for this symbol (or the source
 * is not configured); 'error' means fetching it failed.
 */
export type FetchOutcome<T> =
  | { status: 'present'; value: T }
  | { status: 'unavailable'; reason?: string }
  | { status: 'error'; kind: ProviderErrorKind; message: string };

export type HistoryResult =
  | { status: 'complete'; bars: OHLCVBar[] }
  | { status: 'insufficient_history'; bars: OHLCVBar[]; requested: number };

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface MarketDataClient {
  fetchQuote(symbol: string, options?: RequestOptions): Promise<Quote>;
  fetchHistory(
    symbol: string,
    lookbackBars: number,
    options?: RequestOptions
  ): Promise<HistoryResult>;
  fetchInstrument(symbol: string, options?: RequestOptions): Promise<FetchOutcome<Instrument>>;
  fetchAuxiliary<K extends AuxiliaryKind>(
    symbol: string,
    kind: K,
    options?: RequestOptions
  ): Promise<FetchOutcome<AuxiliaryPayloads[K]>>;
  getRequestCount(): number;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public kind: ProviderErrorKind,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export function present<T>(value: T): FetchOutcome<T> {
  return { status: 'present', value };
}

export function unavailable<T>(reason?: string): FetchOutcome<T> {
  return reason ? { status: 'unavailable', reason } : { status: 'unavailable' };
}

/** Converts a failed auxiliary fetch into an outcome. Aborts are rethrown. */
export function toFailedOutcome<T>(error: unknown): FetchOutcome<T> {
  if (error instanceof AbortError) {
    throw error;
  }
  if (error instanceof ProviderError) {
    if (error.kind === 'not_found') {
      return { status: 'unavailable', reason: error.message };
    }
    return { status: 'error', kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { status: 'error', kind: 'transient', message };
}
