import { addDays } from 'date-fns';
import { AbortError, type Clock } from '@/core/clock';
import { formatDate } from '@/core/time';
import {
  ProviderError,
  present,
  unavailable,
  type AuxiliaryKind,
  type AuxiliaryPayloads,
  type FetchOutcome,
  type HistoryResult,
  type Instrument,
  type MarketDataClient,
  type OHLCVBar,
  type Quote,
  type RequestOptions,
} from '@/providers/types';
import type { AuxiliaryOutcomes } from '@/scoring/fetch';

const START = new Date(2024, 0, 1);

/** Clock whose sleep advances simulated time immediately */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new AbortError();
    this.sleeps.push(ms);
    // Pending callbacks see the time before the jump
    await new Promise((resolve) => setTimeout(resolve, 0));
    this.current += Math.max(0, ms);
  }
}

/** Daily bars, oldest first, one calendar day apart */
export function makeBars(closes: readonly number[], volumes?: readonly number[]): OHLCVBar[] {
  return closes.map((close, i) => ({
    date: formatDate(addDays(START, i)),
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume: volumes?.[i] ?? 1_000_000,
  }));
}

/** 80 flat closes at 100, then +2 a day for 10 days, ending at 120 */
export function risingTailCloses(): number[] {
  return Array.from({ length: 90 }, (_, i) => (i < 80 ? 100 : 100 + 2 * (i - 79)));
}

export function makeQuote(symbol: string, price: number, volume: number = 1_000_000): Quote {
  return { symbol, price, bid: null, ask: null, volume, dayChangePct: 0 };
}

export interface FakeSymbolData {
  bars?: OHLCVBar[];
  quote?: Quote;
  instrument?: Instrument;
  auxiliary?: Partial<AuxiliaryOutcomes>;
  /** Thrown by fetchQuote / fetchHistory in place of data */
  quoteError?: ProviderError;
  historyError?: ProviderError;
  /** History never resolves until the request is aborted */
  hang?: boolean;
}

/** In-memory client; symbols not in the map are not found */
export class FakeMarketDataClient implements MarketDataClient {
  readonly calls: string[] = [];

  constructor(private readonly data: Record<string, FakeSymbolData>) {}

  getRequestCount(): number {
    return this.calls.length;
  }

  private lookup(symbol: string, method: string): FakeSymbolData {
    this.calls.push(`${method}:${symbol}`);
    const entry = this.data[symbol];
    if (!entry) {
      throw new ProviderError(`No data for ${symbol}`, 'not_found', 'fake', symbol, method);
    }
    return entry;
  }

  async fetchQuote(symbol: string): Promise<Quote> {
    const entry = this.lookup(symbol, 'fetchQuote');
    if (entry.quoteError) throw entry.quoteError;
    if (!entry.quote) {
      throw new ProviderError(`No quote for ${symbol}`, 'not_found', 'fake', symbol, 'fetchQuote');
    }
    return entry.quote;
  }

  async fetchHistory(
    symbol: string,
    lookbackBars: number,
    options: RequestOptions = {}
  ): Promise<HistoryResult> {
    const entry = this.lookup(symbol, 'fetchHistory');
    if (entry.historyError) throw entry.historyError;
    if (entry.hang) {
      return new Promise<HistoryResult>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new AbortError()), { once: true });
      });
    }
    const bars = entry.bars ?? [];
    if (bars.length < lookbackBars) {
      return { status: 'insufficient_history', bars, requested: lookbackBars };
    }
    return { status: 'complete', bars: bars.slice(bars.length - lookbackBars) };
  }

  async fetchInstrument(symbol: string): Promise<FetchOutcome<Instrument>> {
    const entry = this.lookup(symbol, 'fetchInstrument');
    return entry.instrument ? present(entry.instrument) : unavailable('no profile');
  }

  async fetchAuxiliary<K extends AuxiliaryKind>(
    symbol: string,
    kind: K
  ): Promise<FetchOutcome<AuxiliaryPayloads[K]>> {
    const entry = this.lookup(symbol, `fetchAuxiliary.${kind}`);
    const outcome: FetchOutcome<AuxiliaryPayloads[K]> | undefined = entry.auxiliary?.[kind];
    return outcome ?? unavailable<AuxiliaryPayloads[K]>('not stubbed');
  }
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
