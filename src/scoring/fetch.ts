/**
 * Per-symbol data fetching for the scoring pipeline
 */

import { createChildLogger } from '@/utils/logger';
import { AbortError } from '@/core/clock';
import {
  ProviderError,
  unavailable,
  type AuxiliaryKind,
  type AuxiliaryPayloads,
  type FetchOutcome,
  type Instrument,
  type MarketDataClient,
  type OHLCVBar,
  type Quote,
} from '@/providers/types';
import type { ScoringConfig } from './scoring_config';
import { checkHistory } from './filters';
import type { Rejection } from './types';

const logger = createChildLogger('scoring_fetch');

export type AuxiliaryOutcomes = {
  [K in AuxiliaryKind]: FetchOutcome<AuxiliaryPayloads[K]>;
};

export type CriticalData =
  | { status: 'ok'; bars: OHLCVBar[]; quote: Quote; instrument: Instrument | null }
  | { status: 'rejected'; rejection: Rejection; bars: OHLCVBar[] };

export function rejectionFromError(error: unknown, what: string): Rejection {
  if (error instanceof ProviderError) {
    if (error.kind === 'not_found') {
      return { code: 'not_found', message: `${what}: ${error.message}` };
    }
    // Malformed payloads count as transient failures of that call
    return { code: 'transient', message: `${what} (${error.kind}): ${error.message}` };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: 'internal_error', message: `${what}: ${message}` };
}

/**
 * History, quote and instrument. History or quote failures, and a history
 * shorter than the minimum, reject the symbol; a missing instrument does not.
 */
export async function fetchCriticalData(
  symbol: string,
  client: MarketDataClient,
  config: ScoringConfig,
  signal?: AbortSignal
): Promise<CriticalData> {
  let bars: OHLCVBar[];
  try {
    const history = await client.fetchHistory(symbol, config.lookbacks.historyBars, { signal });
    bars = history.bars;
  } catch (error) {
    if (error instanceof AbortError) throw error;
    return { status: 'rejected', rejection: rejectionFromError(error, 'history'), bars: [] };
  }

  // Nothing else is fetched for a series that cannot be scored
  const historyRejection = checkHistory(bars, config);
  if (historyRejection) {
    logger.debug({ symbol, bars: bars.length }, 'Short history, skipping remaining fetches');
    return { status: 'rejected', rejection: historyRejection, bars };
  }

  let quote: Quote;
  try {
    quote = await client.fetchQuote(symbol, { signal });
  } catch (error) {
    if (error instanceof AbortError) throw error;
    return { status: 'rejected', rejection: rejectionFromError(error, 'quote'), bars };
  }

  const profile = await client.fetchInstrument(symbol, { signal });
  const instrument = profile.status === 'present' ? profile.value : null;

  return { status: 'ok', bars, quote, instrument };
}

/**
 * Auxiliary datasets for a symbol that passed admission. Disabled features
 * are not requested.
 */
export async function fetchAuxiliaryData(
  symbol: string,
  client: MarketDataClient,
  config: ScoringConfig,
  signal?: AbortSignal
): Promise<AuxiliaryOutcomes> {
  const { enableFundamentals, enableOptions } = config.features;

  const [fundamentals, growth, shortInterest, options, headlines, earnings] = await Promise.all([
    enableFundamentals
      ? client.fetchAuxiliary(symbol, 'fundamentals', { signal })
      : unavailable<AuxiliaryPayloads['fundamentals']>('disabled'),
    enableFundamentals
      ? client.fetchAuxiliary(symbol, 'growth', { signal })
      : unavailable<AuxiliaryPayloads['growth']>('disabled'),
    client.fetchAuxiliary(symbol, 'short_interest', { signal }),
    enableOptions
      ? client.fetchAuxiliary(symbol, 'options', { signal })
      : unavailable<AuxiliaryPayloads['options']>('disabled'),
    client.fetchAuxiliary(symbol, 'headlines', { signal }),
    client.fetchAuxiliary(symbol, 'earnings', { signal }),
  ]);

  return {
    fundamentals,
    growth,
    short_interest: shortInterest,
    options,
    headlines,
    earnings,
  };
}
