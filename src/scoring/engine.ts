/**
 * Main Scoring Engine
 *
 * Each symbol moves Fetched -> Validated -> Scored -> Admitted | Rejected.
 * Fetching runs on a bounded worker pool; scoring runs inline. Per-symbol
 * failures become rejection records and never stop the batch.
 */

import { createChildLogger } from '@/utils/logger';
import { AbortError, systemClock, type Clock } from '@/core/clock';
import { formatDate, formatTimestamp } from '@/core/time';
import type { Instrument, MarketDataClient, OHLCVBar, Quote, ReferenceSeries } from '@/providers/types';
import { checkAdmission } from './filters';
import { fetchAuxiliaryData, fetchCriticalData, type AuxiliaryOutcomes } from './fetch';
import { scoreFundamentalQuality, scoreGrowth } from './fundamental';
import { clamp } from './normalize';
import { scoreOptions } from './options';
import type { ScoringConfig } from './scoring_config';
import {
  KeywordSentimentScorer,
  daysToNearestEarnings,
  type HeadlineSentimentScorer,
} from './sentiment';
import { scoreShortInterest } from './short_interest';
import {
  scoreLiquidity,
  scoreMomentum,
  scoreRelativeStrength,
  scoreTechnical,
  scoreVolatility,
  scoreVolume,
} from './technical';
import { rankResults, sortRejected } from './topk';
import { buildRunSummary, type RunSummary } from '@/run/summary';
import {
  DIMENSIONS,
  type CompositeResult,
  type DimensionWeights,
  type Rejection,
  type SubScores,
} from './types';

const logger = createChildLogger('scoring_engine');

export interface SymbolSnapshot {
  symbol: string;
  bars: readonly OHLCVBar[];
  quote: Quote;
  instrument: Instrument | null;
  auxiliary: AuxiliaryOutcomes;
}

export interface ReferenceContext {
  benchmark: ReferenceSeries | null;
  sector: ReferenceSeries | null;
}

export interface ScoringDeps {
  client: MarketDataClient;
  config: ScoringConfig;
  sentimentScorer?: HeadlineSentimentScorer;
  clock?: Clock;
  /** Aborting this signal stops the run like the run timeout does */
  signal?: AbortSignal;
}

export interface ScoringRun {
  /** Admitted results, best first */
  ranked: CompositeResult[];
  /** Rejected results, by symbol */
  rejected: CompositeResult[];
  summary: RunSummary;
  metadata: {
    runDate: string;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
    requestsMade: number;
    timedOut: boolean;
    benchmark: string;
    benchmarkAvailable: boolean;
    preset: string | null;
  };
}

export function computeWeightedTotal(subScores: SubScores, weights: DimensionWeights): number {
  let total = 0;
  for (const dimension of DIMENSIONS) {
    total += subScores[dimension].value * weights[dimension];
  }
  return clamp(total, 0, 10);
}

/**
 * Pure scoring of a validated snapshot. Same input, same output.
 */
export function scoreSymbol(
  snapshot: SymbolSnapshot,
  reference: ReferenceContext,
  config: ScoringConfig,
  sentimentScorer: HeadlineSentimentScorer
): { subScores: SubScores; weightedTotal: number } {
  const { bars, quote, auxiliary } = snapshot;
  const headlines = auxiliary.headlines.status === 'present' ? auxiliary.headlines.value : [];
  // Counted from the latest bar's date, not the wall clock
  const daysToEarnings =
    auxiliary.earnings.status === 'present'
      ? daysToNearestEarnings(auxiliary.earnings.value.dates, bars[bars.length - 1].date)
      : null;

  const subScores: SubScores = {
    momentum: scoreMomentum(bars, config),
    volume: scoreVolume(bars, config),
    technical: scoreTechnical(bars, config),
    volatility: scoreVolatility(bars, config),
    relative_strength: scoreRelativeStrength(bars, reference.benchmark, reference.sector, config),
    sentiment: sentimentScorer.score(headlines, { daysToEarnings }),
    liquidity: scoreLiquidity(bars, quote, config),
    fundamental_quality: scoreFundamentalQuality(
      auxiliary.fundamentals,
      config.features.enableFundamentals
    ),
    short_interest: scoreShortInterest(auxiliary.short_interest),
    growth: scoreGrowth(auxiliary.growth, config.features.enableFundamentals),
    options: scoreOptions(auxiliary.options, config.features.enableOptions),
  };

  if (auxiliary.headlines.status === 'error') {
    subScores.sentiment.degraded = true;
    subScores.sentiment.notes.push(`headlines fetch failed: ${auxiliary.headlines.message}`);
  }

  return { subScores, weightedTotal: computeWeightedTotal(subScores, config.weights) };
}

function rejected(
  symbol: string,
  rejection: Rejection,
  instrument: Instrument | null = null,
  scored?: { subScores: SubScores; weightedTotal: number }
): CompositeResult {
  return {
    symbol,
    state: 'rejected',
    passedFilters: scored !== undefined,
    instrument,
    subScores: scored?.subScores ?? null,
    weightedTotal: scored?.weightedTotal ?? null,
    rejection,
  };
}

const TIMEOUT_REJECTION: Rejection = {
  code: 'run_timeout',
  message: 'run timed out before this symbol finished',
};

async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T) => Promise<void>,
  concurrency: number
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: Math.max(1, concurrency) }, async () => {
    while (index < items.length) {
      const current = items[index];
      index += 1;
      await worker(current);
    }
  });

  await Promise.all(workers);
}

async function fetchReferenceSeries(
  symbol: string,
  client: MarketDataClient,
  bars: number,
  signal: AbortSignal
): Promise<ReferenceSeries | null> {
  try {
    const history = await client.fetchHistory(symbol, bars, { signal });
    return { symbol, bars: history.bars };
  } catch (error) {
    if (error instanceof AbortError) throw error;
    logger.warn(
      { symbol, error: error instanceof Error ? error.message : String(error) },
      'Reference series unavailable'
    );
    return null;
  }
}

interface RunContext {
  client: MarketDataClient;
  config: ScoringConfig;
  sentimentScorer: HeadlineSentimentScorer;
  signal: AbortSignal;
  benchmark: ReferenceSeries | null;
  sectorSeries: Map<string, Promise<ReferenceSeries | null>>;
}

function sectorSeriesFor(instrument: Instrument | null, ctx: RunContext): Promise<ReferenceSeries | null> {
  const etf = instrument?.sector ? ctx.config.sectorEtfs[instrument.sector] : undefined;
  if (!etf) return Promise.resolve(null);

  let pending = ctx.sectorSeries.get(etf);
  if (!pending) {
    pending = fetchReferenceSeries(etf, ctx.client, ctx.config.lookbacks.historyBars, ctx.signal);
    // A rejected promise would be shared by every symbol in the sector
    ctx.sectorSeries.set(etf, pending.catch(() => null));
  }
  return pending;
}

async function evaluateSymbol(symbol: string, ctx: RunContext): Promise<CompositeResult> {
  const { client, config, signal } = ctx;

  const critical = await fetchCriticalData(symbol, client, config, signal);
  if (critical.status === 'rejected') {
    return rejected(symbol, critical.rejection);
  }

  const rejection = checkAdmission(critical, config);
  if (rejection) {
    return rejected(symbol, rejection, critical.instrument);
  }

  const [auxiliary, sector] = await Promise.all([
    fetchAuxiliaryData(symbol, client, config, signal),
    sectorSeriesFor(critical.instrument, ctx),
  ]);

  const scored = scoreSymbol(
    { symbol, bars: critical.bars, quote: critical.quote, instrument: critical.instrument, auxiliary },
    { benchmark: ctx.benchmark, sector },
    config,
    ctx.sentimentScorer
  );

  if (scored.weightedTotal < config.pipeline.minCompositeScore) {
    return rejected(
      symbol,
      {
        code: 'below_min_score',
        message: `score ${scored.weightedTotal.toFixed(2)} below ${config.pipeline.minCompositeScore}`,
      },
      critical.instrument,
      scored
    );
  }

  return {
    symbol,
    state: 'admitted',
    passedFilters: true,
    instrument: critical.instrument,
    subScores: scored.subScores,
    weightedTotal: scored.weightedTotal,
  };
}

/**
 * Scores every symbol and ranks the admitted ones. The configuration must
 * already be validated; this never throws for a single symbol's failure.
 */
export async function runScoring(symbols: string[], deps: ScoringDeps): Promise<ScoringRun> {
  const { client, config } = deps;
  const clock = deps.clock ?? systemClock;
  const sentimentScorer = deps.sentimentScorer ?? new KeywordSentimentScorer();
  const startedAt = clock.now();

  const controller = new AbortController();
  const onExternalAbort = () => controller.abort();
  if (deps.signal?.aborted) {
    controller.abort();
  } else {
    deps.signal?.addEventListener('abort', onExternalAbort, { once: true });
  }
  const timer = setTimeout(() => {
    logger.warn({ runTimeoutMs: config.pipeline.runTimeoutMs }, 'Run timeout reached, aborting');
    controller.abort();
  }, config.pipeline.runTimeoutMs);

  logger.info(
    { symbolCount: symbols.length, benchmark: config.benchmark, preset: config.preset },
    'Starting scoring run'
  );

  const results: CompositeResult[] = [];
  let benchmark: ReferenceSeries | null = null;

  try {
    if (!controller.signal.aborted) {
      try {
        benchmark = await fetchReferenceSeries(
          config.benchmark,
          client,
          config.lookbacks.historyBars,
          controller.signal
        );
      } catch (error) {
        if (!(error instanceof AbortError)) throw error;
      }
    }

    const ctx: RunContext = {
      client,
      config,
      sentimentScorer,
      signal: controller.signal,
      benchmark,
      sectorSeries: new Map(),
    };

    await runWithConcurrency(
      symbols,
      async (symbol) => {
        if (controller.signal.aborted) {
          results.push(rejected(symbol, TIMEOUT_REJECTION));
          return;
        }
        try {
          const result = await evaluateSymbol(symbol, ctx);
          results.push(result);
          logger.debug(
            { symbol, state: result.state, total: result.weightedTotal, rejection: result.rejection?.code },
            'Symbol evaluated'
          );
        } catch (error) {
          if (controller.signal.aborted) {
            results.push(rejected(symbol, TIMEOUT_REJECTION));
            return;
          }
          const message = error instanceof Error ? error.message : String(error);
          logger.error({ symbol, error: message }, 'Unexpected error while scoring symbol');
          results.push(rejected(symbol, { code: 'internal_error', message }));
        }
      },
      config.pipeline.maxConcurrency
    );
  } finally {
    clearTimeout(timer);
    deps.signal?.removeEventListener('abort', onExternalAbort);
  }

  const finishedAt = clock.now();
  const summary = buildRunSummary(results);

  logger.info(
    { ...summary, timedOut: controller.signal.aborted, durationMs: finishedAt - startedAt },
    'Scoring run complete'
  );

  return {
    ranked: rankResults(results),
    rejected: sortRejected(results),
    summary,
    metadata: {
      runDate: formatDate(new Date(startedAt)),
      startedAt: formatTimestamp(startedAt),
      finishedAt: formatTimestamp(finishedAt),
      durationMs: finishedAt - startedAt,
      requestsMade: client.getRequestCount(),
      timedOut: controller.signal.aborted,
      benchmark: config.benchmark,
      benchmarkAvailable: benchmark !== null,
      preset: config.preset,
    },
  };
}
