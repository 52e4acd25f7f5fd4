import { createChildLogger } from '@/utils/logger';
import { systemClock, type Clock } from '@/core/clock';
import type { EnvConfig } from '@/core/env';
import type { ScoringConfig } from '@/scoring/scoring_config';
import { FMP_BASE_URL, FmpClient } from './fmp/client';
import { JsonHttpClient, type FetchFn } from './http_client';
import {
  CompositeMarketDataClient,
  type MarketDataClientOptions,
} from './market_data_client';
import { POLYGON_BASE_URL, PolygonClient } from './polygon/client';
import { RateLimiter } from './rate_limiter';
import type { MarketDataClient } from './types';

const logger = createChildLogger('provider_registry');

export interface CreateClientOptions {
  clock?: Clock;
  fetchFn?: FetchFn;
  client?: Partial<MarketDataClientOptions>;
}

/**
 * Build the market data client from ENV keys and scoring config.
 *
 * Each upstream gets its own limiter; every request to that upstream in
 * the process goes through it. Polygon is optional: without a key, options
 * and short interest come back unavailable.
 */
export function createMarketDataClient(
  env: Pick<EnvConfig, 'fmpApiKey' | 'polygonApiKey'>,
  config: ScoringConfig,
  options: CreateClientOptions = {}
): MarketDataClient {
  const clock = options.clock ?? systemClock;

  const fmpHttp = new JsonHttpClient({
    provider: 'fmp',
    baseUrl: FMP_BASE_URL,
    authParam: 'apikey',
    apiKey: env.fmpApiKey,
    rateLimiter: new RateLimiter(config.rateLimits.fmp, clock, 'fmp'),
    retry: config.retry,
    clock,
    fetchFn: options.fetchFn,
  });

  let polygon: PolygonClient | null = null;
  if (env.polygonApiKey) {
    polygon = new PolygonClient(
      new JsonHttpClient({
        provider: 'polygon',
        baseUrl: POLYGON_BASE_URL,
        authParam: 'apiKey',
        apiKey: env.polygonApiKey,
        rateLimiter: new RateLimiter(config.rateLimits.polygon, clock, 'polygon'),
        retry: config.retry,
        clock,
        fetchFn: options.fetchFn,
      })
    );
  } else {
    logger.warn('POLYGON_API_KEY not set; options and short interest will score neutral');
  }

  return new CompositeMarketDataClient(new FmpClient(fmpHttp), polygon, options.client, clock);
}
