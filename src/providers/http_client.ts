/**
 * JSON-over-HTTP transport shared by the provider adapters.
 * Rate-limited, with exponential backoff on 429/5xx and network failures.
 */

import { createChildLogger } from '@/utils/logger';
import { AbortError, systemClock, throwIfAborted, type Clock } from '@/core/clock';
import { ProviderError } from './types';
import type { RateLimiter } from './rate_limiter';

const logger = createChildLogger('http_client');

export type FetchFn = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface RetryConfig {
  maxAttempts: number;
  initialBackoffMs: number;
}

export interface HttpClientOptions {
  provider: string;
  baseUrl: string;
  /** Query parameter carrying the API key, e.g. 'apikey' */
  authParam: string;
  apiKey: string;
  rateLimiter: RateLimiter;
  retry?: Partial<RetryConfig>;
  clock?: Clock;
  fetchFn?: FetchFn;
}

export interface RequestContext {
  symbol: string;
  method: string;
  signal?: AbortSignal;
}

const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  initialBackoffMs: 1000,
};

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class JsonHttpClient {
  private requestCount = 0;
  private readonly retry: RetryConfig;
  private readonly clock: Clock;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpClientOptions) {
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.clock = options.clock ?? systemClock;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  get provider(): string {
    return this.options.provider;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private buildUrl(path: string, params: Record<string, string | number>): string {
    const url = new URL(`${this.options.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    url.searchParams.set(this.options.authParam, this.options.apiKey);
    return url.toString();
  }

  private fail(message: string, kind: ProviderError['kind'], ctx: RequestContext, cause?: Error) {
    return new ProviderError(message, kind, this.options.provider, ctx.symbol, ctx.method, cause);
  }

  private async backoff(attempt: number, ctx: RequestContext, reason: string): Promise<void> {
    const backoffMs = this.retry.initialBackoffMs * Math.pow(2, attempt);
    logger.warn(
      { provider: this.options.provider, symbol: ctx.symbol, method: ctx.method, attempt, backoffMs, reason },
      'Request failed, backing off'
    );
    await this.clock.sleep(backoffMs, ctx.signal);
  }

  private async send(
    url: string,
    signal?: AbortSignal
  ): Promise<{ response: Response; body: string } | { error: string }> {
    const { rateLimiter } = this.options;
    await rateLimiter.acquire(signal);
    try {
      this.requestCount++;
      const response = await this.fetchFn(url, { signal });
      const body = await response.text();
      return { response, body };
    } catch (error) {
      return { error: error instanceof Error ? error.message : String(error) };
    } finally {
      rateLimiter.release();
    }
  }

  async getJson(
    path: string,
    params: Record<string, string | number>,
    ctx: RequestContext
  ): Promise<unknown> {
    const url = this.buildUrl(path, params);
    let lastReason = 'no attempt made';

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      throwIfAborted(ctx.signal);

      const outcome = await this.send(url, ctx.signal);
      if ('error' in outcome) {
        if (ctx.signal?.aborted) {
          throw new AbortError();
        }
        lastReason = outcome.error;
        if (attempt < this.retry.maxAttempts - 1) {
          await this.backoff(attempt, ctx, lastReason);
        }
        continue;
      }
      const { response, body } = outcome;

      if (isRetryableStatus(response.status)) {
        lastReason = `HTTP ${response.status}`;
        if (attempt < this.retry.maxAttempts - 1) {
          await this.backoff(attempt, ctx, lastReason);
        }
        continue;
      }

      if (response.status === 404) {
        throw this.fail(`${this.options.provider} ${path}: not found`, 'not_found', ctx);
      }

      if (!response.ok) {
        throw this.fail(
          `${this.options.provider} API error: ${response.status} ${response.statusText}`,
          'transient',
          ctx
        );
      }

      try {
        return JSON.parse(body);
      } catch (error) {
        throw this.fail(
          `${this.options.provider} ${path}: response is not valid JSON`,
          'malformed_payload',
          ctx,
          error instanceof Error ? error : undefined
        );
      }
    }

    throw this.fail(
      `${this.options.provider} ${path}: giving up after ${this.retry.maxAttempts} attempts (${lastReason})`,
      'transient',
      ctx
    );
  }
}
