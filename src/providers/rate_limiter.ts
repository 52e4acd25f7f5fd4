/**
 * Sliding-window rate limiter for upstream market data APIs.
 * One instance per provider, injected into the clients that share its budget.
 */

import { createChildLogger } from '@/utils/logger';
import { systemClock, throwIfAborted, AbortError, type Clock } from '@/core/clock';

const logger = createChildLogger('rate_limiter');

const WINDOW_MS = 60_000;

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  // Permit acquisition runs one caller at a time through this chain
  private chain: Promise<void> = Promise.resolve();
  private readonly config: RateLimiterConfig;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    private readonly clock: Clock = systemClock,
    private readonly name: string = 'default'
  ) {
    this.config = {
      maxRequestsPerMinute: config.maxRequestsPerMinute ?? 60,
      maxConcurrent: config.maxConcurrent ?? 5,
    };
    if (this.config.maxRequestsPerMinute < 1 || this.config.maxConcurrent < 1) {
      throw new RangeError('Rate limiter needs at least one request per minute and one slot');
    }
  }

  // The window is closed at both ends: a start exactly WINDOW_MS ago still counts
  private cleanOldRequests(): void {
    const windowStart = this.clock.now() - WINDOW_MS;
    this.requestTimes = this.requestTimes.filter((t) => t >= windowStart);
  }

  private waitForRelease(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = () => {
        this.waitQueue = this.waitQueue.filter((entry) => entry !== wake);
        reject(new AbortError());
      };
      this.waitQueue.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    // Check concurrency
    while (this.activeRequests >= this.config.maxConcurrent) {
      await this.waitForRelease(signal);
    }

    // Check rate limit
    this.cleanOldRequests();
    while (this.requestTimes.length >= this.config.maxRequestsPerMinute) {
      const waitTime = this.requestTimes[0] + WINDOW_MS + 1 - this.clock.now();
      logger.debug({ limiter: this.name, waitTime }, 'Rate limit reached, waiting');
      await this.clock.sleep(Math.max(waitTime, 0), signal);
      this.cleanOldRequests();
    }

    this.activeRequests++;
    this.requestTimes.push(this.clock.now());
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.chain.then(() => this.waitForSlot(signal));
    // A caller that aborts must not block the ones queued behind it
    this.chain = turn.catch(() => undefined);
    await turn;
  }

  release(): void {
    if (this.activeRequests > 0) {
      this.activeRequests--;
    }
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }

  async schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): { requestsInLastMinute: number; activeRequests: number } {
    this.cleanOldRequests();
    return {
      requestsInLastMinute: this.requestTimes.length,
      activeRequests: this.activeRequests,
    };
  }
}
