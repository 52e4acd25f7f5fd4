import { describe, expect, it, vi } from 'vitest';
import { JsonHttpClient, type FetchFn } from '@/providers/http_client';
import { RateLimiter } from '@/providers/rate_limiter';
import { ProviderError } from '@/providers/types';
import { FakeClock, jsonResponse } from '../fixtures/market';

function makeClient(fetchFn: FetchFn, clock: FakeClock = new FakeClock()) {
  return new JsonHttpClient({
    provider: 'fmp',
    baseUrl: 'https://example.test/api',
    authParam: 'apikey',
    apiKey: 'test-secret',
    rateLimiter: new RateLimiter({ maxRequestsPerMinute: 100, maxConcurrent: 2 }, clock, 'test'),
    retry: { maxAttempts: 3, initialBackoffMs: 1000 },
    clock,
    fetchFn,
  });
}

const ctx = { symbol: 'AAPL', method: 'fetchQuote' };

async function captureError(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProviderError) return error;
    throw error;
  }
  throw new Error('expected a ProviderError');
}

describe('JsonHttpClient', () => {
  it('appends params and the API key to the URL', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(jsonResponse([]));
    const client = makeClient(fetchFn);

    await client.getJson('/quote/AAPL', { limit: 5 }, ctx);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(
      'https://example.test/api/quote/AAPL?limit=5&apikey=test-secret'
    );
  });

  it('retries a 429 with backoff and returns the later success', async () => {
    const clock = new FakeClock();
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(jsonResponse({ price: 101.5 }));
    const client = makeClient(fetchFn, clock);

    await expect(client.getJson('/quote/AAPL', {}, ctx)).resolves.toEqual({ price: 101.5 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
    expect(client.getRequestCount()).toBe(2);
  });

  it('retries network failures', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const client = makeClient(fetchFn);

    await expect(client.getJson('/quote/AAPL', {}, ctx)).resolves.toEqual({ ok: true });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('gives up after three 5xx responses with a transient error', async () => {
    const clock = new FakeClock();
    const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => new Response('', { status: 503 }));
    const client = makeClient(fetchFn, clock);

    const error = await captureError(client.getJson('/quote/AAPL', {}, ctx));

    expect(error.kind).toBe('transient');
    expect(error.provider).toBe('fmp');
    expect(error.symbol).toBe('AAPL');
    expect(error.method).toBe('fetchQuote');
    expect(error.message).toBe('fmp /quote/AAPL: giving up after 3 attempts (HTTP 503)');
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('maps 404 to not_found without retrying', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('', { status: 404 }));
    const client = makeClient(fetchFn);

    const error = await captureError(client.getJson('/quote/ZZZZ', {}, ctx));

    expect(error.kind).toBe('not_found');
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('maps other client errors to transient without retrying', async () => {
    const fetchFn = vi
      .fn<FetchFn>()
      .mockResolvedValue(new Response('', { status: 403, statusText: 'Forbidden' }));
    const client = makeClient(fetchFn);

    const error = await captureError(client.getJson('/quote/AAPL', {}, ctx));

    expect(error.kind).toBe('transient');
    expect(error.message).toBe('fmp API error: 403 Forbidden');
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('reports a body that is not JSON as malformed_payload', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));
    const client = makeClient(fetchFn);

    const error = await captureError(client.getJson('/quote/AAPL', {}, ctx));

    expect(error.kind).toBe('malformed_payload');
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });
});
