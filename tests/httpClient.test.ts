import { getEventListeners } from 'events';
import { HttpClient, HttpResponseLike, errorForStatus, parseRetryAfter } from '../src/infrastructure/http/HttpClient.js';
import { ResponseCache } from '../src/infrastructure/cache/ResponseCache.js';
import { RateLimiter } from '../src/infrastructure/ratelimit/RateLimiter.js';
import { RetryExecutor } from '../src/utils/retry.js';
import { PermanentClientError, RateLimitedError, RetryError, TransientNetworkError } from '../src/core/errors.js';
import { ManualClock } from './helpers/ManualClock.js';

function response(status: number, body = '', headers: Record<string, string> = {}): HttpResponseLike {
  const statusText: Record<number, string> = { 200: 'OK', 404: 'Not Found', 429: 'Too Many Requests', 503: 'Service Unavailable' };
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: statusText[status] ?? '',
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    text: async () => body,
  };
}

describe('HttpClient', () => {
  let clock: ManualClock;
  let context: { retryExecutor: RetryExecutor; cache: ResponseCache<string> };

  beforeEach(() => {
    clock = new ManualClock();
    const rateLimiter = new RateLimiter({ defaults: { maxConcurrent: 2, requestsPerSecond: 0 }, clock });
    context = {
      retryExecutor: new RetryExecutor({ rateLimiter, clock, random: () => 0.5 }),
      cache: new ResponseCache<string>({ defaultTtlMs: 60_000, maxEntries: 10, clock }),
    };
  });

  test('sends the user agent and serves repeats from the cache', async () => {
    const fetchFn = jest.fn().mockResolvedValue(response(200, '<html>hi</html>'));
    const http = new HttpClient('research-bot/1.0 (ops@example.test)', fetchFn, clock);
    const onRequest = jest.fn();

    const first = await clock.settle(http.getText('https://example.test/', context, { targetKey: 'web', onRequest }));
    const second = await clock.settle(http.getText('https://example.test/', context, { targetKey: 'web', onRequest }));

    expect(first).toBe('<html>hi</html>');
    expect(second).toBe('<html>hi</html>');
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(onRequest).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][1].headers['User-Agent']).toBe('research-bot/1.0 (ops@example.test)');
  });

  test('retries server errors', async () => {
    const fetchFn = jest
      .fn()
      .mockResolvedValueOnce(response(503))
      .mockResolvedValueOnce(response(200, 'ok'));
    const http = new HttpClient('ua', fetchFn, clock);
    const onRequest = jest.fn();

    await expect(clock.settle(http.getText('https://example.test/x', context, { targetKey: 'web', onRequest }))).resolves.toBe('ok');
    expect(onRequest).toHaveBeenCalledTimes(2);
  });

  test('does not retry a 404', async () => {
    const fetchFn = jest.fn().mockResolvedValue(response(404));
    const http = new HttpClient('ua', fetchFn, clock);

    await expect(clock.settle(http.getText('https://example.test/missing', context, { targetKey: 'web' }))).rejects.toBeInstanceOf(
      RetryError
    );
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(context.cache.getStats().size).toBe(0);
  });

  test('honours Retry-After on 429', async () => {
    const fetchFn = jest
      .fn()
      .mockResolvedValueOnce(response(429, '', { 'retry-after': '2' }))
      .mockResolvedValueOnce(response(200, 'later'));
    const http = new HttpClient('ua', fetchFn, clock);
    const start = clock.now();

    await expect(clock.settle(http.getText('https://example.test/busy', context, { targetKey: 'web' }))).resolves.toBe('later');
    expect(clock.now() - start).toBe(2000);
  });

  test('network failures surface as transient errors', async () => {
    const fetchFn = jest.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND example.test'));
    const http = new HttpClient('ua', fetchFn, clock);

    const error = await clock
      .settle(http.getText('https://example.test/', context, { targetKey: 'web' }))
      .then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    if (!(error instanceof RetryError)) return;
    expect(error.reason).toBe('exhausted');
    expect(error.lastError).toBeInstanceOf(TransientNetworkError);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  test('sends nothing for a strategy that was already aborted', async () => {
    const fetchFn = jest.fn().mockResolvedValue(response(200, 'ok'));
    const http = new HttpClient('ua', fetchFn, clock);
    const controller = new AbortController();
    controller.abort();

    const error = await clock
      .settle(http.getText('https://example.test/', { ...context, signal: controller.signal }, { targetKey: 'web' }))
      .then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    if (!(error instanceof RetryError)) return;
    expect(error.reason).toBe('aborted');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  test('finished attempts leave no listener on the strategy signal', async () => {
    const fetchFn = jest.fn().mockResolvedValue(response(200, 'ok'));
    const http = new HttpClient('ua', fetchFn, clock);
    const controller = new AbortController();
    const strategyContext = { ...context, signal: controller.signal };

    await clock.settle(http.getText('https://example.test/a', strategyContext, { targetKey: 'web' }));
    await clock.settle(http.getText('https://example.test/b', strategyContext, { targetKey: 'web' }));

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });
});

describe('parseRetryAfter', () => {
  test('reads delta seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120_000);
  });

  test('reads an HTTP date relative to now', () => {
    const date = 'Wed, 21 Oct 2015 07:28:00 GMT';
    expect(parseRetryAfter(date, Date.parse(date) - 5000)).toBe(5000);
    expect(parseRetryAfter(date, Date.parse(date) + 5000)).toBe(0);
  });

  test('ignores missing or malformed values', () => {
    expect(parseRetryAfter(null, 0)).toBeUndefined();
    expect(parseRetryAfter('soon', 0)).toBeUndefined();
  });
});

describe('errorForStatus', () => {
  test('maps status codes onto the failure taxonomy', () => {
    const rateLimited = errorForStatus('https://x.test', response(429, '', { 'retry-after': '3' }), 0);
    expect(rateLimited).toBeInstanceOf(RateLimitedError);
    expect(rateLimited instanceof RateLimitedError && rateLimited.retryAfterMs).toBe(3000);

    expect(errorForStatus('https://x.test', response(503), 0)).toBeInstanceOf(TransientNetworkError);

    const missing = errorForStatus('https://x.test', response(404), 0);
    expect(missing).toBeInstanceOf(PermanentClientError);
    expect(missing.message).toBe('HTTP 404 Not Found for https://x.test');
  });
});
