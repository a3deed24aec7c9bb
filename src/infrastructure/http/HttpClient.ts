import fetch from 'node-fetch';
import { PermanentClientError, RateLimitedError, TransientNetworkError } from '../../core/errors.js';
import { ResponseCache, buildCacheKey } from '../cache/ResponseCache.js';
import { RetryExecutor } from '../../utils/retry.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('Http');

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type FetchFn = (
  url: string,
  init: { method: 'GET'; headers: Record<string, string>; signal: AbortSignal }
) => Promise<HttpResponseLike>;

export interface HttpRequestContext {
  retryExecutor: RetryExecutor;
  cache: ResponseCache<string>;
  signal?: AbortSignal;
}

export interface GetTextOptions {
  targetKey: string;
  headers?: Record<string, string>;
  cacheTtlMs?: number;
  /** Called once per network attempt (cache hits make none) */
  onRequest?: () => void;
}

/**
 * Retry-After is either delta-seconds or an HTTP date
 */
export function parseRetryAfter(value: string | null, nowMs: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - nowMs);
}

/**
 * Map a non-2xx response onto the failure taxonomy
 */
export function errorForStatus(url: string, response: HttpResponseLike, nowMs: number): Error {
  const label = `HTTP ${response.status} ${response.statusText} for ${url}`.trim();
  if (response.status === 429) {
    return new RateLimitedError(label, parseRetryAfter(response.headers.get('retry-after'), nowMs));
  }
  if (response.status === 408 || response.status >= 500) {
    return new TransientNetworkError(label);
  }
  return new PermanentClientError(label, response.status);
}

/**
 * GET-only HTTP helper for strategies.
 *
 * Bodies are memoized in the shared cache, and every network attempt runs
 * through the retry executor (and therefore the rate limiter).
 */
export class HttpClient {
  constructor(
    private readonly userAgent: string,
    private readonly fetchFn: FetchFn = fetch,
    private readonly clock: Clock = systemClock
  ) {}

  async getText(url: string, context: HttpRequestContext, options: GetTextOptions): Promise<string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...options.headers };
    const cacheKey = buildCacheKey('GET', { url, accept: headers.Accept });

    return context.cache.getOrFetch(
      cacheKey,
      () =>
        context.retryExecutor.execute(
          async ({ attempt, signal }) => {
            options.onRequest?.();
            log.debug(`GET ${url} (attempt ${attempt})`);
            return this.request(url, headers, signal);
          },
          { targetKey: options.targetKey, signal: context.signal }
        ),
      options.cacheTtlMs
    );
  }

  private async request(url: string, headers: Record<string, string>, signal: AbortSignal): Promise<string> {
    let response: HttpResponseLike;
    try {
      response = await this.fetchFn(url, { method: 'GET', headers, signal });
    } catch (error) {
      throw new TransientNetworkError(`Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw errorForStatus(url, response, this.clock.now());
    }
    return response.text();
  }
}
