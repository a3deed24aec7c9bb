/**
 * Retry executor and per-target circuit breaker for outbound requests
 */

import {
  CircuitOpenError,
  FailureKind,
  PermanentClientError,
  RateLimitedError,
  ResearchError,
  RetryAttemptLog,
  RetryError,
  TransientNetworkError,
  describeError,
} from '../core/errors.js';
import { RateLimiter } from '../infrastructure/ratelimit/RateLimiter.js';
import { Clock, systemClock } from './clock.js';
import { createLogger } from './logger.js';

const log = createLogger('Retry');

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  growth: number;
  jitter: number; // fraction, 0.25 => ±25%
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  growth: 2,
  jitter: 0.25,
  timeoutMs: 30000,
};

export interface AttemptContext {
  attempt: number;
  signal: AbortSignal;
}

export type RetryableOperation<T> = (context: AttemptContext) => Promise<T>;

export interface ExecuteOptions extends Partial<RetryConfig> {
  targetKey: string;
  onLog?: (entry: RetryAttemptLog) => void;
  /** Caller's signal; once aborted no further attempt or backoff starts */
  signal?: AbortSignal;
}

/**
 * Check if an error message looks like a transient network failure
 */
export function isRetryableError(error: unknown): boolean {
  const errorMessage = describeError(error).toLowerCase();

  const retryablePatterns = [
    'timeout',
    'timed out',
    'econnrefused',
    'econnreset',
    'etimedout',
    'eai_again',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}

export function classifyError(error: unknown): FailureKind {
  if (error instanceof ResearchError) return error.kind;
  return isRetryableError(error) ? 'transient_network' : 'permanent_client';
}

/**
 * Exponential delay for the n-th retry (0-based), capped, with symmetric jitter
 */
export function computeBackoffDelay(retryIndex: number, config: RetryConfig, random: () => number = Math.random): number {
  const base = Math.min(config.baseDelayMs * Math.pow(config.growth, retryIndex), config.maxDelayMs);
  const spread = base * config.jitter;
  return Math.max(0, Math.round(base + (random() * 2 - 1) * spread));
}

interface BreakerState {
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
  state: 'closed' | 'open' | 'half-open';
}

/**
 * Circuit Breaker Pattern, tracked per target key.
 * Opens after `failureThreshold` terminal failures, half-opens after `resetTimeout`.
 */
export class CircuitBreaker {
  private readonly states = new Map<string, BreakerState>();
  private logs: Array<{ timestamp: Date; targetKey: string; state: string; reason: string }> = [];

  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private clock: Clock = systemClock
  ) {}

  /**
   * Throws CircuitOpenError when the target is failing fast
   */
  check(targetKey: string): void {
    const entry = this.getEntry(targetKey);
    if (entry.state !== 'open') return;

    const now = this.clock.now();
    const since = now - (entry.lastFailureTime ?? now);
    if (since >= this.resetTimeout) {
      entry.state = 'half-open';
      entry.successCount = 0;
      this.logStateChange(targetKey, 'half-open', 'Reset timeout reached');
      return;
    }
    throw new CircuitOpenError(targetKey, this.resetTimeout - since);
  }

  recordSuccess(targetKey: string): void {
    const entry = this.getEntry(targetKey);
    if (entry.state === 'half-open') {
      entry.successCount++;
      if (entry.successCount >= 2) {
        entry.state = 'closed';
        entry.failureCount = 0;
        this.logStateChange(targetKey, 'closed', 'Recovered from temporary failure');
      }
    } else if (entry.state === 'closed') {
      entry.failureCount = Math.max(0, entry.failureCount - 1);
    }
  }

  recordFailure(targetKey: string): void {
    const entry = this.getEntry(targetKey);
    entry.failureCount++;
    entry.lastFailureTime = this.clock.now();

    if (entry.state === 'half-open') {
      entry.state = 'open';
      this.logStateChange(targetKey, 'open', 'Failed while in half-open state');
    } else if (entry.state === 'closed' && entry.failureCount >= this.failureThreshold) {
      entry.state = 'open';
      this.logStateChange(targetKey, 'open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  getState(targetKey: string): BreakerState['state'] {
    return this.getEntry(targetKey).state;
  }

  getStats() {
    return {
      targets: Array.from(this.states.entries()).map(([targetKey, entry]) => ({
        targetKey,
        state: entry.state,
        failureCount: entry.failureCount,
        lastFailureTime: entry.lastFailureTime ? new Date(entry.lastFailureTime) : null,
      })),
      logs: this.logs,
    };
  }

  reset(targetKey: string): void {
    this.states.delete(targetKey);
    this.logStateChange(targetKey, 'closed', 'Manual reset');
  }

  private getEntry(targetKey: string): BreakerState {
    let entry = this.states.get(targetKey);
    if (!entry) {
      entry = { failureCount: 0, successCount: 0, lastFailureTime: null, state: 'closed' };
      this.states.set(targetKey, entry);
    }
    return entry;
  }

  private logStateChange(targetKey: string, newState: string, reason: string) {
    log.warn(`Circuit ${targetKey} -> ${newState}: ${reason}`);
    this.logs.push({ timestamp: new Date(this.clock.now()), targetKey, state: newState, reason });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }
}

export interface RetryExecutorOptions {
  rateLimiter: RateLimiter;
  config?: Partial<RetryConfig>;
  circuitBreaker?: CircuitBreaker;
  clock?: Clock;
  random?: () => number;
}

/**
 * Runs one network operation with classified retries.
 *
 * Every attempt holds a rate-limiter permit for the operation's target and is
 * bounded by `timeoutMs`; backoff sleeps happen outside the permit.
 */
export class RetryExecutor {
  private readonly rateLimiter: RateLimiter;
  private readonly config: RetryConfig;
  private readonly circuitBreaker?: CircuitBreaker;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(options: RetryExecutorOptions) {
    this.rateLimiter = options.rateLimiter;
    this.config = { ...DEFAULT_RETRY_CONFIG, ...options.config };
    this.circuitBreaker = options.circuitBreaker;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  getConfig(): RetryConfig {
    return { ...this.config };
  }

  async execute<T>(operation: RetryableOperation<T>, options: ExecuteOptions): Promise<T> {
    const { targetKey, onLog, signal, ...overrides } = options;
    const config: RetryConfig = { ...this.config, ...overrides };
    const maxAttempts = Math.max(1, config.maxAttempts);
    const history: RetryAttemptLog[] = [];

    const record = (entry: RetryAttemptLog) => {
      history.push(entry);
      onLog?.(entry);
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw this.abandoned(targetKey, attempt - 1, history);
      }

      if (this.circuitBreaker) {
        try {
          this.circuitBreaker.check(targetKey);
        } catch (error) {
          record({ attempt, kind: 'circuit_open', message: describeError(error), timestamp: new Date(this.clock.now()) });
          throw new RetryError('circuit_open', attempt - 1, history, error);
        }
      }

      try {
        const result = await this.rateLimiter.withPermit(targetKey, () =>
          this.runWithTimeout(operation, attempt, config.timeoutMs, signal)
        );
        this.circuitBreaker?.recordSuccess(targetKey);
        return result;
      } catch (error) {
        // Failures caused by the caller giving up say nothing about the target
        if (signal?.aborted) {
          throw this.abandoned(targetKey, attempt, history);
        }

        const kind = classifyError(error);
        const message = describeError(error);

        if (kind !== 'rate_limited' && kind !== 'transient_network') {
          record({ attempt, kind, message, timestamp: new Date(this.clock.now()) });
          this.circuitBreaker?.recordFailure(targetKey);
          log.warn(`Permanent failure on ${targetKey}, not retrying: ${message}`);
          throw new RetryError('permanent', attempt, history, error);
        }

        if (attempt === maxAttempts) {
          record({ attempt, kind, message, timestamp: new Date(this.clock.now()) });
          this.circuitBreaker?.recordFailure(targetKey);
          log.error(`All ${maxAttempts} attempts failed for ${targetKey}: ${message}`);
          throw new RetryError('exhausted', attempt, history, error);
        }

        const delayMs =
          error instanceof RateLimitedError && error.retryAfterMs !== undefined
            ? error.retryAfterMs
            : computeBackoffDelay(attempt - 1, config, this.random);

        record({ attempt, kind, message, delayMs, timestamp: new Date(this.clock.now()) });
        log.warn(`Retry ${attempt}/${maxAttempts} for ${targetKey} after ${delayMs}ms: ${message}`);
        await this.clock.sleep(delayMs, signal);
      }
    }

    // maxAttempts >= 1 means the loop always returns or throws
    throw new RetryError('exhausted', maxAttempts, history, new Error('No attempts made'));
  }

  private abandoned(targetKey: string, attempts: number, history: RetryAttemptLog[]): RetryError {
    log.debug(`Abandoned ${targetKey} after ${attempts} attempt(s): caller aborted`);
    return new RetryError('aborted', attempts, history, new Error(`Request to ${targetKey} aborted by caller`));
  }

  private async runWithTimeout<T>(
    operation: RetryableOperation<T>,
    attempt: number,
    timeoutMs: number,
    outer?: AbortSignal
  ): Promise<T> {
    // The caller may have aborted while this attempt waited for its permit
    if (outer?.aborted) {
      throw new Error('Aborted before the request started');
    }
    const controller = new AbortController();
    const timer = new AbortController();

    let abandon: (error: Error) => void = () => undefined;
    const abandoned = new Promise<never>((_, reject) => {
      abandon = reject;
    });
    const abortAttempt = () => {
      abandon(new Error('Aborted by caller'));
      controller.abort();
    };
    outer?.addEventListener('abort', abortAttempt, { once: true });

    const timeout = new Promise<never>((_, reject) => {
      void this.clock.sleep(timeoutMs, timer.signal).then(() => {
        if (timer.signal.aborted) return;
        // Reject before aborting so the race settles with the timeout
        reject(new TransientNetworkError(`Request timed out after ${timeoutMs}ms`));
        controller.abort();
      });
    });

    try {
      return await Promise.race([operation({ attempt, signal: controller.signal }), timeout, abandoned]);
    } finally {
      timer.abort();
      outer?.removeEventListener('abort', abortAttempt);
    }
  }
}

export { PermanentClientError, RateLimitedError, TransientNetworkError };
