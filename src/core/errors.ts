/**
 * Error taxonomy for the research engine
 */

export type FailureKind =
  | 'rate_limited'
  | 'transient_network'
  | 'permanent_client'
  | 'strategy_timeout'
  | 'invalid_transition'
  | 'circuit_open'
  | 'unknown';

export class ResearchError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * Upstream asked us to slow down. `retryAfterMs` carries its hint when present.
 */
export class RateLimitedError extends ResearchError {
  constructor(message: string, readonly retryAfterMs?: number) {
    super('rate_limited', message);
  }
}

export class TransientNetworkError extends ResearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient_network', message, options);
  }
}

export class PermanentClientError extends ResearchError {
  constructor(message: string, readonly status?: number) {
    super('permanent_client', message);
  }
}

export class StrategyTimeoutError extends ResearchError {
  constructor(readonly strategyId: string, readonly timeoutMs: number) {
    super('strategy_timeout', `Strategy ${strategyId} timed out after ${timeoutMs}ms`);
  }
}

export class InvalidTransitionError extends ResearchError {
  constructor(readonly jobId: string, readonly from: string, readonly to: string, detail?: string) {
    super(
      'invalid_transition',
      `Invalid transition for job ${jobId}: ${from} -> ${to}${detail ? ` (${detail})` : ''}`
    );
  }
}

export class CircuitOpenError extends ResearchError {
  constructor(readonly targetKey: string, readonly retryInMs: number) {
    super('circuit_open', `Circuit breaker is OPEN for ${targetKey}. Try again in ${retryInMs}ms`);
  }
}

export interface RetryAttemptLog {
  attempt: number;
  kind: FailureKind;
  message: string;
  delayMs?: number;
  timestamp: Date;
}

/**
 * Terminal failure of the retry executor, with every attempt it made
 */
export class RetryError extends Error {
  constructor(
    readonly reason: 'exhausted' | 'permanent' | 'circuit_open' | 'aborted',
    readonly attempts: number,
    readonly history: RetryAttemptLog[],
    readonly lastError: unknown
  ) {
    super(`Failed after ${attempts} attempt(s) (${reason}). Last error: ${describeError(lastError)}`);
    this.name = 'RetryError';
  }

  get lastKind(): FailureKind {
    return this.history.length > 0 ? this.history[this.history.length - 1].kind : 'unknown';
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  • ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Failure kind of any thrown value, unwrapping retry failures
 */
export function failureKindOf(error: unknown): FailureKind {
  if (error instanceof RetryError) return error.lastKind;
  if (error instanceof ResearchError) return error.kind;
  return 'unknown';
}
