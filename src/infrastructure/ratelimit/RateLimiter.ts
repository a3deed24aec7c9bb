import { Clock, systemClock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('RateLimiter');

export interface TargetLimit {
  maxConcurrent: number;
  requestsPerSecond: number;
}

export interface RateLimiterOptions {
  defaults: TargetLimit;
  overrides?: Record<string, Partial<TargetLimit>>;
  clock?: Clock;
}

/**
 * A granted slot for one target. `release()` may be called more than once.
 */
export interface Permit {
  readonly targetKey: string;
  readonly grantedAt: number;
  release(): void;
}

interface Waiter {
  resolve: (permit: Permit) => void;
}

interface TargetState {
  limit: TargetLimit;
  active: number;
  lastGrantAt: number;
  waiters: Waiter[];
  timerPending: boolean;
  granted: number;
  throttled: number;
}

export interface TargetStats {
  targetKey: string;
  active: number;
  waiting: number;
  granted: number;
  throttled: number;
  maxConcurrent: number;
  requestsPerSecond: number;
}

/**
 * Per-target concurrency and request-rate throttle.
 *
 * A caller is granted a permit only when fewer than `maxConcurrent` permits are
 * outstanding for its target and at least `1 / requestsPerSecond` seconds have
 * passed since that target's previous grant. Waiters are served FIFO. All state
 * changes for a key happen synchronously inside `pump`, so concurrent callers
 * never interleave a check with its update.
 */
export class RateLimiter {
  private readonly targets = new Map<string, TargetState>();
  private readonly defaults: TargetLimit;
  private readonly overrides: Record<string, Partial<TargetLimit>>;
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions) {
    this.defaults = options.defaults;
    this.overrides = options.overrides ?? {};
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Wait for a permit on `targetKey`. Never rejects.
   */
  acquire(targetKey: string): Promise<Permit> {
    const state = this.getState(targetKey);
    return new Promise<Permit>((resolve) => {
      state.waiters.push({ resolve });
      if (state.waiters.length > 1 || state.active >= state.limit.maxConcurrent) {
        state.throttled++;
      }
      this.pump(targetKey, state);
    });
  }

  /**
   * Run `fn` while holding a permit; the permit is released on every exit path.
   */
  async withPermit<T>(targetKey: string, fn: () => Promise<T>): Promise<T> {
    const permit = await this.acquire(targetKey);
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  getStats(): TargetStats[] {
    return Array.from(this.targets.entries())
      .map(([targetKey, state]) => ({
        targetKey,
        active: state.active,
        waiting: state.waiters.length,
        granted: state.granted,
        throttled: state.throttled,
        maxConcurrent: state.limit.maxConcurrent,
        requestsPerSecond: state.limit.requestsPerSecond,
      }))
      .sort((a, b) => a.targetKey.localeCompare(b.targetKey));
  }

  private getState(targetKey: string): TargetState {
    let state = this.targets.get(targetKey);
    if (!state) {
      const override = this.overrides[targetKey] ?? {};
      state = {
        limit: {
          maxConcurrent: Math.max(1, override.maxConcurrent ?? this.defaults.maxConcurrent),
          requestsPerSecond: override.requestsPerSecond ?? this.defaults.requestsPerSecond,
        },
        active: 0,
        lastGrantAt: Number.NEGATIVE_INFINITY,
        waiters: [],
        timerPending: false,
        granted: 0,
        throttled: 0,
      };
      this.targets.set(targetKey, state);
      log.debug(`Created limiter state for ${targetKey}`, { ...state.limit });
    }
    return state;
  }

  private intervalMs(state: TargetState): number {
    return state.limit.requestsPerSecond > 0 ? 1000 / state.limit.requestsPerSecond : 0;
  }

  private pump(targetKey: string, state: TargetState): void {
    while (state.waiters.length > 0 && state.active < state.limit.maxConcurrent) {
      const now = this.clock.now();
      const waitMs = state.lastGrantAt + this.intervalMs(state) - now;

      if (waitMs > 0) {
        if (!state.timerPending) {
          state.timerPending = true;
          void this.clock.sleep(waitMs).then(() => {
            state.timerPending = false;
            this.pump(targetKey, state);
          });
        }
        return;
      }

      const waiter = state.waiters.shift();
      if (!waiter) return;

      state.active++;
      state.granted++;
      state.lastGrantAt = now;
      waiter.resolve(this.createPermit(targetKey, state, now));
    }
  }

  private createPermit(targetKey: string, state: TargetState, grantedAt: number): Permit {
    let released = false;
    return {
      targetKey,
      grantedAt,
      release: () => {
        if (released) return;
        released = true;
        state.active--;
        this.pump(targetKey, state);
      },
    };
  }
}
