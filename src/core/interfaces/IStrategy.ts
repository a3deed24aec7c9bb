import { CandidateDraft, SourceType } from '../entities/CandidateRecord.js';
import { EntityProfile } from '../entities/EntityProfile.js';
import { AttemptOutcome } from '../entities/Job.js';
import { StrategyId } from '../entities/Strategy.js';
import { RateLimiter } from '../../infrastructure/ratelimit/RateLimiter.js';
import { ResponseCache } from '../../infrastructure/cache/ResponseCache.js';
import { RetryExecutor } from '../../utils/retry.js';

/**
 * Shared resources handed to every strategy run
 */
export interface StrategyContext {
  rateLimiter: RateLimiter;
  retryExecutor: RetryExecutor;
  cache: ResponseCache<string>;
  /** Aborted when the strategy times out */
  signal: AbortSignal;
}

export interface StrategyResult {
  status: AttemptOutcome;
  records: CandidateDraft[];
  requestsMade: number;
  error?: string;
  /** The thrown value behind a failed run, used to classify the failure */
  cause?: unknown;
}

/**
 * One pluggable collection method against one external source
 */
export interface ResearchStrategy {
  readonly id: StrategyId;
  readonly displayName: string;
  readonly sourceType: SourceType;
  /** Default rate-limiter bucket for this strategy's requests */
  readonly targetKey: string;

  execute(profile: EntityProfile, context: StrategyContext): Promise<StrategyResult>;
}
