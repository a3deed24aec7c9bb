import Database from 'better-sqlite3';
import { Config } from '../../config.js';
import { Attributes, ENTITY_TYPES, EntityType } from '../../core/entities/CandidateRecord.js';
import { Job, JobStatus } from '../../core/entities/Job.js';
import { MergedEntity } from '../../core/entities/MergedEntity.js';
import { StrategyId, isStrategyId } from '../../core/entities/Strategy.js';
import { IEntityRepository } from '../../core/interfaces/IEntityRepository.js';
import { CacheStats, ResponseCache } from '../../infrastructure/cache/ResponseCache.js';
import { EntityRepository } from '../../infrastructure/database/repositories/EntityRepository.js';
import { JobRepository } from '../../infrastructure/database/repositories/JobRepository.js';
import { FetchFn, HttpClient } from '../../infrastructure/http/HttpClient.js';
import { JobQueue, QueueStatistics } from '../../infrastructure/queue/JobQueue.js';
import { RateLimiter, TargetStats } from '../../infrastructure/ratelimit/RateLimiter.js';
import { StrategyRegistry, createDefaultRegistry } from '../../infrastructure/strategies/index.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';
import { CircuitBreaker, RetryExecutor } from '../../utils/retry.js';
import { EntityMatcher } from './EntityMatcher.js';
import { JobLedger } from './JobLedger.js';
import { Orchestrator } from './Orchestrator.js';
import { DEFAULT_STOP_LIMITS } from './StopPolicy.js';
import { StrategyPlanner } from './StrategyPlanner.js';
import { Synthesizer } from './Synthesizer.js';

const log = createLogger('ResearchService');

export interface StartJobInput {
  targetIdentity: string;
  targetType: EntityType;
  strategyOverride?: readonly string[];
  attributes?: Attributes;
}

export interface ResearchStatistics {
  jobs: Record<JobStatus, number>;
  mergedEntities: number;
  queue: QueueStatistics;
  cache: CacheStats;
  rateLimits: TargetStats[];
  circuits: ReturnType<CircuitBreaker['getStats']>['targets'];
}

export interface ResearchServiceDeps {
  ledger: JobLedger;
  orchestrator: Orchestrator;
  queue: JobQueue;
  matcher: EntityMatcher;
  entityRepository: IEntityRepository;
  cache: ResponseCache<string>;
  rateLimiter: RateLimiter;
  circuitBreaker: CircuitBreaker;
}

/**
 * Service for research job operations
 */
export class ResearchService {
  private started = false;

  constructor(private readonly deps: ResearchServiceDeps) {}

  /**
   * Settle jobs from a previous run and begin executing queued ones
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    const { requeued } = this.deps.ledger.recover();
    this.deps.queue.onJobStarted((jobId) => this.deps.orchestrator.run(jobId));
    for (const jobId of requeued) {
      this.deps.queue.submit(jobId);
    }
  }

  startJob(input: StartJobInput): string {
    const targetIdentity = input.targetIdentity.trim();
    if (!targetIdentity) {
      throw new Error('Target identity must not be empty');
    }
    if (!ENTITY_TYPES.includes(input.targetType)) {
      throw new Error(`Unknown target type: ${input.targetType}`);
    }

    let strategyOverride: StrategyId[] | undefined;
    if (input.strategyOverride && input.strategyOverride.length > 0) {
      const unknown = input.strategyOverride.filter((id) => !isStrategyId(id));
      if (unknown.length > 0) {
        throw new Error(`Unknown strategy id(s): ${unknown.join(', ')}`);
      }
      strategyOverride = input.strategyOverride.filter(isStrategyId);
    }

    const job = this.deps.ledger.create({
      targetIdentity,
      targetType: input.targetType,
      attributes: input.attributes,
      strategyOverride,
    });
    this.deps.queue.submit(job.id);
    return job.id;
  }

  getJob(jobId: string): Job | null {
    return this.deps.ledger.get(jobId);
  }

  listJobs(status?: JobStatus): Job[] {
    return this.deps.ledger.list(status);
  }

  /**
   * Stored entity for a name: exact normalized key first, then the closest fuzzy match
   */
  getMergedEntity(targetIdentity: string, entityType?: EntityType): MergedEntity | null {
    const { matcher, entityRepository } = this.deps;
    const exact = entityRepository.getByKey(matcher.normalize(targetIdentity), entityType);
    if (exact) {
      return exact;
    }

    const match = matcher.match({ name: targetIdentity, entityType, attributes: {} }, entityRepository.getAll());
    return match.isNew ? null : entityRepository.getByKey(match.key, entityType);
  }

  /**
   * Cancel a job. A queued job finishes `failed` right away; a running one
   * stops dispatching and finishes once its in-flight strategies return.
   */
  async cancelJob(jobId: string): Promise<boolean> {
    const { orchestrator, queue } = this.deps;
    if (!orchestrator.requestCancel(jobId)) {
      return false;
    }
    if (queue.isRunning(jobId)) {
      return true;
    }

    queue.remove(jobId);
    await orchestrator.run(jobId);
    return true;
  }

  getStatistics(): ResearchStatistics {
    const jobs: Record<JobStatus, number> = { pending: 0, running: 0, success: 0, partial_success: 0, failed: 0 };
    for (const job of this.deps.ledger.list()) {
      jobs[job.status]++;
    }
    return {
      jobs,
      mergedEntities: this.deps.entityRepository.count(),
      queue: this.deps.queue.getStatistics(),
      cache: this.deps.cache.getStats(),
      rateLimits: this.deps.rateLimiter.getStats(),
      circuits: this.deps.circuitBreaker.getStats().targets,
    };
  }

  /**
   * Resolves once no job is queued or running
   */
  waitForIdle(): Promise<void> {
    return this.deps.queue.onIdle();
  }

  /**
   * Stop taking queued jobs, cancel running ones and wait for them to finish.
   * Queued jobs stay pending and are picked up on the next start.
   */
  async shutdown(): Promise<void> {
    for (const job of this.deps.ledger.list('running')) {
      this.deps.orchestrator.requestCancel(job.id);
    }
    await this.deps.queue.drain();
    log.info('Research service stopped');
  }
}

export interface ResearchServiceOverrides {
  clock?: Clock;
  fetchFn?: FetchFn;
  registry?: StrategyRegistry;
}

/**
 * Wire the engine from configuration and an open database
 */
export function createResearchService(
  config: Config,
  db: Database.Database,
  overrides: ResearchServiceOverrides = {}
): ResearchService {
  const clock = overrides.clock ?? systemClock;

  const rateLimiter = new RateLimiter({
    defaults: {
      maxConcurrent: config.rateLimit.maxConcurrentPerTarget,
      requestsPerSecond: config.rateLimit.requestsPerSecondPerTarget,
    },
    overrides: config.rateLimit.overrides,
    clock,
  });
  const circuitBreaker = new CircuitBreaker(5, 60_000, clock);
  const retryExecutor = new RetryExecutor({
    rateLimiter,
    config: {
      maxAttempts: config.retry.maxAttempts,
      baseDelayMs: config.retry.baseDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
      timeoutMs: config.retry.requestTimeoutMs,
    },
    circuitBreaker,
    clock,
  });
  const cache = new ResponseCache<string>({
    defaultTtlMs: config.cache.ttlMs,
    maxEntries: config.cache.maxEntries,
    clock,
  });

  const http = new HttpClient(config.http.userAgent, overrides.fetchFn, clock);
  const registry = overrides.registry ?? createDefaultRegistry(http, config.matching.fuzzyMatchThreshold);

  const jobRepository = new JobRepository(db);
  const entityRepository = new EntityRepository(db);
  const ledger = new JobLedger(jobRepository, clock);
  const matcher = new EntityMatcher({ fuzzyMatchThreshold: config.matching.fuzzyMatchThreshold });

  const orchestrator = new Orchestrator(
    {
      ledger,
      planner: new StrategyPlanner((id) => registry.has(id)),
      registry,
      matcher,
      synthesizer: new Synthesizer({ sourcePriority: config.matching.sourcePriorityOrder }),
      jobRepository,
      entityRepository,
      resources: { rateLimiter, retryExecutor, cache },
      clock,
    },
    {
      maxParallelStrategies: config.orchestrator.maxParallelStrategies,
      strategyTimeoutMs: config.orchestrator.strategyTimeoutMs,
      stopLimits: {
        coverageThreshold: config.orchestrator.coverageThreshold,
        minSourceTypes: config.orchestrator.minSourceTypes,
        maxStrategiesPerJob: config.orchestrator.maxStrategiesPerJob,
        maxJobDurationMs: config.orchestrator.maxJobDurationMs,
        noDataAfterStrategies: DEFAULT_STOP_LIMITS.noDataAfterStrategies,
      },
    }
  );

  return new ResearchService({
    ledger,
    orchestrator,
    queue: new JobQueue(config.jobQueue.maxConcurrentJobs),
    matcher,
    entityRepository,
    cache,
    rateLimiter,
    circuitBreaker,
  });
}
