import { randomUUID } from 'crypto';
import {
  Job,
  JobError,
  JobStatus,
  JobSummary,
  PlannedStrategy,
  ReasoningEntry,
  ReasoningKind,
  StrategyAttempt,
  TERMINAL_STATUSES,
} from '../../core/entities/Job.js';
import { Attributes, EntityType } from '../../core/entities/CandidateRecord.js';
import { StrategyId } from '../../core/entities/Strategy.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { InvalidTransitionError } from '../../core/errors.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('JobLedger');

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'failed'],
  running: ['success', 'partial_success', 'failed'],
  success: [],
  partial_success: [],
  failed: [],
};

export type TerminalStatus = Exclude<JobStatus, 'pending' | 'running'>;

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.includes(status);
}

export interface CreateJobInput {
  targetIdentity: string;
  targetType: EntityType;
  attributes?: Attributes;
  strategyOverride?: StrategyId[];
}

export interface RecoveryResult {
  interrupted: string[];
  requeued: string[];
}

/**
 * Owns every job's lifecycle record.
 *
 * All methods are synchronous, so each call completes within one event-loop
 * turn and a job never sees two interleaved writers. Every mutation is
 * mirrored to the repository before the method returns.
 */
export class JobLedger {
  private readonly active = new Map<string, Job>();

  constructor(
    private readonly repository: IJobRepository,
    private readonly clock: Clock = systemClock,
    private readonly generateId: () => string = randomUUID
  ) {}

  create(input: CreateJobInput): Job {
    const job: Job = {
      id: this.generateId(),
      targetIdentity: input.targetIdentity.trim(),
      targetType: input.targetType,
      targetAttributes: { ...input.attributes },
      ...(input.strategyOverride && input.strategyOverride.length > 0
        ? { strategyOverride: [...input.strategyOverride] }
        : {}),
      status: 'pending',
      planned: [],
      completed: [],
      attempts: [],
      reasoning: [],
      errors: [],
      createdAt: new Date(this.clock.now()),
    };
    this.active.set(job.id, job);
    this.persist(job);
    log.info(`Created job ${job.id} for "${job.targetIdentity}" (${job.targetType})`);
    return this.snapshot(job);
  }

  markPlanned(jobId: string, planned: readonly PlannedStrategy[]): void {
    const job = this.require(jobId);
    if (isTerminal(job.status)) {
      throw new InvalidTransitionError(jobId, job.status, job.status, 'cannot plan a finished job');
    }
    job.planned = planned.map((entry) => ({ ...entry }));
    this.pushReasoning(
      job,
      'plan',
      { planned: planned.map((p) => ({ strategyId: p.strategyId, priority: p.priority, rationale: p.rationale })) },
      planned.length > 0 ? `planned ${planned.map((p) => p.strategyId).join(', ')}` : 'no applicable strategies'
    );
    this.persist(job);
  }

  transition(jobId: string, to: JobStatus, reason: string, inputs: Record<string, unknown> = {}): void {
    const job = this.require(jobId);
    this.applyTransition(job, to, reason, inputs);
    this.persist(job);
  }

  appendReasoning(jobId: string, kind: ReasoningKind, inputs: Record<string, unknown>, outcome: string): ReasoningEntry {
    const job = this.require(jobId);
    if (isTerminal(job.status)) {
      throw new InvalidTransitionError(jobId, job.status, job.status, 'reasoning is closed once a job has finished');
    }
    const entry = this.pushReasoning(job, kind, inputs, outcome);
    this.persist(job);
    return { ...entry };
  }

  recordAttempt(attempt: StrategyAttempt): void {
    const job = this.require(attempt.jobId);
    if (job.status !== 'running') {
      throw new InvalidTransitionError(job.id, job.status, job.status, `attempt for ${attempt.strategyId} outside a running job`);
    }
    if (!job.planned.some((p) => p.strategyId === attempt.strategyId)) {
      throw new InvalidTransitionError(job.id, job.status, job.status, `${attempt.strategyId} was never planned`);
    }
    if (job.completed.includes(attempt.strategyId)) {
      throw new InvalidTransitionError(job.id, job.status, job.status, `${attempt.strategyId} already attempted`);
    }

    job.attempts.push({ ...attempt });
    job.completed.push(attempt.strategyId);
    this.pushReasoning(
      job,
      'attempt',
      {
        strategyId: attempt.strategyId,
        outcome: attempt.outcome,
        recordCount: attempt.recordCount,
        requestsMade: attempt.requestsMade,
        ...(attempt.errorKind ? { errorKind: attempt.errorKind } : {}),
      },
      attempt.error ? `${attempt.outcome}: ${attempt.error}` : attempt.outcome
    );
    this.persist(job);
  }

  addError(jobId: string, error: Omit<JobError, 'timestamp'>): void {
    const job = this.require(jobId);
    job.errors.push({ ...error, timestamp: new Date(this.clock.now()) });
    this.persist(job);
  }

  /**
   * Move a job to its terminal status and attach the summary
   */
  finalize(jobId: string, status: TerminalStatus, summary: JobSummary): Job {
    const job = this.require(jobId);
    this.applyTransition(job, status, summary.stopReason, { ...summary });
    job.summary = { ...summary };
    job.completedAt = new Date(this.clock.now());
    this.pushReasoning(job, 'finalize', { ...summary }, status);
    this.persist(job);
    this.active.delete(jobId);
    log.info(`Job ${jobId} finished: ${status} (${summary.stopReason})`);
    return this.snapshot(job);
  }

  get(jobId: string): Job | null {
    const job = this.active.get(jobId) ?? this.repository.loadJob(jobId);
    return job ? this.snapshot(job) : null;
  }

  list(status?: JobStatus): Job[] {
    return this.repository.getAllJobs(status);
  }

  /**
   * Settle jobs left behind by a previous process: running jobs fail, pending
   * jobs come back under ledger ownership so they can be queued again.
   */
  recover(): RecoveryResult {
    const result: RecoveryResult = { interrupted: [], requeued: [] };

    for (const job of this.repository.getAllJobs('running')) {
      this.active.set(job.id, job);
      this.addError(job.id, { kind: 'interrupted', message: 'interrupted by restart' });
      this.finalize(job.id, 'failed', {
        strategiesTried: job.completed.length,
        strategiesSucceeded: job.attempts.filter((a) => a.outcome !== 'failed').length,
        entitiesFound: 0,
        newEntities: 0,
        updatedEntities: 0,
        totalRequests: job.attempts.reduce((sum, a) => sum + a.requestsMade, 0),
        wallTimeMs: job.startedAt ? Math.max(0, this.clock.now() - job.startedAt.getTime()) : 0,
        stopReason: 'error',
      });
      result.interrupted.push(job.id);
    }

    for (const job of this.repository.getAllJobs('pending')) {
      this.active.set(job.id, job);
      result.requeued.push(job.id);
    }

    if (result.interrupted.length > 0 || result.requeued.length > 0) {
      log.warn(`Recovered ${result.interrupted.length} interrupted and ${result.requeued.length} pending jobs`);
    }
    return result;
  }

  private require(jobId: string): Job {
    const job = this.active.get(jobId);
    if (job) return job;

    const stored = this.repository.loadJob(jobId);
    if (!stored) {
      throw new InvalidTransitionError(jobId, 'unknown', 'unknown', 'job does not exist');
    }
    if (isTerminal(stored.status)) {
      throw new InvalidTransitionError(jobId, stored.status, stored.status, 'job has already finished');
    }
    this.active.set(jobId, stored);
    return stored;
  }

  private applyTransition(job: Job, to: JobStatus, reason: string, inputs: Record<string, unknown>): void {
    if (!ALLOWED_TRANSITIONS[job.status].includes(to)) {
      throw new InvalidTransitionError(job.id, job.status, to);
    }
    const from = job.status;
    job.status = to;
    if (to === 'running') {
      job.startedAt = new Date(this.clock.now());
    }
    this.pushReasoning(job, 'transition', { from, to, ...inputs }, reason);
  }

  private pushReasoning(job: Job, kind: ReasoningKind, inputs: Record<string, unknown>, outcome: string): ReasoningEntry {
    const entry: ReasoningEntry = {
      seq: job.reasoning.length + 1,
      timestamp: new Date(this.clock.now()),
      kind,
      inputs,
      outcome,
    };
    job.reasoning.push(entry);
    return entry;
  }

  private persist(job: Job): void {
    this.repository.saveJob(job);
  }

  private snapshot(job: Job): Job {
    return structuredClone(job);
  }
}
