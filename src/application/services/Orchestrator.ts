import { createHash } from 'crypto';
import pLimit from 'p-limit';
import { Attributes, CandidateDraft, CandidateRecord, EntityType } from '../../core/entities/CandidateRecord.js';
import { EntityProfile } from '../../core/entities/EntityProfile.js';
import { Job, JobSummary, PlannedStrategy, StopReason, StrategyAttempt } from '../../core/entities/Job.js';
import { MergedEntity } from '../../core/entities/MergedEntity.js';
import { StrategyId } from '../../core/entities/Strategy.js';
import { IEntityRepository } from '../../core/interfaces/IEntityRepository.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { ResearchStrategy, StrategyContext, StrategyResult } from '../../core/interfaces/IStrategy.js';
import { StrategyTimeoutError, describeError, failureKindOf } from '../../core/errors.js';
import { StrategyRegistry } from '../../infrastructure/strategies/StrategyRegistry.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { createLogger } from '../../utils/logger.js';
import { EntityMatcher } from './EntityMatcher.js';
import { JobLedger, TerminalStatus, isTerminal } from './JobLedger.js';
import { DEFAULT_STOP_LIMITS, JobProgress, StopLimits, evaluateStop } from './StopPolicy.js';
import { StrategyPlanner } from './StrategyPlanner.js';
import { Synthesizer } from './Synthesizer.js';

const log = createLogger('Orchestrator');

export interface OrchestratorOptions {
  maxParallelStrategies: number;
  strategyTimeoutMs: number;
  stopLimits: StopLimits;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  maxParallelStrategies: 3,
  strategyTimeoutMs: 180_000,
  stopLimits: DEFAULT_STOP_LIMITS,
};

export interface OrchestratorDeps {
  ledger: JobLedger;
  planner: StrategyPlanner;
  registry: StrategyRegistry;
  matcher: EntityMatcher;
  synthesizer: Synthesizer;
  jobRepository: IJobRepository;
  entityRepository: IEntityRepository;
  resources: Omit<StrategyContext, 'signal'>;
  clock?: Clock;
}

function canonicalAttributes(attributes: Attributes): Attributes {
  const result: Attributes = {};
  for (const key of Object.keys(attributes).sort()) {
    const value = attributes[key];
    if (typeof value === 'number' && !Number.isFinite(value)) continue;
    if (typeof value === 'string' && value.trim() === '') continue;
    result[key] = typeof value === 'string' ? value.trim() : value;
  }
  return result;
}

/**
 * Content hash of what a record says and where it came from
 */
export function computeRecordId(strategyId: string, draft: CandidateDraft): string {
  const payload = JSON.stringify([
    strategyId,
    draft.sourceType,
    draft.sourceUrl ?? '',
    draft.name.trim(),
    Object.entries(canonicalAttributes(draft.attributes)),
  ]);
  return createHash('sha256').update(payload).digest('hex').slice(0, 16);
}

// Entities of different types never share a group, even under the same name
function groupKey(entityType: EntityType, normalizedKey: string): string {
  return `${entityType}:${normalizedKey}`;
}

/**
 * Mutable state of one running job. Only touched between awaits.
 */
interface RunState {
  job: Job;
  profile: EntityProfile;
  startedAt: number;
  entities: Map<string, MergedEntity>;
  records: CandidateRecord[];
  tried: number;
  inFlight: number;
  succeeded: number;
  requests: number;
  anyFailed: boolean;
  stop: { reason: StopReason; detail: string } | null;
}

/**
 * Drives one job from plan to finalize.
 *
 * Planned strategies run through a bounded pool. Each finished attempt is
 * merged and the stop policy re-evaluated before the next queued strategy
 * starts, so a stop decision keeps later strategies from dispatching.
 * In-flight attempts always run to completion.
 */
export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly options: OrchestratorOptions;
  private readonly clock: Clock;
  private readonly cancelRequests = new Set<string>();

  constructor(deps: OrchestratorDeps, options: Partial<OrchestratorOptions> = {}) {
    this.deps = deps;
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Ask a job to stop dispatching. Returns false for unknown or finished jobs.
   */
  requestCancel(jobId: string): boolean {
    const job = this.deps.ledger.get(jobId);
    if (!job || isTerminal(job.status)) return false;
    if (!this.cancelRequests.has(jobId)) {
      this.cancelRequests.add(jobId);
      this.deps.ledger.appendReasoning(jobId, 'cancel', { status: job.status }, 'cancellation requested');
      log.info(`Cancellation requested for job ${jobId}`);
    }
    return true;
  }

  isCancelRequested(jobId: string): boolean {
    return this.cancelRequests.has(jobId);
  }

  async run(jobId: string): Promise<Job> {
    const { ledger } = this.deps;
    const job = ledger.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }
    if (isTerminal(job.status)) {
      return job;
    }

    const state: RunState = {
      job,
      profile: { targetIdentity: job.targetIdentity, targetType: job.targetType, attributes: job.targetAttributes },
      startedAt: this.clock.now(),
      entities: new Map(),
      records: [],
      tried: 0,
      inFlight: 0,
      succeeded: 0,
      requests: 0,
      anyFailed: false,
      stop: null,
    };

    try {
      if (this.cancelRequests.has(jobId)) {
        return this.finish(state, 'cancelled');
      }

      let planned: PlannedStrategy[];
      try {
        planned = this.deps.planner.plan(state.profile, job.strategyOverride);
        ledger.markPlanned(jobId, planned);
        ledger.transition(jobId, 'running', 'execution started', { plannedCount: planned.length });
      } catch (error) {
        ledger.addError(jobId, { kind: failureKindOf(error), message: describeError(error) });
        return this.finish(state, 'error');
      }

      const limit = pLimit(Math.max(1, this.options.maxParallelStrategies));
      await Promise.all(planned.map((entry) => limit(() => this.dispatch(state, entry))));

      if (this.cancelRequests.has(jobId)) {
        return this.finish(state, 'cancelled');
      }
      if (!state.stop) {
        ledger.appendReasoning(jobId, 'evaluate', { ...this.progressOf(state) }, 'stop: plan_exhausted');
      }
      return this.finish(state, state.stop?.reason ?? 'plan_exhausted');
    } catch (error) {
      log.error(`Job ${jobId} aborted: ${describeError(error)}`);
      const current = ledger.get(jobId);
      if (current && !isTerminal(current.status)) {
        ledger.addError(jobId, { kind: failureKindOf(error), message: describeError(error) });
        return this.finish(state, 'error');
      }
      throw error;
    } finally {
      this.cancelRequests.delete(jobId);
    }
  }

  private async dispatch(state: RunState, entry: PlannedStrategy): Promise<void> {
    const { ledger, registry } = this.deps;
    const jobId = state.job.id;

    if (this.cancelRequests.has(jobId) || state.stop) {
      log.debug(`Skipping ${entry.strategyId} for job ${jobId}`);
      return;
    }
    // Attempts still running count against the budget too
    if (state.tried + state.inFlight >= this.options.stopLimits.maxStrategiesPerJob) {
      log.debug(`Skipping ${entry.strategyId} for job ${jobId}: strategy budget committed`);
      return;
    }

    const strategy = registry.get(entry.strategyId);
    ledger.appendReasoning(jobId, 'dispatch', { strategyId: entry.strategyId, priority: entry.priority }, 'dispatched');

    const attemptStart = this.clock.now();
    let result: StrategyResult;
    state.inFlight++;
    try {
      result = strategy
        ? await this.executeWithTimeout(strategy, state.profile)
        : { status: 'failed', records: [], requestsMade: 0, error: `Strategy ${entry.strategyId} is not registered` };
    } finally {
      state.inFlight--;
    }

    const records = this.stamp(state, entry.strategyId, result.records);
    const errorKind = result.status === 'failed' ? failureKindOf(result.cause) : undefined;

    const attempt: StrategyAttempt = {
      jobId,
      strategyId: entry.strategyId,
      priority: entry.priority,
      outcome: result.status,
      requestsMade: result.requestsMade,
      recordCount: records.length,
      ...(errorKind ? { errorKind } : {}),
      ...(result.error ? { error: result.error } : {}),
      startedAt: new Date(attemptStart),
      completedAt: new Date(this.clock.now()),
      rawOutput: result.records,
    };

    state.tried++;
    state.requests += result.requestsMade;
    if (result.status === 'failed') {
      state.anyFailed = true;
      ledger.addError(jobId, {
        strategyId: entry.strategyId,
        kind: errorKind ?? 'unknown',
        message: result.error ?? 'strategy failed',
      });
    } else {
      state.succeeded++;
    }

    ledger.recordAttempt(attempt);
    if (records.length > 0) {
      this.deps.jobRepository.saveCandidateRecords(records);
    }
    this.mergeRecords(state, records);

    const progress = this.progressOf(state);
    const decision = evaluateStop(progress, this.options.stopLimits);
    if (decision.stop && !state.stop) {
      state.stop = { reason: decision.reason, detail: decision.detail };
    }
    ledger.appendReasoning(
      jobId,
      'evaluate',
      { ...progress, afterStrategy: entry.strategyId },
      decision.stop ? `stop: ${decision.reason} (${decision.detail})` : `continue (${decision.detail})`
    );
  }

  private async executeWithTimeout(strategy: ResearchStrategy, profile: EntityProfile): Promise<StrategyResult> {
    const controller = new AbortController();
    const timer = new AbortController();
    const timeoutMs = this.options.strategyTimeoutMs;

    const timeout = new Promise<StrategyResult>((settle) => {
      void this.clock.sleep(timeoutMs, timer.signal).then(() => {
        if (timer.signal.aborted) return;
        const error = new StrategyTimeoutError(strategy.id, timeoutMs);
        settle({ status: 'failed', records: [], requestsMade: 0, error: error.message, cause: error });
        controller.abort();
      });
    });

    const execution = strategy
      .execute(profile, { ...this.deps.resources, signal: controller.signal })
      .catch(
        (error: unknown): StrategyResult => ({
          status: 'failed',
          records: [],
          requestsMade: 0,
          error: describeError(error),
          cause: error,
        })
      );

    try {
      return await Promise.race([execution, timeout]);
    } finally {
      timer.abort();
    }
  }

  private stamp(state: RunState, strategyId: StrategyId, drafts: readonly CandidateDraft[]): CandidateRecord[] {
    const seen = new Set<string>();
    const records: CandidateRecord[] = [];
    const collectedAt = new Date(this.clock.now());

    for (const draft of drafts) {
      const rawName = draft.name.trim();
      if (!rawName) continue;

      const id = computeRecordId(strategyId, draft);
      if (seen.has(id)) continue;
      seen.add(id);

      const entityType: EntityType = draft.entityType ?? state.profile.targetType;
      records.push(
        Object.freeze({
          id,
          jobId: state.job.id,
          strategyId,
          normalizedKey: this.deps.matcher.normalize(rawName),
          rawName,
          entityType,
          attributes: Object.freeze(canonicalAttributes(draft.attributes)),
          sourceType: draft.sourceType,
          ...(draft.sourceUrl ? { sourceUrl: draft.sourceUrl } : {}),
          confidence: draft.confidence,
          collectedAt,
        })
      );
    }
    return records;
  }

  private mergeRecords(state: RunState, records: readonly CandidateRecord[]): void {
    const { matcher, synthesizer, ledger } = this.deps;

    for (const record of records) {
      const match = matcher.match(
        { name: record.rawName, entityType: record.entityType, attributes: record.attributes },
        Array.from(state.entities.values())
      );
      const existing = state.entities.get(groupKey(record.entityType, match.key)) ?? null;
      let merged = existing
        ? synthesizer.merge(existing, record)
        : synthesizer.build(match.key, record.entityType, [record]);

      // Re-key by the lead record so the key does not depend on arrival order
      const key = synthesizer.leadRecord(merged.records)?.normalizedKey ?? match.key;
      if (key !== match.key) {
        state.entities.delete(groupKey(record.entityType, match.key));
        const occupant = state.entities.get(groupKey(record.entityType, key));
        merged = synthesizer.build(key, merged.entityType, occupant ? [...occupant.records, ...merged.records] : merged.records);
      }
      state.entities.set(groupKey(merged.entityType, key), merged);
      state.records.push(record);

      ledger.appendReasoning(
        state.job.id,
        'match',
        {
          recordId: record.id,
          rawName: record.rawName,
          key: merged.normalizedKey,
          reason: match.reason,
          similarity: match.similarity,
          ...(match.ambiguous ? { ambiguous: match.ambiguityReason, alternatives: match.alternatives } : {}),
        },
        match.isNew ? `new entity ${merged.normalizedKey}` : `merged into ${merged.normalizedKey}`
      );
    }
  }

  /**
   * The entity the target identity resolves to, else the most complete one
   */
  private primaryEntity(state: RunState): MergedEntity | null {
    const entities = Array.from(state.entities.values());
    if (entities.length === 0) return null;

    const match = this.deps.matcher.match(
      { name: state.profile.targetIdentity, entityType: state.profile.targetType, attributes: state.profile.attributes },
      entities
    );
    if (!match.isNew) {
      const primary = state.entities.get(groupKey(state.profile.targetType, match.key));
      if (primary) return primary;
    }
    return entities.reduce((best, entity) => (entity.completeness > best.completeness ? entity : best));
  }

  private progressOf(state: RunState): JobProgress {
    return {
      completeness: this.primaryEntity(state)?.completeness ?? 0,
      distinctSourceTypes: new Set(state.records.map((r) => r.sourceType)).size,
      strategiesTried: state.tried,
      recordCount: state.records.length,
      elapsedMs: this.clock.now() - state.startedAt,
    };
  }

  private finish(state: RunState, reason: StopReason): Job {
    const jobId = state.job.id;
    const { newEntities, updatedEntities } = this.persistEntities(state);

    let status: TerminalStatus;
    if (reason === 'cancelled' || reason === 'error' || state.records.length === 0) {
      status = 'failed';
    } else if (reason === 'sufficient_coverage' || (reason === 'plan_exhausted' && !state.anyFailed)) {
      status = 'success';
    } else {
      status = 'partial_success';
    }

    const summary: JobSummary = {
      strategiesTried: state.tried,
      strategiesSucceeded: state.succeeded,
      entitiesFound: state.entities.size,
      newEntities,
      updatedEntities,
      totalRequests: state.requests,
      wallTimeMs: Math.max(0, this.clock.now() - state.startedAt),
      stopReason: reason,
    };
    return this.deps.ledger.finalize(jobId, status, summary);
  }

  /**
   * Fold each job entity into the stored entity it resolves to. Stored
   * entities are matched with the same identifier, exact and fuzzy rules
   * used within a job, restricted to the same entity type.
   */
  private persistEntities(state: RunState): { newEntities: number; updatedEntities: number } {
    const { entityRepository, matcher, synthesizer } = this.deps;
    let newEntities = 0;
    let updatedEntities = 0;

    const entities = Array.from(state.entities.values()).sort((a, b) =>
      a.normalizedKey < b.normalizedKey ? -1 : a.normalizedKey > b.normalizedKey ? 1 : 0
    );
    for (const entity of entities) {
      const name = entity.attributes.name;
      const match = matcher.match(
        { name: typeof name === 'string' ? name : entity.normalizedKey, entityType: entity.entityType, attributes: entity.attributes },
        entityRepository.getAll()
      );
      const stored = match.isNew ? null : entityRepository.getByKey(match.key, entity.entityType);

      const folded = synthesizer.fold(stored, entity);
      if (!folded.changed) continue;
      entityRepository.upsert(folded.entity);
      if (folded.isNew) newEntities++;
      else updatedEntities++;
      if (stored && stored.normalizedKey !== entity.normalizedKey) {
        log.debug(`Job entity ${entity.normalizedKey} folded into stored ${stored.normalizedKey} (${match.reason})`);
      }
    }
    return { newEntities, updatedEntities };
  }
}
