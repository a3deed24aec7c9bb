import { CandidateDraft, CandidateRecord, EntityType, SourceType } from '../../src/core/entities/CandidateRecord.js';
import { EntityProfile } from '../../src/core/entities/EntityProfile.js';
import { Job, JobStatus } from '../../src/core/entities/Job.js';
import { MergedEntity } from '../../src/core/entities/MergedEntity.js';
import { StrategyId } from '../../src/core/entities/Strategy.js';
import { IEntityRepository } from '../../src/core/interfaces/IEntityRepository.js';
import { IJobRepository } from '../../src/core/interfaces/IJobRepository.js';
import { ResearchStrategy, StrategyContext, StrategyResult } from '../../src/core/interfaces/IStrategy.js';
import { Clock } from '../../src/utils/clock.js';

export class InMemoryJobRepository implements IJobRepository {
  readonly jobs = new Map<string, Job>();
  readonly records = new Map<string, CandidateRecord>();
  saveCount = 0;

  saveJob(job: Job): void {
    this.saveCount++;
    this.jobs.set(job.id, structuredClone(job));
  }

  loadJob(jobId: string): Job | null {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  getAllJobs(status?: JobStatus): Job[] {
    return Array.from(this.jobs.values())
      .filter((job) => !status || job.status === status)
      .map((job) => structuredClone(job));
  }

  saveCandidateRecords(records: readonly CandidateRecord[]): void {
    for (const record of records) {
      const key = `${record.jobId}:${record.id}`;
      if (!this.records.has(key)) this.records.set(key, record);
    }
  }

  loadCandidateRecords(jobId: string): CandidateRecord[] {
    return Array.from(this.records.values()).filter((r) => r.jobId === jobId);
  }

  deleteJobsByAge(): number {
    return 0;
  }
}

export class InMemoryEntityRepository implements IEntityRepository {
  readonly entities = new Map<string, MergedEntity>();
  upserts = 0;

  getByKey(normalizedKey: string, entityType?: EntityType): MergedEntity | null {
    return (
      this.getAll().find((e) => e.normalizedKey === normalizedKey && (!entityType || e.entityType === entityType)) ?? null
    );
  }

  getAll(): MergedEntity[] {
    return Array.from(this.entities.values()).sort(
      (a, b) => a.normalizedKey.localeCompare(b.normalizedKey) || a.entityType.localeCompare(b.entityType)
    );
  }

  upsert(entity: MergedEntity): void {
    this.upserts++;
    this.entities.set(`${entity.entityType}:${entity.normalizedKey}`, entity);
  }

  count(): number {
    return this.entities.size;
  }
}

export interface FakeStrategyOptions {
  id: StrategyId;
  sourceType: SourceType;
  records?: CandidateDraft[];
  status?: StrategyResult['status'];
  error?: unknown;
  /** Simulated run time on the injected clock */
  durationMs?: number;
  requestsMade?: number;
  clock?: Clock;
}

/**
 * Strategy returning canned drafts, counting its calls
 */
export class FakeStrategy implements ResearchStrategy {
  readonly id: StrategyId;
  readonly displayName: string;
  readonly sourceType: SourceType;
  readonly targetKey: string;
  calls = 0;
  lastSignal?: AbortSignal;

  constructor(private readonly options: FakeStrategyOptions) {
    this.id = options.id;
    this.displayName = `Fake ${options.id}`;
    this.sourceType = options.sourceType;
    this.targetKey = `fake:${options.id}`;
  }

  async execute(_profile: EntityProfile, context: StrategyContext): Promise<StrategyResult> {
    this.calls++;
    this.lastSignal = context.signal;
    if (this.options.durationMs && this.options.clock) {
      await this.options.clock.sleep(this.options.durationMs);
    }
    if (this.options.error !== undefined) {
      const message = this.options.error instanceof Error ? this.options.error.message : String(this.options.error);
      return { status: 'failed', records: [], requestsMade: this.options.requestsMade ?? 1, error: message, cause: this.options.error };
    }
    return {
      status: this.options.status ?? 'success',
      records: this.options.records ?? [],
      requestsMade: this.options.requestsMade ?? 1,
    };
  }
}

export function draft(
  name: string,
  sourceType: SourceType,
  attributes: CandidateDraft['attributes'],
  confidence: CandidateDraft['confidence'] = 'high'
): CandidateDraft {
  return { name, sourceType, attributes, confidence, sourceUrl: `https://source.test/${sourceType}` };
}
