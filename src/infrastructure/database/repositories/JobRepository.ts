import Database from 'better-sqlite3';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';
import {
  AttemptOutcome,
  Job,
  JobError,
  JobStatus,
  JobSummary,
  PlannedStrategy,
  ReasoningEntry,
  ReasoningKind,
  StrategyAttempt,
} from '../../../core/entities/Job.js';
import { Attributes, CandidateRecord, ConfidenceLevel, EntityType, SourceType } from '../../../core/entities/CandidateRecord.js';
import { StrategyId } from '../../../core/entities/Strategy.js';
import { fromJson } from '../DatabaseConnection.js';

interface JobRow {
  id: string;
  target_identity: string;
  target_type: EntityType;
  target_attributes: string;
  strategy_override: string | null;
  status: JobStatus;
  planned: string;
  completed: string;
  errors: string;
  summary: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

interface ReasoningRow {
  seq: number;
  timestamp: string;
  kind: ReasoningKind;
  inputs: string;
  outcome: string;
}

interface AttemptRow {
  job_id: string;
  strategy_id: StrategyId;
  priority: number;
  outcome: AttemptOutcome;
  requests_made: number;
  record_count: number;
  error_kind: string | null;
  error: string | null;
  started_at: string;
  completed_at: string;
  raw_output: string;
}

interface CandidateRow {
  job_id: string;
  id: string;
  strategy_id: string;
  normalized_key: string;
  raw_name: string;
  entity_type: EntityType;
  attributes: string;
  source_type: SourceType;
  source_url: string | null;
  confidence: ConfidenceLevel;
  collected_at: string;
}

type StoredJobError = Omit<JobError, 'timestamp'> & { timestamp: string };

export function rowToCandidate(row: CandidateRow): CandidateRecord {
  return Object.freeze({
    id: row.id,
    jobId: row.job_id,
    strategyId: row.strategy_id,
    normalizedKey: row.normalized_key,
    rawName: row.raw_name,
    entityType: row.entity_type,
    attributes: Object.freeze(fromJson<Attributes>(row.attributes, {})),
    sourceType: row.source_type,
    ...(row.source_url ? { sourceUrl: row.source_url } : {}),
    confidence: row.confidence,
    collectedAt: new Date(row.collected_at),
  });
}

/**
 * SQLite implementation of job repository
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: Job): void {
    const upsertJob = this.db.prepare(`
      INSERT INTO jobs (id, target_identity, target_type, target_attributes, strategy_override, status, planned,
                        completed, errors, summary, created_at, started_at, completed_at)
      VALUES (@id, @targetIdentity, @targetType, @targetAttributes, @strategyOverride, @status, @planned,
              @completed, @errors, @summary, @createdAt, @startedAt, @completedAt)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        planned = excluded.planned,
        completed = excluded.completed,
        errors = excluded.errors,
        summary = excluded.summary,
        started_at = excluded.started_at,
        completed_at = excluded.completed_at
    `);
    const insertReasoning = this.db.prepare(`
      INSERT OR IGNORE INTO job_reasoning (job_id, seq, timestamp, kind, inputs, outcome)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertAttempt = this.db.prepare(`
      INSERT OR IGNORE INTO strategy_attempts (job_id, strategy_id, priority, outcome, requests_made, record_count,
                                               error_kind, error, started_at, completed_at, raw_output)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const persist = this.db.transaction((current: Job) => {
      upsertJob.run({
        id: current.id,
        targetIdentity: current.targetIdentity,
        targetType: current.targetType,
        targetAttributes: JSON.stringify(current.targetAttributes),
        strategyOverride: current.strategyOverride ? JSON.stringify(current.strategyOverride) : null,
        status: current.status,
        planned: JSON.stringify(current.planned),
        completed: JSON.stringify(current.completed),
        errors: JSON.stringify(current.errors),
        summary: current.summary ? JSON.stringify(current.summary) : null,
        createdAt: current.createdAt.toISOString(),
        startedAt: current.startedAt ? current.startedAt.toISOString() : null,
        completedAt: current.completedAt ? current.completedAt.toISOString() : null,
      });

      for (const entry of current.reasoning) {
        insertReasoning.run(
          current.id,
          entry.seq,
          entry.timestamp.toISOString(),
          entry.kind,
          JSON.stringify(entry.inputs),
          entry.outcome
        );
      }

      for (const attempt of current.attempts) {
        insertAttempt.run(
          attempt.jobId,
          attempt.strategyId,
          attempt.priority,
          attempt.outcome,
          attempt.requestsMade,
          attempt.recordCount,
          attempt.errorKind ?? null,
          attempt.error ?? null,
          attempt.startedAt.toISOString(),
          attempt.completedAt.toISOString(),
          JSON.stringify(attempt.rawOutput ?? null)
        );
      }
    });

    persist(job);
  }

  loadJob(jobId: string): Job | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(jobId);
    if (!row) return null;
    return this.rowToJob(row);
  }

  getAllJobs(status?: JobStatus): Job[] {
    const rows = status
      ? this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE status = ? ORDER BY created_at DESC').all(status)
      : this.db.prepare<[], JobRow>('SELECT * FROM jobs ORDER BY created_at DESC').all();

    return rows.map((row) => this.rowToJob(row));
  }

  saveCandidateRecords(records: readonly CandidateRecord[]): void {
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO candidate_records (job_id, id, strategy_id, normalized_key, raw_name, entity_type,
                                               attributes, source_type, source_url, confidence, collected_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertAll = this.db.transaction((batch: readonly CandidateRecord[]) => {
      for (const record of batch) {
        stmt.run(
          record.jobId,
          record.id,
          record.strategyId,
          record.normalizedKey,
          record.rawName,
          record.entityType,
          JSON.stringify(record.attributes),
          record.sourceType,
          record.sourceUrl ?? null,
          record.confidence,
          record.collectedAt.toISOString()
        );
      }
    });
    insertAll(records);
  }

  loadCandidateRecords(jobId: string): CandidateRecord[] {
    return this.db
      .prepare<[string], CandidateRow>('SELECT * FROM candidate_records WHERE job_id = ? ORDER BY collected_at, rowid')
      .all(jobId)
      .map(rowToCandidate);
  }

  deleteJobsByAge(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000).toISOString();
    const result = this.db
      .prepare(`DELETE FROM jobs WHERE completed_at IS NOT NULL AND completed_at < ? AND status NOT IN ('pending', 'running')`)
      .run(cutoffTime);
    return result.changes;
  }

  private rowToJob(row: JobRow): Job {
    const reasoning: ReasoningEntry[] = this.db
      .prepare<[string], ReasoningRow>('SELECT * FROM job_reasoning WHERE job_id = ? ORDER BY seq')
      .all(row.id)
      .map((entry) => ({
        seq: entry.seq,
        timestamp: new Date(entry.timestamp),
        kind: entry.kind,
        inputs: fromJson<Record<string, unknown>>(entry.inputs, {}),
        outcome: entry.outcome,
      }));

    const attempts: StrategyAttempt[] = this.db
      .prepare<[string], AttemptRow>('SELECT * FROM strategy_attempts WHERE job_id = ? ORDER BY completed_at, rowid')
      .all(row.id)
      .map((attempt) => ({
        jobId: attempt.job_id,
        strategyId: attempt.strategy_id,
        priority: attempt.priority,
        outcome: attempt.outcome,
        requestsMade: attempt.requests_made,
        recordCount: attempt.record_count,
        ...(attempt.error_kind ? { errorKind: attempt.error_kind } : {}),
        ...(attempt.error ? { error: attempt.error } : {}),
        startedAt: new Date(attempt.started_at),
        completedAt: new Date(attempt.completed_at),
        rawOutput: fromJson<unknown>(attempt.raw_output, null),
      }));

    const errors: JobError[] = fromJson<StoredJobError[]>(row.errors, []).map((error) => ({
      ...error,
      timestamp: new Date(error.timestamp),
    }));

    const strategyOverride = fromJson<StrategyId[] | null>(row.strategy_override, null);
    const summary = fromJson<JobSummary | null>(row.summary, null);

    return {
      id: row.id,
      targetIdentity: row.target_identity,
      targetType: row.target_type,
      targetAttributes: fromJson<Attributes>(row.target_attributes, {}),
      ...(strategyOverride ? { strategyOverride } : {}),
      status: row.status,
      planned: fromJson<PlannedStrategy[]>(row.planned, []),
      completed: fromJson<StrategyId[]>(row.completed, []),
      attempts,
      reasoning,
      errors,
      ...(summary ? { summary } : {}),
      createdAt: new Date(row.created_at),
      ...(row.started_at ? { startedAt: new Date(row.started_at) } : {}),
      ...(row.completed_at ? { completedAt: new Date(row.completed_at) } : {}),
    };
  }
}
