import { EntityType, Attributes } from './CandidateRecord.js';
import { StrategyId } from './Strategy.js';

/**
 * Research job domain entity
 */
export type JobStatus = 'pending' | 'running' | 'success' | 'partial_success' | 'failed';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['success', 'partial_success', 'failed'];

export interface PlannedStrategy {
  strategyId: StrategyId;
  priority: number; // 0-10
  expectedConfidence: number; // 0-1
  rationale: string;
}

export type AttemptOutcome = 'success' | 'partial' | 'failed';

export interface StrategyAttempt {
  jobId: string;
  strategyId: StrategyId;
  priority: number;
  outcome: AttemptOutcome;
  requestsMade: number;
  recordCount: number;
  errorKind?: string;
  error?: string;
  startedAt: Date;
  completedAt: Date;
  rawOutput: unknown;
}

export type ReasoningKind =
  | 'plan'
  | 'dispatch'
  | 'attempt'
  | 'match'
  | 'evaluate'
  | 'transition'
  | 'finalize'
  | 'cancel';

export interface ReasoningEntry {
  seq: number;
  timestamp: Date;
  kind: ReasoningKind;
  inputs: Record<string, unknown>;
  outcome: string;
}

export interface JobError {
  timestamp: Date;
  strategyId?: StrategyId;
  kind: string;
  message: string;
}

export type StopReason =
  | 'sufficient_coverage'
  | 'budget_exhausted'
  | 'time_exceeded'
  | 'no_data_found'
  | 'plan_exhausted'
  | 'cancelled'
  | 'error';

export interface JobSummary {
  strategiesTried: number;
  strategiesSucceeded: number;
  entitiesFound: number;
  newEntities: number;
  updatedEntities: number;
  totalRequests: number;
  wallTimeMs: number;
  stopReason: StopReason;
}

export interface Job {
  id: string;
  targetIdentity: string;
  targetType: EntityType;
  targetAttributes: Attributes;
  strategyOverride?: StrategyId[];
  status: JobStatus;
  planned: PlannedStrategy[];
  completed: StrategyId[];
  attempts: StrategyAttempt[];
  reasoning: ReasoningEntry[];
  errors: JobError[];
  summary?: JobSummary;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}
