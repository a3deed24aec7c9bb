import { StopReason } from '../../core/entities/Job.js';

export interface StopLimits {
  coverageThreshold: number;
  minSourceTypes: number;
  maxStrategiesPerJob: number;
  maxJobDurationMs: number;
  /** Distinct strategies tried with nothing found before giving up */
  noDataAfterStrategies: number;
}

export const DEFAULT_STOP_LIMITS: StopLimits = {
  coverageThreshold: 80,
  minSourceTypes: 2,
  maxStrategiesPerJob: 5,
  maxJobDurationMs: 600_000,
  noDataAfterStrategies: 4,
};

/**
 * Everything a stop decision may look at
 */
export interface JobProgress {
  completeness: number;
  distinctSourceTypes: number;
  strategiesTried: number;
  recordCount: number;
  elapsedMs: number;
}

export type StopDecision =
  | { stop: true; reason: Exclude<StopReason, 'plan_exhausted' | 'cancelled' | 'error'>; detail: string }
  | { stop: false; detail: string };

type StopRule = (progress: JobProgress, limits: StopLimits) => StopDecision | null;

const sufficientCoverage: StopRule = (p, l) =>
  p.completeness >= l.coverageThreshold && p.distinctSourceTypes >= l.minSourceTypes
    ? {
        stop: true,
        reason: 'sufficient_coverage',
        detail: `completeness ${p.completeness} >= ${l.coverageThreshold} with ${p.distinctSourceTypes} source types`,
      }
    : null;

const budgetExhausted: StopRule = (p, l) =>
  p.strategiesTried >= l.maxStrategiesPerJob
    ? { stop: true, reason: 'budget_exhausted', detail: `${p.strategiesTried} strategies tried, max ${l.maxStrategiesPerJob}` }
    : null;

const timeExceeded: StopRule = (p, l) =>
  p.elapsedMs >= l.maxJobDurationMs
    ? { stop: true, reason: 'time_exceeded', detail: `elapsed ${p.elapsedMs}ms >= ${l.maxJobDurationMs}ms` }
    : null;

const noDataFound: StopRule = (p, l) =>
  p.recordCount === 0 && p.strategiesTried >= l.noDataAfterStrategies
    ? { stop: true, reason: 'no_data_found', detail: `no records after ${p.strategiesTried} strategies` }
    : null;

// Evaluated in order; the first rule that fires wins
const STOP_RULES: readonly StopRule[] = [sufficientCoverage, budgetExhausted, timeExceeded, noDataFound];

export function evaluateStop(progress: JobProgress, limits: StopLimits = DEFAULT_STOP_LIMITS): StopDecision {
  for (const rule of STOP_RULES) {
    const decision = rule(progress, limits);
    if (decision) return decision;
  }
  return {
    stop: false,
    detail: `completeness ${progress.completeness}, ${progress.distinctSourceTypes} source types, ${progress.strategiesTried} tried`,
  };
}
