/**
 * Candidate record domain entity
 */

/**
 * Kinds of source, most reliable first. This is also the default merge priority.
 */
export const SOURCE_TYPES = [
  'regulatory-filing',
  'official-primary',
  'structured-registry',
  'first-party-content',
  'press-news',
  'inferred-signal',
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export const ENTITY_TYPES = ['company', 'investor'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export type AttributeValue = string | number | boolean;

export type Attributes = Record<string, AttributeValue>;

/**
 * What a strategy emits: one unreconciled fact bundle about one entity.
 */
export interface CandidateDraft {
  name: string;
  entityType?: EntityType;
  attributes: Attributes;
  sourceType: SourceType;
  sourceUrl?: string;
  confidence: ConfidenceLevel;
}

/**
 * A draft after the orchestrator has stamped it. Frozen on creation.
 */
export interface CandidateRecord {
  readonly id: string;
  readonly jobId: string;
  readonly strategyId: string;
  readonly normalizedKey: string;
  readonly rawName: string;
  readonly entityType: EntityType;
  readonly attributes: Readonly<Attributes>;
  readonly sourceType: SourceType;
  readonly sourceUrl?: string;
  readonly confidence: ConfidenceLevel;
  readonly collectedAt: Date;
}
