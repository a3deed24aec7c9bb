import {
  AttributeValue,
  Attributes,
  CandidateRecord,
  ConfidenceLevel,
  EntityType,
  SOURCE_TYPES,
  SourceType,
} from '../../core/entities/CandidateRecord.js';
import { MergedEntity, ProvenanceEntry } from '../../core/entities/MergedEntity.js';

export const REQUIRED_FIELDS: Record<EntityType, readonly string[]> = {
  company: ['name', 'website', 'industry', 'location', 'description'],
  investor: ['name', 'aum', 'website', 'location', 'investorCategory'],
};

const CONFIDENCE_WEIGHT: Record<ConfidenceLevel, number> = { high: 3, medium: 2, low: 1 };

// Ranks below this count as top tier
const TOP_TIER_RANKS = 2;
const SOURCE_TYPE_CAP = 3;

export function isPopulated(value: AttributeValue | undefined): value is AttributeValue {
  if (value === undefined) return false;
  return typeof value !== 'string' || value.trim().length > 0;
}

/**
 * Populated required fields as a rounded percentage
 */
export function computeCompleteness(entityType: EntityType, attributes: Readonly<Attributes>): number {
  const required = REQUIRED_FIELDS[entityType];
  const populated = required.filter((field) => isPopulated(attributes[field])).length;
  return Math.round((populated / required.length) * 100);
}

export function computeConfidence(distinctSourceTypes: number, hasTopTierSource: boolean, completeness: number): number {
  if (distinctSourceTypes === 0) return 0;
  const score =
    0.4 * (Math.min(distinctSourceTypes, SOURCE_TYPE_CAP) / SOURCE_TYPE_CAP) +
    0.3 * (hasTopTierSource ? 1 : 0) +
    0.3 * (completeness / 100);
  return Math.min(1, Math.max(0, Math.round(score * 1000) / 1000));
}

export interface SynthesizerOptions {
  /** Most reliable first; anything unlisted ranks after all of these */
  sourcePriority?: readonly SourceType[];
}

export interface FoldResult {
  entity: MergedEntity;
  isNew: boolean;
  changed: boolean;
}

/**
 * Per-field priority merge of candidate records into one entity.
 *
 * Every field takes the value of its best record: lowest source rank, then
 * higher confidence, then the smaller record id. Because that choice depends
 * only on the set of records, merge results do not depend on arrival order.
 */
export class Synthesizer {
  private readonly priority: readonly SourceType[];

  constructor(options: SynthesizerOptions = {}) {
    this.priority = options.sourcePriority && options.sourcePriority.length > 0 ? options.sourcePriority : SOURCE_TYPES;
  }

  rankOf(sourceType: SourceType): number {
    const index = this.priority.indexOf(sourceType);
    return index === -1 ? this.priority.length : index;
  }

  /**
   * Fold one record into an entity; a record id already present is a no-op
   */
  merge(existing: MergedEntity | null, record: CandidateRecord): MergedEntity {
    if (!existing) {
      return this.build(record.normalizedKey, record.entityType, [record]);
    }
    if (existing.records.some((r) => r.id === record.id)) {
      return existing;
    }
    return this.build(existing.normalizedKey, existing.entityType, [...existing.records, record]);
  }

  /**
   * Fold a job's entity into the stored one with the same key
   */
  fold(stored: MergedEntity | null, incoming: MergedEntity): FoldResult {
    if (!stored) {
      return { entity: incoming, isNew: true, changed: true };
    }
    const known = new Set(stored.records.map((r) => r.id));
    const added = incoming.records.filter((r) => !known.has(r.id));
    if (added.length === 0) {
      return { entity: stored, isNew: false, changed: false };
    }
    return {
      entity: this.build(stored.normalizedKey, stored.entityType, [...stored.records, ...added]),
      isNew: false,
      changed: true,
    };
  }

  /**
   * The record that outranks every other; its normalized name keys the group
   */
  leadRecord(records: readonly CandidateRecord[]): CandidateRecord | undefined {
    return records.reduce<CandidateRecord | undefined>(
      (lead, record) => (!lead || this.outranks(record, lead) ? record : lead),
      undefined
    );
  }

  build(normalizedKey: string, entityType: EntityType, records: readonly CandidateRecord[]): MergedEntity {
    const unique = new Map<string, CandidateRecord>();
    for (const record of records) {
      if (!unique.has(record.id)) unique.set(record.id, record);
    }
    const ordered = Array.from(unique.values()).sort((a, b) => compareStrings(a.id, b.id));

    const winners = new Map<string, { value: AttributeValue; record: CandidateRecord }>();
    for (const record of ordered) {
      for (const [field, value] of fieldsOf(record)) {
        if (!isPopulated(value)) continue;
        const current = winners.get(field);
        if (!current || this.outranks(record, current.record)) {
          winners.set(field, { value, record });
        }
      }
    }

    const attributes: Attributes = {};
    const provenance: ProvenanceEntry[] = [];
    for (const field of Array.from(winners.keys()).sort(compareStrings)) {
      const winner = winners.get(field);
      if (!winner) continue;
      attributes[field] = winner.value;
      provenance.push({
        field,
        value: winner.value,
        recordId: winner.record.id,
        sourceType: winner.record.sourceType,
        ...(winner.record.sourceUrl ? { sourceUrl: winner.record.sourceUrl } : {}),
        sourceRank: this.rankOf(winner.record.sourceType),
      });
    }

    const sourceTypes = new Set(ordered.map((r) => r.sourceType));
    const completeness = ordered.length === 0 ? 0 : computeCompleteness(entityType, attributes);
    const hasTopTier = Array.from(sourceTypes).some((type) => this.rankOf(type) < TOP_TIER_RANKS);

    return {
      normalizedKey,
      entityType,
      attributes,
      provenance,
      completeness,
      confidence: computeConfidence(sourceTypes.size, hasTopTier, completeness),
      sourceCount: sourceTypes.size,
      records: ordered,
    };
  }

  private outranks(challenger: CandidateRecord, holder: CandidateRecord): boolean {
    const rankDelta = this.rankOf(challenger.sourceType) - this.rankOf(holder.sourceType);
    if (rankDelta !== 0) return rankDelta < 0;
    const confidenceDelta = CONFIDENCE_WEIGHT[challenger.confidence] - CONFIDENCE_WEIGHT[holder.confidence];
    if (confidenceDelta !== 0) return confidenceDelta > 0;
    return compareStrings(challenger.id, holder.id) < 0;
  }
}

function fieldsOf(record: CandidateRecord): Array<[string, AttributeValue]> {
  return [['name', record.rawName], ...Object.entries(record.attributes).filter(([field]) => field !== 'name')];
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
