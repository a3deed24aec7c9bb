import { Attributes, AttributeValue, CandidateRecord, EntityType, SourceType } from './CandidateRecord.js';

/**
 * Which record supplied the accepted value of one field
 */
export interface ProvenanceEntry {
  field: string;
  value: AttributeValue;
  recordId: string;
  sourceType: SourceType;
  sourceUrl?: string;
  sourceRank: number;
}

/**
 * Merged entity domain entity
 */
export interface MergedEntity {
  normalizedKey: string;
  entityType: EntityType;
  attributes: Attributes;
  provenance: ProvenanceEntry[];
  completeness: number; // 0-100
  confidence: number; // 0.0-1.0
  sourceCount: number;
  records: CandidateRecord[];
}
