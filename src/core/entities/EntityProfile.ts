import { Attributes, EntityType } from './CandidateRecord.js';

/**
 * What is known about a research target before any strategy runs
 */
export interface EntityProfile {
  targetIdentity: string;
  targetType: EntityType;
  attributes: Attributes;
}
