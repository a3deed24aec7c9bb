import { EntityType } from '../entities/CandidateRecord.js';
import { MergedEntity } from '../entities/MergedEntity.js';

/**
 * Interface for merged entity persistence
 */
export interface IEntityRepository {
  /**
   * Entities are keyed by normalized name and type. Without a type, the first
   * type stored under the key is returned.
   */
  getByKey(normalizedKey: string, entityType?: EntityType): MergedEntity | null;

  getAll(): MergedEntity[];

  upsert(entity: MergedEntity): void;

  count(): number;
}
