import Database from 'better-sqlite3';
import { IEntityRepository } from '../../../core/interfaces/IEntityRepository.js';
import { MergedEntity, ProvenanceEntry } from '../../../core/entities/MergedEntity.js';
import { Attributes, CandidateRecord, EntityType } from '../../../core/entities/CandidateRecord.js';
import { fromJson } from '../DatabaseConnection.js';

interface EntityRow {
  normalized_key: string;
  entity_type: EntityType;
  attributes: string;
  provenance: string;
  completeness: number;
  confidence: number;
  source_count: number;
  records: string;
  updated_at: string;
}

type StoredRecord = Omit<CandidateRecord, 'collectedAt'> & { collectedAt: string };

/**
 * SQLite implementation of merged entity repository
 */
export class EntityRepository implements IEntityRepository {
  constructor(private db: Database.Database) {}

  getByKey(normalizedKey: string, entityType?: EntityType): MergedEntity | null {
    const row = entityType
      ? this.db
          .prepare<[string, string], EntityRow>('SELECT * FROM merged_entities WHERE normalized_key = ? AND entity_type = ?')
          .get(normalizedKey, entityType)
      : this.db
          .prepare<[string], EntityRow>('SELECT * FROM merged_entities WHERE normalized_key = ? ORDER BY entity_type LIMIT 1')
          .get(normalizedKey);
    return row ? this.rowToEntity(row) : null;
  }

  getAll(): MergedEntity[] {
    return this.db
      .prepare<[], EntityRow>('SELECT * FROM merged_entities ORDER BY normalized_key, entity_type')
      .all()
      .map((row) => this.rowToEntity(row));
  }

  upsert(entity: MergedEntity): void {
    this.db
      .prepare(
        `
      INSERT INTO merged_entities (normalized_key, entity_type, attributes, provenance, completeness, confidence,
                                   source_count, records, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(normalized_key, entity_type) DO UPDATE SET
        attributes = excluded.attributes,
        provenance = excluded.provenance,
        completeness = excluded.completeness,
        confidence = excluded.confidence,
        source_count = excluded.source_count,
        records = excluded.records,
        updated_at = excluded.updated_at
    `
      )
      .run(
        entity.normalizedKey,
        entity.entityType,
        JSON.stringify(entity.attributes),
        JSON.stringify(entity.provenance),
        entity.completeness,
        entity.confidence,
        entity.sourceCount,
        JSON.stringify(entity.records),
        new Date().toISOString()
      );
  }

  count(): number {
    return this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM merged_entities').get()?.count ?? 0;
  }

  private rowToEntity(row: EntityRow): MergedEntity {
    const records: CandidateRecord[] = fromJson<StoredRecord[]>(row.records, []).map((record) =>
      Object.freeze({
        ...record,
        attributes: Object.freeze({ ...record.attributes }),
        collectedAt: new Date(record.collectedAt),
      })
    );

    return {
      normalizedKey: row.normalized_key,
      entityType: row.entity_type,
      attributes: fromJson<Attributes>(row.attributes, {}),
      provenance: fromJson<ProvenanceEntry[]>(row.provenance, []),
      completeness: row.completeness,
      confidence: row.confidence,
      sourceCount: row.source_count,
      records,
    };
  }
}
