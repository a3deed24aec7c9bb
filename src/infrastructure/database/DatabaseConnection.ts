import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Database connection manager. Pass ':memory:' for a throwaway database.
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = path.join('data', 'research.db')) {
    this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);

    if (this.dbPath !== ':memory:') {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        target_identity TEXT NOT NULL,
        target_type TEXT NOT NULL,
        target_attributes TEXT NOT NULL,
        strategy_override TEXT,
        status TEXT NOT NULL,
        planned TEXT NOT NULL,
        completed TEXT NOT NULL,
        errors TEXT NOT NULL,
        summary TEXT,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_job_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_job_created ON jobs(created_at);

      CREATE TABLE IF NOT EXISTS job_reasoning (
        job_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        timestamp TEXT NOT NULL,
        kind TEXT NOT NULL,
        inputs TEXT NOT NULL,
        outcome TEXT NOT NULL,
        PRIMARY KEY (job_id, seq),
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS strategy_attempts (
        job_id TEXT NOT NULL,
        strategy_id TEXT NOT NULL,
        priority INTEGER NOT NULL,
        outcome TEXT NOT NULL,
        requests_made INTEGER NOT NULL,
        record_count INTEGER NOT NULL,
        error_kind TEXT,
        error TEXT,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL,
        raw_output TEXT NOT NULL,
        PRIMARY KEY (job_id, strategy_id),
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS candidate_records (
        job_id TEXT NOT NULL,
        id TEXT NOT NULL,
        strategy_id TEXT NOT NULL,
        normalized_key TEXT NOT NULL,
        raw_name TEXT NOT NULL,
        entity_type TEXT NOT NULL,
        attributes TEXT NOT NULL,
        source_type TEXT NOT NULL,
        source_url TEXT,
        confidence TEXT NOT NULL,
        collected_at TEXT NOT NULL,
        PRIMARY KEY (job_id, id),
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_candidate_key ON candidate_records(normalized_key);

      CREATE TABLE IF NOT EXISTS merged_entities (
        normalized_key TEXT NOT NULL,
        entity_type TEXT NOT NULL,
        attributes TEXT NOT NULL,
        provenance TEXT NOT NULL,
        completeness INTEGER NOT NULL,
        confidence REAL NOT NULL,
        source_count INTEGER NOT NULL,
        records TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (normalized_key, entity_type)
      );
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    databaseSize: number;
    totalJobs: number;
    totalRecords: number;
    totalEntities: number;
    jobStats: Record<string, number>;
  } {
    const count = (table: 'jobs' | 'candidate_records' | 'merged_entities') =>
      this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    const jobStats: Record<string, number> = {};
    const rows = this.db
      .prepare<[], { status: string; count: number }>('SELECT status, COUNT(*) as count FROM jobs GROUP BY status')
      .all();
    for (const row of rows) {
      jobStats[row.status] = row.count;
    }

    return {
      databaseSize,
      totalJobs: count('jobs'),
      totalRecords: count('candidate_records'),
      totalEntities: count('merged_entities'),
      jobStats,
    };
  }
}

/**
 * Parse a JSON column, falling back when it is empty
 */
export function fromJson<T>(text: string | null | undefined, fallback: T): T {
  return text ? JSON.parse(text) : fallback;
}

// Global instance
let dbInstance: DatabaseConnection | null = null;

export function initializeDatabase(dbPath?: string): DatabaseConnection {
  if (!dbInstance) {
    dbInstance = new DatabaseConnection(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
