import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { JobStatistics } from '../../core/entities/Job.js';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * @param dbPath - file path relative to the working directory, or ':memory:'
   */
  constructor(dbPath: string = 'data/jobs.db') {
    if (dbPath === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      this.dbPath = path.resolve(process.cwd(), dbPath);

      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    // Enable WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        job_id TEXT PRIMARY KEY,
        query TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        progress TEXT NOT NULL,
        result TEXT,
        error TEXT,
        retry_count INTEGER NOT NULL DEFAULT 0,
        max_retries INTEGER NOT NULL DEFAULT 3,
        attempt INTEGER NOT NULL DEFAULT 0,
        cancellation_requested INTEGER NOT NULL DEFAULT 0,
        idempotency_key TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_job_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_job_created ON jobs(created_at);
      CREATE INDEX IF NOT EXISTS idx_job_idempotency ON jobs(idempotency_key);

      CREATE TABLE IF NOT EXISTS job_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        stage TEXT NOT NULL,
        success INTEGER NOT NULL,
        details TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        FOREIGN KEY (job_id) REFERENCES jobs(job_id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_job_history_job ON job_history(job_id);
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

  getStatistics(): { databaseSize: number; totalHistoryRecords: number; jobStats: JobStatistics } {
    const history = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM job_history')
      .get();

    const rows = this.db
      .prepare<[], { status: string; count: number }>(
        'SELECT status, COUNT(*) as count FROM jobs GROUP BY status'
      )
      .all();

    const jobStats: JobStatistics = {
      total: 0,
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      retry: 0,
    };
    for (const row of rows) {
      jobStats.total += row.count;
      switch (row.status) {
        case 'pending':
        case 'running':
        case 'completed':
        case 'failed':
        case 'cancelled':
        case 'retry':
          jobStats[row.status] += row.count;
          break;
      }
    }

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      databaseSize,
      totalHistoryRecords: history?.count ?? 0,
      jobStats,
    };
  }
}
