import Database from 'better-sqlite3';
import { z } from 'zod';
import { JOB_STATUSES, JobSnapshot, STAGE_ORDER } from '../../../core/entities/Job.js';
import { IJobRepository } from '../../../core/interfaces/IJobRepository.js';

interface JobRow {
  job_id: string;
  query: string;
  status: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  progress: string;
  result: string | null;
  error: string | null;
  retry_count: number;
  max_retries: number;
  attempt: number;
  cancellation_requested: number;
  idempotency_key: string | null;
}

interface HistoryRow {
  timestamp: string;
  stage: string;
  success: number;
  details: string;
  attempt: number;
}

const isoDate = z.string().transform((value) => new Date(value));

const ProgressSchema = z.object({
  currentStage: z.enum(STAGE_ORDER),
  stagesCompleted: z.array(z.enum(STAGE_ORDER)),
  completedStages: z.number().int(),
  totalStages: z.number().int().positive(),
  percentage: z.number(),
  currentOperation: z.string(),
  lastUpdated: isoDate,
});

const HistorySchema = z.object({
  timestamp: isoDate,
  stage: z.enum(STAGE_ORDER),
  success: z.number().transform((value) => value !== 0),
  details: z.string(),
  attempt: z.number().int(),
});

/**
 * SQLite implementation of job repository.
 *
 * The execution history is append-only, so saving a job only inserts the
 * history records the table does not have yet.
 */
export class JobRepository implements IJobRepository {
  constructor(private db: Database.Database) {}

  saveJob(job: JobSnapshot): void {
    const upsert = this.db.prepare(`
      INSERT INTO jobs (
        job_id, query, status, created_at, started_at, completed_at, progress, result, error,
        retry_count, max_retries, attempt, cancellation_requested, idempotency_key
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(job_id) DO UPDATE SET
        status = excluded.status,
        started_at = excluded.started_at,
        completed_at = excluded.completed_at,
        progress = excluded.progress,
        result = excluded.result,
        error = excluded.error,
        retry_count = excluded.retry_count,
        max_retries = excluded.max_retries,
        attempt = excluded.attempt,
        cancellation_requested = excluded.cancellation_requested,
        idempotency_key = excluded.idempotency_key
    `);
    const countHistory = this.db.prepare<[string], { count: number }>(
      'SELECT COUNT(*) as count FROM job_history WHERE job_id = ?'
    );
    const insertHistory = this.db.prepare(`
      INSERT INTO job_history (job_id, timestamp, stage, success, details, attempt)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const save = this.db.transaction((snapshot: JobSnapshot) => {
      upsert.run(
        snapshot.jobId,
        snapshot.query,
        snapshot.status,
        snapshot.createdAt.toISOString(),
        snapshot.startedAt ? snapshot.startedAt.toISOString() : null,
        snapshot.completedAt ? snapshot.completedAt.toISOString() : null,
        JSON.stringify(snapshot.progress),
        snapshot.result ? JSON.stringify(snapshot.result) : null,
        snapshot.error ?? null,
        snapshot.retryCount,
        snapshot.maxRetries,
        snapshot.attempt,
        snapshot.cancellationRequested ? 1 : 0,
        snapshot.idempotencyKey ?? null
      );

      const stored = countHistory.get(snapshot.jobId)?.count ?? 0;
      for (const record of snapshot.executionHistory.slice(stored)) {
        insertHistory.run(
          snapshot.jobId,
          record.timestamp.toISOString(),
          record.stage,
          record.success ? 1 : 0,
          record.details,
          record.attempt
        );
      }
    });

    save(job);
  }

  loadJob(jobId: string): JobSnapshot | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE job_id = ?').get(jobId);
    return row ? this.toSnapshot(row) : null;
  }

  /**
   * All jobs in creation order
   */
  getAllJobs(): JobSnapshot[] {
    const rows = this.db
      .prepare<[], JobRow>('SELECT * FROM jobs ORDER BY created_at ASC, rowid ASC')
      .all();
    return rows.map((row) => this.toSnapshot(row));
  }

  deleteJob(jobId: string): void {
    this.db.prepare('DELETE FROM jobs WHERE job_id = ?').run(jobId);
  }

  private loadHistory(jobId: string) {
    const rows = this.db
      .prepare<[string], HistoryRow>(
        'SELECT timestamp, stage, success, details, attempt FROM job_history WHERE job_id = ? ORDER BY id'
      )
      .all(jobId);
    return rows.map((row) => HistorySchema.parse(row));
  }

  private toSnapshot(row: JobRow): JobSnapshot {
    const result: unknown = row.result ? JSON.parse(row.result) : undefined;
    return {
      jobId: row.job_id,
      query: row.query,
      status: z.enum(JOB_STATUSES).parse(row.status),
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : undefined,
      completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
      progress: ProgressSchema.parse(JSON.parse(row.progress)),
      result: z.record(z.unknown()).optional().parse(result),
      error: row.error ?? undefined,
      retryCount: row.retry_count,
      maxRetries: row.max_retries,
      attempt: row.attempt,
      cancellationRequested: row.cancellation_requested !== 0,
      idempotencyKey: row.idempotency_key ?? undefined,
      executionHistory: this.loadHistory(row.job_id),
    };
  }
}
