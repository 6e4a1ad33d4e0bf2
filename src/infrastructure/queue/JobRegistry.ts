import { randomUUID } from 'crypto';
import {
  ExecutionRecord,
  JobCreateOptions,
  JobListOptions,
  JobRecord,
  JobSnapshot,
  JobStage,
  JobStatistics,
  JobStatus,
  isTerminalStatus,
  snapshotJob,
} from '../../core/entities/Job.js';
import { ProgressSnapshot, ProgressTracker } from '../../core/entities/ProgressTracker.js';
import { InvalidStateError, NotFoundError } from '../../core/errors.js';
import { IJobRepository } from '../../core/interfaces/IJobRepository.js';
import { CancellationToken } from '../../core/interfaces/IStageHandler.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('JobRegistry');

export const DEFAULT_MAX_RETRIES = 3;

export type JobUpdateType = 'created' | 'status' | 'progress' | 'cancel_requested' | 'deleted';

export interface JobUpdateEvent {
  type: JobUpdateType;
  jobId: string;
  status: JobStatus;
  progress: ProgressSnapshot;
}

export type JobUpdateListener = (event: JobUpdateEvent) => void;

export interface JobRegistryOptions {
  defaultMaxRetries?: number;
  repository?: IJobRepository;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * Owns every job record of the process.
 *
 * Each public method is synchronous and never awaits, so it runs to
 * completion on the event loop before any other caller can observe the job:
 * one method call is one critical section. Reads hand out detached
 * snapshots, never the records themselves.
 */
export class JobRegistry {
  private jobs: Map<string, JobRecord> = new Map();
  private listeners: Set<JobUpdateListener> = new Set();
  private readonly defaultMaxRetries: number;
  private readonly repository?: IJobRepository;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: JobRegistryOptions = {}) {
    this.defaultMaxRetries = options.defaultMaxRetries ?? DEFAULT_MAX_RETRIES;
    this.repository = options.repository;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());

    if (this.repository) {
      this.loadJobsFromRepository(this.repository);
    }
  }

  /**
   * Load persisted jobs. A job persisted while running did not survive the
   * restart and comes back as a retry.
   */
  private loadJobsFromRepository(repository: IJobRepository): void {
    try {
      const stored = repository.getAllJobs();
      for (const snapshot of stored) {
        const job = this.restore(snapshot);
        if (job.status === 'running') {
          job.status = 'retry';
          job.error = 'Interrupted by process restart';
          this.persist(job);
        }
        this.jobs.set(job.jobId, job);
      }
      log.info(`Loaded ${stored.length} jobs from database`);
    } catch (error) {
      log.error('Error loading jobs from database:', error);
    }
  }

  private restore(snapshot: JobSnapshot): JobRecord {
    return {
      jobId: snapshot.jobId,
      query: snapshot.query,
      status: snapshot.status,
      createdAt: snapshot.createdAt,
      startedAt: snapshot.startedAt,
      completedAt: snapshot.completedAt,
      progress: ProgressTracker.restore(snapshot.progress),
      result: snapshot.result,
      error: snapshot.error,
      retryCount: snapshot.retryCount,
      maxRetries: snapshot.maxRetries,
      attempt: snapshot.attempt,
      cancellationRequested: snapshot.cancellationRequested,
      idempotencyKey: snapshot.idempotencyKey,
      executionHistory: [...snapshot.executionHistory],
    };
  }

  /**
   * Create a job, or return the running/completed job already holding the
   * same idempotency key
   */
  create(query: string, options: JobCreateOptions = {}): JobSnapshot {
    const { idempotencyKey } = options;
    if (idempotencyKey) {
      for (const existing of this.jobs.values()) {
        if (
          existing.idempotencyKey === idempotencyKey &&
          (existing.status === 'running' || existing.status === 'completed')
        ) {
          log.debug(`Idempotency key ${idempotencyKey} matched job ${existing.jobId}`);
          return snapshotJob(existing);
        }
      }
    }

    let jobId = this.generateId();
    while (this.jobs.has(jobId)) {
      jobId = this.generateId();
    }

    const job: JobRecord = {
      jobId,
      query,
      status: 'pending',
      createdAt: this.now(),
      progress: new ProgressTracker(),
      retryCount: 0,
      maxRetries: options.maxRetries ?? this.defaultMaxRetries,
      attempt: 0,
      cancellationRequested: false,
      idempotencyKey,
      executionHistory: [],
    };

    this.jobs.set(jobId, job);
    this.commit(job, 'created');
    return snapshotJob(job);
  }

  get(jobId: string): JobSnapshot | null {
    const job = this.jobs.get(jobId);
    return job ? snapshotJob(job) : null;
  }

  /**
   * Like get, but unknown ids raise NotFoundError
   */
  require(jobId: string): JobSnapshot {
    return snapshotJob(this.find(jobId));
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Jobs in creation order, optionally filtered by status and truncated
   */
  list(options: JobListOptions = {}): JobSnapshot[] {
    const { status, limit } = options;
    const result: JobSnapshot[] = [];
    for (const job of this.jobs.values()) {
      if (limit !== undefined && result.length >= limit) break;
      if (status && job.status !== status) continue;
      result.push(snapshotJob(job));
    }
    return result;
  }

  /**
   * Set the status. startedAt is stamped on the first move into running,
   * completedAt on the first move into a terminal status.
   */
  updateStatus(jobId: string, status: JobStatus): void {
    const job = this.jobs.get(jobId);
    if (!job) return;

    this.applyStatus(job, status);
    this.commit(job, 'status');
  }

  private applyStatus(job: JobRecord, status: JobStatus): void {
    job.status = status;
    if (status === 'running' && !job.startedAt) {
      job.startedAt = this.now();
    } else if (isTerminalStatus(status) && !job.completedAt) {
      job.completedAt = this.now();
    }
  }

  updateProgress(jobId: string, stage: JobStage, operation: string = ''): void {
    const job = this.jobs.get(jobId);
    if (!job) return;

    job.progress.update(stage, operation);
    this.commit(job, 'progress');
  }

  /**
   * Take a pending or retrying job for execution. Returns null when the job
   * is unknown, already running or terminal, so a job never runs twice at
   * the same time.
   */
  claim(jobId: string): JobSnapshot | null {
    const job = this.jobs.get(jobId);
    if (!job || (job.status !== 'pending' && job.status !== 'retry')) {
      return null;
    }

    if (job.status === 'retry') {
      job.progress = new ProgressTracker(job.progress.totalStages);
    }
    job.attempt += 1;
    this.applyStatus(job, 'running');
    this.commit(job, 'status');
    return snapshotJob(job);
  }

  /**
   * Flag a running job for cancellation. The runner observes the flag at its
   * next checkpoint.
   */
  requestCancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'running') {
      return false;
    }

    job.cancellationRequested = true;
    this.commit(job, 'cancel_requested');
    return true;
  }

  isCancelRequested(jobId: string): boolean {
    return this.jobs.get(jobId)?.cancellationRequested ?? false;
  }

  cancellationToken(jobId: string): CancellationToken {
    const registry = this;
    return {
      get isCancellationRequested() {
        return registry.isCancelRequested(jobId);
      },
    };
  }

  /**
   * Store the result and move to completed. A job that is already terminal
   * is left untouched, so completing twice keeps the first result and
   * completedAt.
   */
  markCompleted(jobId: string, result: Record<string, unknown>): boolean {
    const job = this.jobs.get(jobId);
    if (!job || isTerminalStatus(job.status)) {
      return false;
    }

    job.result = result;
    job.error = undefined;
    job.progress.complete();
    this.applyStatus(job, 'completed');
    this.commit(job, 'status');
    return true;
  }

  /**
   * Record a failure. With retries left the job moves to retry and stays
   * runnable; otherwise it ends failed. Returns the resulting status.
   */
  markFailed(jobId: string, error: string, allowRetry: boolean = true): JobStatus | null {
    const job = this.jobs.get(jobId);
    if (!job) return null;

    job.error = error;
    if (allowRetry && job.retryCount < job.maxRetries) {
      job.retryCount += 1;
      job.status = 'retry';
    } else {
      job.result = undefined;
      this.applyStatus(job, 'failed');
    }
    this.commit(job, 'status');
    return job.status;
  }

  /**
   * Manual retry of a failed or cancelled job. Progress restarts from zero;
   * the execution history is kept.
   */
  requestRetry(jobId: string): JobSnapshot {
    const job = this.find(jobId);
    if (job.status !== 'failed' && job.status !== 'cancelled') {
      throw new InvalidStateError(jobId, job.status, 'retry');
    }

    job.status = 'pending';
    job.error = undefined;
    job.result = undefined;
    job.completedAt = undefined;
    job.cancellationRequested = false;
    job.retryCount = 0;
    job.progress = new ProgressTracker(job.progress.totalStages);
    this.commit(job, 'status');
    return snapshotJob(job);
  }

  recordExecution(jobId: string, stage: JobStage, success: boolean, details: string = ''): void {
    const job = this.jobs.get(jobId);
    if (!job) return;

    job.executionHistory.push({
      timestamp: this.now(),
      stage,
      success,
      details,
      attempt: job.attempt,
    });
    this.persist(job);
  }

  getExecutionHistory(jobId: string): ExecutionRecord[] {
    return [...this.require(jobId).executionHistory];
  }

  delete(jobId: string): void {
    const job = this.find(jobId);
    if (job.status === 'running') {
      throw new InvalidStateError(jobId, job.status, 'delete');
    }
    this.remove(job);
  }

  /**
   * Remove terminal jobs that completed more than maxAgeMs ago
   */
  cleanupExpired(maxAgeMs: number): number {
    const cutoff = this.now().getTime() - maxAgeMs;
    const expired = [...this.jobs.values()].filter(
      (job) =>
        isTerminalStatus(job.status) && job.completedAt !== undefined && job.completedAt.getTime() < cutoff
    );

    for (const job of expired) {
      this.remove(job);
    }
    return expired.length;
  }

  getStatistics(): JobStatistics {
    const stats: JobStatistics = {
      total: this.jobs.size,
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      retry: 0,
    };
    for (const job of this.jobs.values()) {
      stats[job.status] += 1;
    }
    return stats;
  }

  /**
   * Subscribe to job changes. Returns the unsubscribe function.
   */
  onJobUpdate(listener: JobUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private find(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  private remove(job: JobRecord): void {
    this.jobs.delete(job.jobId);
    if (this.repository) {
      try {
        this.repository.deleteJob(job.jobId);
      } catch (error) {
        log.error(`Failed to delete job ${job.jobId} from database:`, error);
      }
    }
    this.notify(job, 'deleted');
  }

  private commit(job: JobRecord, type: JobUpdateType): void {
    this.persist(job);
    this.notify(job, type);
  }

  private persist(job: JobRecord): void {
    if (!this.repository) return;
    try {
      this.repository.saveJob(snapshotJob(job));
    } catch (error) {
      log.error(`Failed to persist job ${job.jobId} to database:`, error);
    }
  }

  private notify(job: JobRecord, type: JobUpdateType): void {
    if (this.listeners.size === 0) return;

    const event: JobUpdateEvent = {
      type,
      jobId: job.jobId,
      status: job.status,
      progress: job.progress.snapshot(),
    };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error(`Job update listener failed for ${job.jobId}:`, error);
      }
    }
  }
}
