import { AuditReport } from '../../core/entities/AuditEntry.js';
import {
  ExecutionRecord,
  JobCreateOptions,
  JobListOptions,
  JobSnapshot,
  JobStatistics,
  toJobView,
} from '../../core/entities/Job.js';
import { InvalidStateError } from '../../core/errors.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import { buildAuditReport } from '../../infrastructure/audit/auditReport.js';
import { JobRegistry } from '../../infrastructure/queue/JobRegistry.js';
import { JobScheduler, SchedulerStatistics } from '../../infrastructure/queue/JobScheduler.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('JobService');

export interface CreateJobResult {
  job: JobSnapshot;
  /** False when an existing job was returned for the idempotency key */
  created: boolean;
}

export interface ServiceStatistics {
  jobs: JobStatistics;
  scheduler: SchedulerStatistics;
}

/**
 * Service for managing job operations. Shared by the REST API and the MCP
 * tools; NotFoundError and InvalidStateError propagate to the caller.
 */
export class JobService {
  private cleanupTimer?: NodeJS.Timeout;
  private unsubscribe: () => void;

  constructor(
    private registry: JobRegistry,
    private scheduler: JobScheduler,
    private auditLog: IAuditLog
  ) {
    this.unsubscribe = this.registry.onJobUpdate((event) => {
      if (event.type === 'deleted') {
        this.auditLog.forget(event.jobId);
      }
    });
  }

  /**
   * Create a job and schedule it in the background
   */
  createJob(query: string, options: JobCreateOptions = {}): CreateJobResult {
    const job = this.registry.create(query, options);
    // A deduplicated create returns a running or completed job, never a pending one
    const created = job.status === 'pending';

    if (created) {
      log.info(`Created job ${job.jobId}`);
      void this.auditLog.log(job.jobId, 'status', 'Job created', { query });
      this.scheduler.schedule(job.jobId);
    } else {
      log.info(`Idempotency key matched existing job ${job.jobId} (${job.status})`);
    }
    return { job, created };
  }

  getJob(jobId: string): JobSnapshot {
    return this.registry.require(jobId);
  }

  findJob(jobId: string): JobSnapshot | null {
    return this.registry.get(jobId);
  }

  listJobs(options: JobListOptions = {}): JobSnapshot[] {
    return this.registry.list(options);
  }

  /**
   * Request cancellation of a running job. The runner stops at its next
   * checkpoint.
   */
  cancelJob(jobId: string): JobSnapshot {
    const job = this.registry.require(jobId);
    if (!this.registry.requestCancel(jobId)) {
      throw new InvalidStateError(jobId, job.status, 'cancel');
    }

    log.info(`Cancellation requested for job ${jobId}`);
    void this.auditLog.log(jobId, 'warning', 'Cancellation requested');
    return this.registry.require(jobId);
  }

  /**
   * Reset a failed or cancelled job and schedule it again
   */
  retryJob(jobId: string): JobSnapshot {
    const job = this.registry.requestRetry(jobId);
    log.info(`Manual retry requested for job ${jobId}`);
    void this.auditLog.log(jobId, 'status', 'Manual retry requested');
    if (!this.scheduler.reschedule(jobId)) {
      log.warn(`Job ${jobId} reset for retry but the scheduler refused it`);
    }
    return job;
  }

  deleteJob(jobId: string): void {
    this.registry.delete(jobId);
    log.info(`Deleted job ${jobId}`);
  }

  getExecutionHistory(jobId: string): ExecutionRecord[] {
    return this.registry.getExecutionHistory(jobId);
  }

  getStatistics(): ServiceStatistics {
    return {
      jobs: this.registry.getStatistics(),
      scheduler: this.scheduler.getStatistics(),
    };
  }

  /**
   * Audit report of a job's session, read back from the audit file
   */
  async getAuditReport(jobId: string): Promise<AuditReport> {
    const job = this.registry.require(jobId);
    const entries = await this.auditLog.readSession(jobId);
    return buildAuditReport(jobId, entries, { ...toJobView(job) });
  }

  cleanupExpired(maxAgeHours: number): number {
    const removed = this.registry.cleanupExpired(maxAgeHours * 60 * 60 * 1000);
    if (removed > 0) {
      log.info(`Cleaned up ${removed} expired jobs`);
    }
    return removed;
  }

  /**
   * Schedule jobs that were pending or waiting for a retry when the process
   * last stopped
   */
  restoreIncompleteJobs(): number {
    const incomplete = this.registry
      .list()
      .filter((job) => job.status === 'pending' || job.status === 'retry');

    if (incomplete.length > 0) {
      log.warn(`Restoring ${incomplete.length} incomplete jobs from database...`);
    }
    for (const job of incomplete) {
      this.scheduler.schedule(job.jobId);
    }
    return incomplete.length;
  }

  startCleanupSweep(intervalMinutes: number, maxAgeHours: number): void {
    this.stopCleanupSweep();
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpired(maxAgeHours);
    }, intervalMinutes * 60 * 1000);
    this.cleanupTimer.unref();
  }

  stopCleanupSweep(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  /**
   * Stop the cleanup sweep and the scheduler, then flush audit writes
   */
  async shutdown(): Promise<void> {
    this.stopCleanupSweep();
    this.unsubscribe();
    await this.scheduler.shutdown();
    await this.auditLog.flush();
  }
}
