import { ExecutionOutcome } from '../../application/services/StageRunner.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { RetryConfig, computeBackoffDelay } from '../../utils/retry.js';
import { JobRegistry } from './JobRegistry.js';

const log = createLogger('JobScheduler');

/**
 * Anything that can execute a claimed job (the StageRunner in production)
 */
export interface JobExecutor {
  execute(jobId: string): Promise<ExecutionOutcome>;
}

export type BackoffConfig = Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'>;

export interface JobSchedulerOptions {
  maxConcurrent?: number;
  backoff?: BackoffConfig;
}

export interface SchedulerStatistics {
  queued: number;
  running: number;
  waitingForRetry: number;
  maxConcurrent: number;
}

/**
 * Runs jobs in the background with bounded concurrency.
 *
 * A job id is held in at most one of queued, running or waiting-for-retry at
 * any time. Jobs that come back as `retry` are scheduled again after an
 * exponential backoff.
 */
export class JobScheduler {
  private pending: string[] = [];
  private running: Map<string, Promise<void>> = new Map();
  private backoffTimers: Map<string, NodeJS.Timeout> = new Map();
  private rerunRequested: Set<string> = new Set();
  private idleWaiters: Array<() => void> = [];
  private accepting = true;
  private readonly maxConcurrent: number;
  private readonly backoff: BackoffConfig;

  /**
   * Called after every execution, whatever its outcome
   */
  jobFinishedCallback?: (outcome: ExecutionOutcome) => void;

  constructor(
    private registry: JobRegistry,
    private executor: JobExecutor,
    options: JobSchedulerOptions = {}
  ) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 3);
    this.backoff = options.backoff ?? { initialDelayMs: 1000, maxDelayMs: 8000, multiplier: 2 };
  }

  /**
   * Queue a job for execution. Returns false when the scheduler is shut down
   * or the job is already queued, running or waiting for its retry.
   */
  schedule(jobId: string): boolean {
    if (!this.accepting) {
      log.warn(`Scheduler is shut down, job ${jobId} not scheduled`);
      return false;
    }
    if (this.isTracked(jobId)) {
      log.debug(`Job ${jobId} already scheduled`);
      return false;
    }

    this.pending.push(jobId);
    this.processQueue();
    return true;
  }

  /**
   * Queue a job whose state was reset for another run (manual retry).
   * While its previous run is still settling, the job is queued again as
   * soon as that run ends. Returns false only when the scheduler is shut
   * down or the job is waiting on a backoff timer.
   */
  reschedule(jobId: string): boolean {
    if (this.accepting && this.running.has(jobId)) {
      log.debug(`Job ${jobId} still settling, rerun requested`);
      this.rerunRequested.add(jobId);
      return true;
    }
    if (this.pending.includes(jobId)) {
      return true;
    }
    return this.schedule(jobId);
  }

  isTracked(jobId: string): boolean {
    return this.pending.includes(jobId) || this.running.has(jobId) || this.backoffTimers.has(jobId);
  }

  /**
   * Resolves once nothing is queued, running or waiting for a retry
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting work and drop queued jobs and pending retries.
   * Executions already in flight are awaited.
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    for (const timer of this.backoffTimers.values()) {
      clearTimeout(timer);
    }
    this.backoffTimers.clear();
    this.rerunRequested.clear();
    this.pending = [];

    await Promise.all(this.running.values());
    this.notifyIfIdle();
    log.info('Scheduler stopped');
  }

  getStatistics(): SchedulerStatistics {
    return {
      queued: this.pending.length,
      running: this.running.size,
      waitingForRetry: this.backoffTimers.size,
      maxConcurrent: this.maxConcurrent,
    };
  }

  private processQueue(): void {
    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const jobId = this.pending.shift();
      if (jobId === undefined) break;

      const run = this.run(jobId).finally(() => {
        this.running.delete(jobId);
        if (this.rerunRequested.delete(jobId) && this.accepting && !this.isTracked(jobId)) {
          this.pending.push(jobId);
        }
        this.processQueue();
        this.notifyIfIdle();
      });
      this.running.set(jobId, run);
    }
  }

  private async run(jobId: string): Promise<void> {
    let outcome: ExecutionOutcome;
    try {
      outcome = await this.executor.execute(jobId);
    } catch (error) {
      log.error(`Unexpected error while executing job ${jobId}: ${errorMessage(error)}`, error);
      return;
    }

    if (outcome.status === 'retry') {
      this.scheduleRetry(jobId);
    }

    if (this.jobFinishedCallback) {
      try {
        this.jobFinishedCallback(outcome);
      } catch (error) {
        log.error(`Job finished callback failed for ${jobId}:`, error);
      }
    }
  }

  private scheduleRetry(jobId: string): void {
    if (!this.accepting) return;

    const job = this.registry.get(jobId);
    if (!job || job.status !== 'retry') return;

    const delay = computeBackoffDelay(job.retryCount, this.backoff);
    log.info(`Retrying job ${jobId} in ${delay}ms (retry ${job.retryCount}/${job.maxRetries})`);

    const timer = setTimeout(() => {
      this.backoffTimers.delete(jobId);
      if (!this.accepting) return;
      this.pending.push(jobId);
      this.processQueue();
      this.notifyIfIdle();
    }, delay);
    this.backoffTimers.set(jobId, timer);
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.running.size === 0 && this.backoffTimers.size === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
