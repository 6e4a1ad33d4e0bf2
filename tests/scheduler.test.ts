import { ExecutionOutcome } from '../src/application/services/StageRunner.js';
import { JobRegistry } from '../src/infrastructure/queue/JobRegistry.js';
import { JobExecutor, JobScheduler } from '../src/infrastructure/queue/JobScheduler.js';

interface Deferred {
  promise: Promise<ExecutionOutcome>;
  resolve: (outcome: ExecutionOutcome) => void;
}

function deferred(): Deferred {
  let resolve: (outcome: ExecutionOutcome) => void = () => undefined;
  const promise = new Promise<ExecutionOutcome>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const completed = (jobId: string): ExecutionOutcome => ({ status: 'completed', jobId, result: {} });

/**
 * Executor whose runs finish only when the test says so
 */
class ManualExecutor implements JobExecutor {
  started: string[] = [];
  private runs: Map<string, Deferred> = new Map();

  execute(jobId: string): Promise<ExecutionOutcome> {
    this.started.push(jobId);
    const run = deferred();
    this.runs.set(jobId, run);
    return run.promise;
  }

  finish(jobId: string): void {
    this.runs.get(jobId)?.resolve(completed(jobId));
  }
}

describe('JobScheduler', () => {
  let registry: JobRegistry;

  beforeEach(() => {
    registry = new JobRegistry();
  });

  test('should run at most maxConcurrent jobs at once', async () => {
    const executor = new ManualExecutor();
    const scheduler = new JobScheduler(registry, executor, { maxConcurrent: 2 });

    scheduler.schedule('a');
    scheduler.schedule('b');
    scheduler.schedule('c');

    expect(executor.started).toEqual(['a', 'b']);
    expect(scheduler.getStatistics()).toEqual({ queued: 1, running: 2, waitingForRetry: 0, maxConcurrent: 2 });

    executor.finish('a');
    await flush();

    expect(executor.started).toEqual(['a', 'b', 'c']);
    expect(scheduler.getStatistics().running).toBe(2);

    executor.finish('b');
    executor.finish('c');
    await scheduler.drain();
    expect(scheduler.getStatistics()).toEqual({ queued: 0, running: 0, waitingForRetry: 0, maxConcurrent: 2 });
  });

  test('should refuse a job that is already tracked', () => {
    const executor = new ManualExecutor();
    const scheduler = new JobScheduler(registry, executor, { maxConcurrent: 1 });

    expect(scheduler.schedule('a')).toBe(true);
    expect(scheduler.schedule('a')).toBe(false);
    expect(scheduler.schedule('b')).toBe(true);
    expect(scheduler.schedule('b')).toBe(false);
    expect(scheduler.isTracked('b')).toBe(true);
    expect(executor.started).toEqual(['a']);

    executor.finish('a');
  });

  test('should run a job again when it is re-armed while its run settles', async () => {
    const executor = new ManualExecutor();
    const scheduler = new JobScheduler(registry, executor, { maxConcurrent: 1 });

    scheduler.schedule('a');
    expect(scheduler.schedule('a')).toBe(false);
    expect(scheduler.reschedule('a')).toBe(true);
    expect(scheduler.getStatistics()).toEqual({ queued: 0, running: 1, waitingForRetry: 0, maxConcurrent: 1 });

    executor.finish('a');
    await flush();
    expect(executor.started).toEqual(['a', 'a']);

    executor.finish('a');
    await scheduler.drain();
    expect(executor.started).toEqual(['a', 'a']);
    expect(scheduler.isTracked('a')).toBe(false);
  });

  test('should queue a re-armed job only once', () => {
    const executor = new ManualExecutor();
    const scheduler = new JobScheduler(registry, executor, { maxConcurrent: 1 });
    scheduler.schedule('a');

    expect(scheduler.reschedule('b')).toBe(true);
    expect(scheduler.reschedule('b')).toBe(true);

    expect(scheduler.getStatistics().queued).toBe(1);
    executor.finish('a');
  });

  test('should reschedule jobs that come back for retry', async () => {
    let calls = 0;
    const executor: JobExecutor = {
      async execute(jobId) {
        calls += 1;
        registry.claim(jobId);
        if (calls === 1) {
          registry.markFailed(jobId, 'temporary');
          return { status: 'retry', jobId, stage: 'report_generation', error: 'temporary' };
        }
        registry.markCompleted(jobId, { success: true });
        return completed(jobId);
      },
    };
    const scheduler = new JobScheduler(registry, executor, {
      backoff: { initialDelayMs: 10, maxDelayMs: 10, multiplier: 2 },
    });
    const job = registry.create('q');

    scheduler.schedule(job.jobId);
    await flush();
    expect(scheduler.getStatistics().waitingForRetry).toBe(1);
    expect(scheduler.isTracked(job.jobId)).toBe(true);

    await scheduler.drain();

    expect(calls).toBe(2);
    expect(registry.require(job.jobId).status).toBe('completed');
  });

  test('should report every outcome to the finished callback', async () => {
    const executor: JobExecutor = { execute: async (jobId) => completed(jobId) };
    const scheduler = new JobScheduler(registry, executor);
    const outcomes: ExecutionOutcome[] = [];
    scheduler.jobFinishedCallback = (outcome) => outcomes.push(outcome);

    scheduler.schedule('a');
    scheduler.schedule('b');
    await scheduler.drain();

    expect(outcomes.map((outcome) => outcome.jobId)).toEqual(['a', 'b']);
  });

  test('should survive an executor that throws', async () => {
    const executor: JobExecutor = {
      execute: async () => {
        throw new Error('unexpected');
      },
    };
    const scheduler = new JobScheduler(registry, executor);

    scheduler.schedule('a');
    await scheduler.drain();

    expect(scheduler.isTracked('a')).toBe(false);
  });

  test('should stop accepting work on shutdown and wait for running jobs', async () => {
    const executor = new ManualExecutor();
    const scheduler = new JobScheduler(registry, executor, { maxConcurrent: 1 });
    scheduler.schedule('a');
    scheduler.schedule('b');

    let stopped = false;
    const shutdown = scheduler.shutdown().then(() => {
      stopped = true;
    });
    await flush();
    expect(stopped).toBe(false);
    expect(scheduler.getStatistics().queued).toBe(0);

    executor.finish('a');
    await shutdown;

    expect(stopped).toBe(true);
    expect(executor.started).toEqual(['a']);
    expect(scheduler.schedule('c')).toBe(false);
  });
});
