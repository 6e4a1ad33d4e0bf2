import { InvalidStateError, NotFoundError } from '../src/core/errors.js';
import { JobRegistry, JobUpdateEvent } from '../src/infrastructure/queue/JobRegistry.js';

describe('JobRegistry', () => {
  let registry: JobRegistry;

  beforeEach(() => {
    registry = new JobRegistry();
  });

  describe('Job Creation', () => {
    test('should create a pending job with empty progress', () => {
      const job = registry.create('What is retrieval augmented generation?');

      expect(job.status).toBe('pending');
      expect(job.query).toBe('What is retrieval augmented generation?');
      expect(job.progress.percentage).toBe(0);
      expect(job.attempt).toBe(0);
      expect(job.retryCount).toBe(0);
      expect(job.maxRetries).toBe(3);
      expect(job.executionHistory).toEqual([]);
      expect(job.startedAt).toBeUndefined();
    });

    test('should use the per-job retry limit when given', () => {
      const job = registry.create('q', { maxRetries: 1 });
      expect(job.maxRetries).toBe(1);
    });

    test('should regenerate colliding ids', () => {
      const ids = ['job-1', 'job-1', 'job-2'];
      registry = new JobRegistry({ generateId: () => ids.shift() ?? 'job-x' });

      const first = registry.create('a');
      const second = registry.create('b');

      expect(first.jobId).toBe('job-1');
      expect(second.jobId).toBe('job-2');
    });
  });

  describe('Idempotency', () => {
    test('should return the running job holding the same key', () => {
      const first = registry.create('q', { idempotencyKey: 'key-1' });
      registry.claim(first.jobId);

      const second = registry.create('q', { idempotencyKey: 'key-1' });

      expect(second.jobId).toBe(first.jobId);
      expect(registry.getStatistics().total).toBe(1);
    });

    test('should return the completed job holding the same key', () => {
      const first = registry.create('q', { idempotencyKey: 'key-1' });
      registry.claim(first.jobId);
      registry.markCompleted(first.jobId, { success: true });

      const second = registry.create('q', { idempotencyKey: 'key-1' });

      expect(second.jobId).toBe(first.jobId);
      expect(second.status).toBe('completed');
    });

    test('should create a new job when the holder is pending or failed', () => {
      const pending = registry.create('q', { idempotencyKey: 'key-1' });
      const another = registry.create('q', { idempotencyKey: 'key-1' });
      expect(another.jobId).not.toBe(pending.jobId);

      const failed = registry.create('q', { idempotencyKey: 'key-2' });
      registry.claim(failed.jobId);
      registry.markFailed(failed.jobId, 'boom', false);
      const replacement = registry.create('q', { idempotencyKey: 'key-2' });
      expect(replacement.jobId).not.toBe(failed.jobId);
    });
  });

  describe('Lookup', () => {
    test('should return null for non-existent job', () => {
      expect(registry.get('non-existent-id')).toBeNull();
    });

    test('require should throw NotFoundError for non-existent job', () => {
      expect(() => registry.require('nope')).toThrow(NotFoundError);
      expect(() => registry.require('nope')).toThrow('Job nope not found');
    });

    test('should list jobs in creation order with filter and limit', () => {
      const a = registry.create('a');
      const b = registry.create('b');
      const c = registry.create('c');
      registry.claim(b.jobId);

      expect(registry.list().map((job) => job.jobId)).toEqual([a.jobId, b.jobId, c.jobId]);
      expect(registry.list({ status: 'pending' }).map((job) => job.jobId)).toEqual([a.jobId, c.jobId]);
      expect(registry.list({ limit: 2 }).map((job) => job.jobId)).toEqual([a.jobId, b.jobId]);
    });

    test('should hand out detached snapshots', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);
      registry.markCompleted(job.jobId, { report: 'original' });

      const snapshot = registry.require(job.jobId);
      const result = snapshot.result ?? {};
      result.report = 'changed';

      expect(registry.require(job.jobId).result).toEqual({ report: 'original' });
    });
  });

  describe('Claiming', () => {
    test('should move a pending job to running exactly once', () => {
      const job = registry.create('q');

      const claimed = registry.claim(job.jobId);
      expect(claimed?.status).toBe('running');
      expect(claimed?.attempt).toBe(1);
      expect(claimed?.startedAt).toBeInstanceOf(Date);

      expect(registry.claim(job.jobId)).toBeNull();
      expect(registry.require(job.jobId).attempt).toBe(1);
    });

    test('should refuse unknown and terminal jobs', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);
      registry.markCompleted(job.jobId, {});

      expect(registry.claim(job.jobId)).toBeNull();
      expect(registry.claim('missing')).toBeNull();
    });

    test('should reset progress when a retry is claimed', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);
      registry.updateProgress(job.jobId, 'initialization');
      registry.updateProgress(job.jobId, 'document_retrieval');
      registry.markFailed(job.jobId, 'boom');

      const claimed = registry.claim(job.jobId);

      expect(claimed?.progress.percentage).toBe(0);
      expect(claimed?.attempt).toBe(2);
    });
  });

  describe('Progress Tracking', () => {
    test('should only move progress forward', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);

      registry.updateProgress(job.jobId, 'initialization', 'Loading');
      expect(registry.require(job.jobId).progress.percentage).toBeCloseTo(100 / 7, 5);

      registry.updateProgress(job.jobId, 'document_retrieval', 'Searching');
      registry.updateProgress(job.jobId, 'initialization', 'Loading again');

      const progress = registry.require(job.jobId).progress;
      expect(progress.percentage).toBeCloseTo(200 / 7, 5);
      expect(progress.currentOperation).toBe('Loading again');
    });

    test('should ignore updates for unknown jobs', () => {
      expect(() => registry.updateProgress('missing', 'initialization')).not.toThrow();
    });
  });

  describe('Completion', () => {
    test('should keep the first result when completed twice', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);

      expect(registry.markCompleted(job.jobId, { answer: 1 })).toBe(true);
      const first = registry.require(job.jobId);

      expect(registry.markCompleted(job.jobId, { answer: 2 })).toBe(false);
      const second = registry.require(job.jobId);

      expect(second.result).toEqual({ answer: 1 });
      expect(second.completedAt).toEqual(first.completedAt);
      expect(second.progress.percentage).toBe(100);
    });
  });

  describe('Failure and Retry', () => {
    test('should retry up to maxRetries and then fail', () => {
      const job = registry.create('q', { maxRetries: 2 });

      registry.claim(job.jobId);
      expect(registry.markFailed(job.jobId, 'first')).toBe('retry');
      expect(registry.require(job.jobId).retryCount).toBe(1);

      registry.claim(job.jobId);
      expect(registry.markFailed(job.jobId, 'second')).toBe('retry');
      expect(registry.require(job.jobId).retryCount).toBe(2);

      registry.claim(job.jobId);
      expect(registry.markFailed(job.jobId, 'third')).toBe('failed');

      const failed = registry.require(job.jobId);
      expect(failed.retryCount).toBe(2);
      expect(failed.error).toBe('third');
      expect(failed.completedAt).toBeInstanceOf(Date);
      expect(failed.result).toBeUndefined();
    });

    test('should fail immediately when retry is not allowed', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);

      expect(registry.markFailed(job.jobId, 'fatal', false)).toBe('failed');
      expect(registry.require(job.jobId).retryCount).toBe(0);
    });

    test('markFailed should return null for unknown jobs', () => {
      expect(registry.markFailed('missing', 'x')).toBeNull();
    });

    test('manual retry should reset a failed job and keep its history', () => {
      const job = registry.create('q', { maxRetries: 0 });
      registry.claim(job.jobId);
      registry.recordExecution(job.jobId, 'initialization', false, 'broken');
      registry.markFailed(job.jobId, 'broken');

      const retried = registry.requestRetry(job.jobId);

      expect(retried.status).toBe('pending');
      expect(retried.error).toBeUndefined();
      expect(retried.completedAt).toBeUndefined();
      expect(retried.retryCount).toBe(0);
      expect(retried.progress.percentage).toBe(0);
      expect(retried.executionHistory).toHaveLength(1);
    });

    test('manual retry should be refused for active jobs', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);

      expect(() => registry.requestRetry(job.jobId)).toThrow(InvalidStateError);
      expect(() => registry.requestRetry(job.jobId)).toThrow('Cannot retry job with status: running');
    });
  });

  describe('Cancellation', () => {
    test('should only flag running jobs', () => {
      const job = registry.create('q');
      expect(registry.requestCancel(job.jobId)).toBe(false);

      registry.claim(job.jobId);
      const token = registry.cancellationToken(job.jobId);
      expect(token.isCancellationRequested).toBe(false);

      expect(registry.requestCancel(job.jobId)).toBe(true);
      expect(registry.isCancelRequested(job.jobId)).toBe(true);
      expect(token.isCancellationRequested).toBe(true);
      expect(registry.requestCancel('missing')).toBe(false);
    });
  });

  describe('Execution History', () => {
    test('should record entries with the current attempt', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);
      registry.recordExecution(job.jobId, 'initialization', true, 'ok');

      const history = registry.getExecutionHistory(job.jobId);
      expect(history).toHaveLength(1);
      expect(history[0]).toMatchObject({ stage: 'initialization', success: true, details: 'ok', attempt: 1 });
    });
  });

  describe('Deletion', () => {
    test('should refuse to delete a running job', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);

      expect(() => registry.delete(job.jobId)).toThrow('Cannot delete job with status: running');
      expect(registry.has(job.jobId)).toBe(true);
    });

    test('should delete a finished job', () => {
      const job = registry.create('q');
      registry.claim(job.jobId);
      registry.markCompleted(job.jobId, {});

      registry.delete(job.jobId);

      expect(registry.has(job.jobId)).toBe(false);
      expect(() => registry.delete(job.jobId)).toThrow(NotFoundError);
    });
  });

  describe('Cleanup', () => {
    test('should remove terminal jobs older than the max age', () => {
      let clock = new Date('2026-01-01T00:00:00.000Z');
      registry = new JobRegistry({ now: () => clock });

      const old = registry.create('old');
      registry.claim(old.jobId);
      registry.markCompleted(old.jobId, {});
      const waiting = registry.create('waiting');

      clock = new Date('2026-01-01T02:00:00.000Z');
      const recent = registry.create('recent');
      registry.claim(recent.jobId);
      registry.markFailed(recent.jobId, 'x', false);

      expect(registry.cleanupExpired(60 * 60 * 1000)).toBe(1);
      expect(registry.has(old.jobId)).toBe(false);
      expect(registry.has(waiting.jobId)).toBe(true);
      expect(registry.has(recent.jobId)).toBe(true);
    });
  });

  describe('Statistics and Events', () => {
    test('should count jobs per status', () => {
      const a = registry.create('a');
      registry.create('b');
      registry.claim(a.jobId);

      expect(registry.getStatistics()).toEqual({
        total: 2,
        pending: 1,
        running: 1,
        completed: 0,
        failed: 0,
        cancelled: 0,
        retry: 0,
      });
    });

    test('should notify listeners until unsubscribed', () => {
      const events: JobUpdateEvent[] = [];
      const unsubscribe = registry.onJobUpdate((event) => events.push(event));

      const job = registry.create('q');
      registry.claim(job.jobId);
      registry.updateProgress(job.jobId, 'initialization');
      registry.requestCancel(job.jobId);
      unsubscribe();
      registry.updateStatus(job.jobId, 'cancelled');

      expect(events.map((event) => event.type)).toEqual(['created', 'status', 'progress', 'cancel_requested']);
      expect(events[1].status).toBe('running');
    });

    test('should keep going when a listener throws', () => {
      registry.onJobUpdate(() => {
        throw new Error('listener failure');
      });

      expect(() => registry.create('q')).not.toThrow();
    });
  });
});
