import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../src/infrastructure/database/repositories/JobRepository.js';
import { JobRegistry } from '../src/infrastructure/queue/JobRegistry.js';

describe('JobRepository', () => {
  let connection: DatabaseConnection;
  let repository: JobRepository;

  beforeEach(() => {
    // Use in-memory database for tests
    connection = new DatabaseConnection(':memory:');
    repository = new JobRepository(connection.getDatabase());
  });

  afterEach(() => {
    connection.close();
  });

  test('should save and load a job', () => {
    const registry = new JobRegistry({ repository });
    const job = registry.create('What changed in the tax code?', { idempotencyKey: 'key-1', maxRetries: 2 });
    registry.claim(job.jobId);
    registry.updateProgress(job.jobId, 'initialization', 'Loading');
    registry.recordExecution(job.jobId, 'initialization', true, 'Agent initialized successfully');

    const loaded = repository.loadJob(job.jobId);

    expect(loaded).toEqual(registry.get(job.jobId));
  });

  test('should return null for an unknown job', () => {
    expect(repository.loadJob('missing')).toBeNull();
  });

  test('should store the result of a completed job', () => {
    const registry = new JobRegistry({ repository });
    const job = registry.create('q');
    registry.claim(job.jobId);
    registry.markCompleted(job.jobId, { success: true, report: '# Report', summary: { sources: 2 } });

    const loaded = repository.loadJob(job.jobId);

    expect(loaded?.status).toBe('completed');
    expect(loaded?.result).toEqual({ success: true, report: '# Report', summary: { sources: 2 } });
    expect(loaded?.progress.percentage).toBe(100);
    expect(loaded?.completedAt).toBeInstanceOf(Date);
  });

  test('should append history without duplicating it', () => {
    const registry = new JobRegistry({ repository });
    const job = registry.create('q');
    registry.claim(job.jobId);
    registry.recordExecution(job.jobId, 'initialization', true, 'one');
    registry.recordExecution(job.jobId, 'document_retrieval', false, 'two');
    registry.updateProgress(job.jobId, 'document_retrieval');

    const history = repository.loadJob(job.jobId)?.executionHistory ?? [];
    expect(history.map((record) => record.details)).toEqual(['one', 'two']);
    expect(history.map((record) => record.success)).toEqual([true, false]);
    expect(connection.getStatistics().totalHistoryRecords).toBe(2);
  });

  test('should list jobs in creation order', () => {
    const registry = new JobRegistry({ repository });
    const a = registry.create('a');
    const b = registry.create('b');

    expect(repository.getAllJobs().map((job) => job.jobId)).toEqual([a.jobId, b.jobId]);
  });

  test('should delete a job together with its history', () => {
    const registry = new JobRegistry({ repository });
    const job = registry.create('q');
    registry.claim(job.jobId);
    registry.recordExecution(job.jobId, 'initialization', true, 'ok');
    registry.markCompleted(job.jobId, {});

    registry.delete(job.jobId);

    expect(repository.loadJob(job.jobId)).toBeNull();
    expect(connection.getStatistics().totalHistoryRecords).toBe(0);
  });

  test('should report job statistics', () => {
    const registry = new JobRegistry({ repository });
    const a = registry.create('a');
    registry.create('b');
    registry.claim(a.jobId);
    registry.markFailed(a.jobId, 'x', false);

    const stats = connection.getStatistics();

    expect(stats.jobStats).toEqual({
      total: 2,
      pending: 1,
      running: 0,
      completed: 0,
      failed: 1,
      cancelled: 0,
      retry: 0,
    });
    expect(stats.databaseSize).toBe(0);
  });

  describe('Reload', () => {
    test('should restore jobs and turn interrupted ones into retries', () => {
      const before = new JobRegistry({ repository });
      const finished = before.create('finished');
      before.claim(finished.jobId);
      before.markCompleted(finished.jobId, { success: true });
      const interrupted = before.create('interrupted');
      before.claim(interrupted.jobId);
      before.recordExecution(interrupted.jobId, 'initialization', true, 'ok');
      const waiting = before.create('waiting');

      const after = new JobRegistry({ repository });

      expect(after.require(finished.jobId).status).toBe('completed');
      expect(after.require(finished.jobId).result).toEqual({ success: true });
      expect(after.require(waiting.jobId).status).toBe('pending');

      const restored = after.require(interrupted.jobId);
      expect(restored.status).toBe('retry');
      expect(restored.error).toBe('Interrupted by process restart');
      expect(restored.executionHistory).toHaveLength(1);
      expect(repository.loadJob(interrupted.jobId)?.status).toBe('retry');
    });

    test('a restored retry can be claimed again', () => {
      const before = new JobRegistry({ repository });
      const job = before.create('q');
      before.claim(job.jobId);

      const after = new JobRegistry({ repository });
      const claimed = after.claim(job.jobId);

      expect(claimed?.status).toBe('running');
      expect(claimed?.attempt).toBe(2);
    });
  });
});
