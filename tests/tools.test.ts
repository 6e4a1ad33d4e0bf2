import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JobService } from '../src/application/services/JobService.js';
import { getConfig } from '../src/config.js';
import { IResearchWorkflow } from '../src/core/interfaces/IResearchWorkflow.js';
import { McpServer } from '../src/presentation/McpServer.js';
import { checkHealth } from '../src/presentation/tools/HealthCheckTool.js';
import { CircuitBreaker } from '../src/utils/retry.js';
import { GatedWorkflow, waitFor } from './helpers.js';

interface ToolReply {
  text: string;
  isError: boolean;
}

describe('MCP tools', () => {
  let directory: string;
  let workflow: GatedWorkflow;
  let server: McpServer;
  let jobService: JobService;
  let client: Client;

  async function callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolReply> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const text = result.content
      .map((item) => (item.type === 'text' ? item.text : ''))
      .join('');
    return { text, isError: result.isError ?? false };
  }

  async function waitForStatus(jobId: string, status: string): Promise<void> {
    await waitFor(() => jobService.findJob(jobId)?.status === status);
  }

  beforeEach(async () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'tools-test-'));
    const config = getConfig({
      argv: [],
      env: {
        AUDIT_LOG_DIR: directory,
        DATABASE_ENABLED: 'false',
        WEB_SERVER_ENABLED: 'false',
        PACING_SCALE: '0',
      },
    });
    workflow = new GatedWorkflow();
    server = new McpServer(config, { workflow });
    jobService = server.getJobService();

    const mcp = new BaseMcpServer({ name: 'test-server', version: '1.0.0' });
    server.registerToolsForServer(mcp);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await mcp.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    workflow.release();
    await client.close();
    await server.shutdown();
    fs.rmSync(directory, { recursive: true, force: true });
  });

  test('should list every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'cancel-job',
      'create-research-job',
      'delete-job',
      'get-job',
      'get-job-history',
      'health-check',
      'list-jobs',
      'retry-job',
    ]);
  });

  test('create-research-job should submit a job', async () => {
    const reply = await callTool('create-research-job', { query: 'what is a merkle tree' });

    const [job] = jobService.listJobs();
    expect(reply.isError).toBe(false);
    expect(reply.text).toBe(
      `# Research Job Created\n\nJob ID: ${job.jobId}\nStatus: pending\n\nUse \`get-job\` with this job ID to follow progress.`
    );
  });

  test('create-research-job should return the job holding the idempotency key', async () => {
    await callTool('create-research-job', { query: 'q', idempotency_key: 'key-1' });
    const reply = await callTool('create-research-job', { query: 'q', idempotency_key: 'key-1' });

    expect(reply.text).toContain('# Existing Job Returned');
    expect(reply.text).toContain('Status: running');
    expect(jobService.listJobs()).toHaveLength(1);
  });

  test('get-job should describe the job', async () => {
    workflow.release();
    await callTool('create-research-job', { query: 'what is a merkle tree' });
    const [job] = jobService.listJobs();
    await waitForStatus(job.jobId, 'completed');

    const reply = await callTool('get-job', { job_id: job.jobId });

    expect(reply.text).toContain(`# ✅ Job ${job.jobId}`);
    expect(reply.text).toContain('- **Progress**: 100.0% (7/7 stages)');
    expect(reply.text).toContain('- **Current stage**: Finalization');
    expect(reply.text).toContain('## ✅ Result\n# Research Report');
  });

  test('get-job should report unknown jobs as errors', async () => {
    const reply = await callTool('get-job', { job_id: 'missing' });

    expect(reply).toEqual({ text: 'Error getting job: Job missing not found', isError: true });
  });

  test('list-jobs should show statistics', async () => {
    await callTool('create-research-job', { query: 'q' });

    const reply = await callTool('list-jobs');

    expect(reply.text).toContain('- Total Jobs: 1\n- Pending: 0\n- Running: 1');
  });

  test('list-jobs should say when nothing matches', async () => {
    const reply = await callTool('list-jobs', { status: 'failed' });

    expect(reply.text).toContain('## Jobs\nNo jobs found');
  });

  test('cancel-job and retry-job should control a job', async () => {
    await callTool('create-research-job', { query: 'q' });
    const [job] = jobService.listJobs();
    await waitFor(() => workflow.waiting > 0);

    const cancel = await callTool('cancel-job', { job_id: job.jobId });
    expect(cancel.text).toBe(`# Cancellation Requested\n\nJob ID: ${job.jobId}\nStatus: running`);

    workflow.release();
    await waitForStatus(job.jobId, 'cancelled');

    const refused = await callTool('cancel-job', { job_id: job.jobId });
    expect(refused).toEqual({ text: 'Error cancelling job: Cannot cancel job with status: cancelled', isError: true });

    const retry = await callTool('retry-job', { job_id: job.jobId });
    expect(retry.text).toBe(`# Job Scheduled for Retry\n\nJob ID: ${job.jobId}\nStatus: pending`);
    await waitForStatus(job.jobId, 'completed');
  });

  test('get-job-history and delete-job should work on finished jobs', async () => {
    workflow.release();
    await callTool('create-research-job', { query: 'q' });
    const [job] = jobService.listJobs();
    await waitForStatus(job.jobId, 'completed');

    const history = await callTool('get-job-history', { job_id: job.jobId });
    expect(history.text).toContain(`# Execution History: ${job.jobId}\n\nStatus: completed\nRecords: 7`);

    const deleted = await callTool('delete-job', { job_id: job.jobId });
    expect(deleted).toEqual({ text: `Job ${job.jobId} deleted`, isError: false });
    expect(jobService.findJob(job.jobId)).toBeNull();
  });

  test('health-check should report component status', async () => {
    const reply = await callTool('health-check');

    expect(reply.text).toContain('# System Health Check');
    expect(reply.text).toContain('"status": "healthy"');

    const health = await checkHealth(jobService, workflow, null);
    expect(health.status).toBe('healthy');
    expect(health.components.database).toEqual({ status: 'disabled', message: 'Persistence disabled' });
    expect(health.components.research).toEqual({ status: 'healthy', message: 'Research workflow reachable' });
  });

  test('health-check should degrade when the research backend is down', async () => {
    const down = new GatedWorkflow();
    down.healthCheck = async () => false;

    const health = await checkHealth(jobService, down, null);

    expect(health.status).toBe('degraded');
    expect(health.components.research).toEqual({ status: 'error', message: 'Health check failed' });
  });

  test('health-check should include the research circuit breaker', async () => {
    const breaker = new CircuitBreaker(1, 60000);
    await expect(breaker.execute(() => Promise.reject(new Error('down')))).rejects.toThrow('down');
    const guarded: IResearchWorkflow = {
      run: (query) => workflow.run(query),
      healthCheck: async () => true,
      getCircuitBreakerStats: () => breaker.getStats(),
    };

    const health = await checkHealth(jobService, guarded, null);

    expect(health.components.research).toMatchObject({
      status: 'healthy',
      message: 'Research workflow reachable',
      circuitBreaker: { state: 'open', failureCount: 1 },
    });
  });
});
