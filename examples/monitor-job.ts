/**
 * Job monitor
 *
 * Polls a job through the REST API and redraws its progress until it reaches
 * a terminal status.
 *
 * Usage:
 *   1. Start the server:
 *      npm run build && npm start
 *
 *   2. Create a job and watch it:
 *      node dist/examples/monitor-job.js "What changed in the 2024 tax code?"
 *      node dist/examples/monitor-job.js --job <job_id>
 */

import fetch from 'node-fetch';
import { JobView, STAGE_LABELS, STAGE_ORDER, isTerminalStatus } from '../src/core/entities/Job.js';
import { isRecord } from '../src/utils/guards.js';
import { formatElapsed, progressBar, stageIndicator } from '../src/utils/progressDisplay.js';
import { sleep } from '../src/utils/retry.js';

const BASE_URL = process.env.RESEARCH_SERVER_URL || 'http://localhost:8000';
const REFRESH_MS = 500;

interface Envelope<T> {
  success: boolean;
  data?: T;
  error?: string;
}

async function request<T>(path: string, init?: { method: string; body?: string }): Promise<T> {
  const res = await fetch(`${BASE_URL}${path}`, {
    method: init?.method ?? 'GET',
    headers: { 'Content-Type': 'application/json' },
    body: init?.body,
  });
  const body: Envelope<T> = await res.json();
  if (!body.success || body.data === undefined) {
    throw new Error(body.error || `HTTP ${res.status}`);
  }
  return body.data;
}

function render(job: JobView, elapsedSeconds: number, iteration: number): void {
  const { progress } = job;
  const finished = isTerminalStatus(job.status);

  console.clear();
  console.log('='.repeat(80));
  console.log('  JOB MONITOR - Real-time Status Updates');
  console.log('='.repeat(80));
  console.log();
  console.log(`Job ID:     ${job.job_id}`);
  console.log(`Query:      ${job.query}`);
  console.log(`Status:     ${job.status.toUpperCase()}`);
  console.log(`Attempt:    ${job.attempt}`);
  console.log(`Elapsed:    ${formatElapsed(elapsedSeconds)}`);
  console.log(`Updates:    ${iteration}`);
  console.log();
  console.log('─'.repeat(80));
  console.log('PROGRESS');
  console.log('─'.repeat(80));
  console.log();
  console.log(progressBar(progress.percentage, 60));
  console.log();
  console.log(`Stage: ${progress.completed_stages}/${progress.total_stages}`);
  console.log();
  console.log('STAGES:');
  console.log();
  console.log(stageIndicator(progress.stages_completed, progress.current_stage, finished));
  console.log(STAGE_ORDER.map((stage) => STAGE_LABELS[stage].split(' ')[0].slice(0, 5).padEnd(5)).join(' '));
  console.log();
  console.log('─'.repeat(80));
  console.log(`CURRENT: ${STAGE_LABELS[progress.current_stage]}`);
  console.log('─'.repeat(80));
  if (progress.current_operation) {
    console.log(`  ${progress.current_operation}`);
  }
  console.log();

  if (job.status === 'completed') {
    console.log('✓ JOB COMPLETED SUCCESSFULLY');
    const summary = job.result?.summary;
    if (isRecord(summary)) {
      console.log('Summary:');
      console.log(`  Documents Retrieved: ${summary.retrieved_documents ?? 0}`);
      console.log(`  Web Sources: ${summary.web_sources ?? 0}`);
      console.log(`  Citations: ${summary.citations_verified ?? 0}`);
      console.log(`  PII Redacted: ${summary.pii_redacted ?? 0}`);
    }
  } else if (job.status === 'failed') {
    console.log('✗ JOB FAILED');
    console.log(`Error: ${job.error ?? 'Unknown error'}`);
  } else if (job.status === 'cancelled') {
    console.log('⛔ JOB CANCELLED');
  } else if (job.status === 'retry') {
    console.log(`↻ Waiting for automatic retry (${job.retry_count}/${job.max_retries}): ${job.error ?? ''}`);
  }
}

async function main() {
  const args = process.argv.slice(2);
  let jobId: string;

  if (args[0] === '--job' && args[1]) {
    jobId = args[1];
  } else if (args.length > 0) {
    const job = await request<JobView>('/api/jobs', {
      method: 'POST',
      body: JSON.stringify({ query: args.join(' ') }),
    });
    jobId = job.job_id;
  } else {
    console.error('Usage: monitor-job "<query>" | monitor-job --job <job_id>');
    process.exit(1);
  }

  const start = Date.now();
  for (let iteration = 1; ; iteration++) {
    const job = await request<JobView>(`/api/jobs/${jobId}`);
    render(job, (Date.now() - start) / 1000, iteration);
    if (isTerminalStatus(job.status)) break;
    await sleep(REFRESH_MS);
  }
}

main().catch((error: unknown) => {
  console.error('✗ Monitor failed:', error);
  process.exit(1);
});
