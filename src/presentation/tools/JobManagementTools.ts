import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { JobService } from '../../application/services/JobService.js';
import {
  JOB_STATUSES,
  JobSnapshot,
  JobStatus,
  STAGE_LABELS,
  toExecutionRecordView,
  toJobView,
} from '../../core/entities/Job.js';
import { errorMessage } from '../../core/errors.js';

const STATUS_EMOJI: Record<JobStatus, string> = {
  pending: '⏳',
  running: '🔄',
  completed: '✅',
  failed: '❌',
  cancelled: '⛔',
  retry: '🔁',
};

function text(value: string): CallToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function failure(prefix: string, error: unknown): CallToolResult {
  return { isError: true, content: [{ type: 'text', text: `${prefix}: ${errorMessage(error)}` }] };
}

function json(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}

/**
 * Markdown summary of one job
 */
export function formatJob(job: JobSnapshot): string {
  const { progress } = job;
  const lines = [
    `# ${STATUS_EMOJI[job.status]} Job ${job.jobId}`,
    '',
    '## Status',
    `- **Query**: ${job.query}`,
    `- **Status**: ${job.status}`,
    `- **Progress**: ${progress.percentage.toFixed(1)}% (${progress.completedStages}/${progress.totalStages} stages)`,
    `- **Current stage**: ${STAGE_LABELS[progress.currentStage]}`,
    `- **Operation**: ${progress.currentOperation || '-'}`,
    `- **Attempt**: ${job.attempt} (automatic retries used: ${job.retryCount}/${job.maxRetries})`,
    '',
    '## Time Information',
    `- **Created**: ${job.createdAt.toISOString()}`,
    `- **Started**: ${job.startedAt?.toISOString() || 'Not yet started'}`,
    `- **Completed**: ${job.completedAt?.toISOString() || 'In progress'}`,
  ];

  if (job.error) {
    lines.push('', '## ❌ Error', '```', job.error, '```');
  }
  if (job.status === 'completed' && job.result) {
    const report = job.result.report;
    lines.push('', '## ✅ Result', typeof report === 'string' && report ? report : json(job.result));
  }
  return lines.join('\n');
}

/**
 * Register all job management tools
 */
export function registerJobManagementTools(server: McpServer, jobService: JobService) {
  // create-research-job tool
  server.tool(
    'create-research-job',
    'Submit a research query as a background job. Returns immediately with the job ID.',
    {
      query: z.string().min(1).describe('The research question'),
      idempotency_key: z
        .string()
        .min(1)
        .optional()
        .describe('Deduplication token: returns the running or completed job holding the same key'),
    },
    async ({ query, idempotency_key }) => {
      try {
        const { job, created } = jobService.createJob(query, { idempotencyKey: idempotency_key });
        const heading = created ? '# Research Job Created' : '# Existing Job Returned';
        return text(
          `${heading}\n\nJob ID: ${job.jobId}\nStatus: ${job.status}\n\nUse \`get-job\` with this job ID to follow progress.`
        );
      } catch (error) {
        return failure('Error creating job', error);
      }
    }
  );

  // get-job tool
  server.tool(
    'get-job',
    'Get status, progress and result of a job',
    {
      job_id: z.string().describe('The ID of the job to check'),
    },
    async ({ job_id }) => {
      try {
        return text(formatJob(jobService.getJob(job_id)));
      } catch (error) {
        return failure('Error getting job', error);
      }
    }
  );

  // list-jobs tool
  server.tool(
    'list-jobs',
    'List jobs with their status and progress',
    {
      status: z.enum(JOB_STATUSES).optional().describe('Filter jobs by status (optional)'),
      limit: z.number().int().min(1).max(1000).optional().describe('Maximum number of jobs (default 100)'),
    },
    async ({ status, limit }) => {
      try {
        const jobs = jobService.listJobs({ status, limit: limit ?? 100 });
        const stats = jobService.getStatistics().jobs;

        const formattedJobs = jobs.map((job) => ({
          job_id: job.jobId,
          query: job.query,
          status: job.status,
          progress: `${job.progress.percentage.toFixed(1)}%`,
          created_at: job.createdAt.toISOString(),
          error: job.error,
        }));

        const body = `# Jobs

## Statistics
- Total Jobs: ${stats.total}
- Pending: ${stats.pending}
- Running: ${stats.running}
- Retry: ${stats.retry}
- Completed: ${stats.completed}
- Failed: ${stats.failed}
- Cancelled: ${stats.cancelled}

## Jobs
${formattedJobs.length === 0 ? 'No jobs found' : json(formattedJobs)}`;

        return text(body);
      } catch (error) {
        return failure('Error listing jobs', error);
      }
    }
  );

  // cancel-job tool
  server.tool(
    'cancel-job',
    'Request cancellation of a running job. It stops at its next checkpoint.',
    {
      job_id: z.string().describe('The ID of the job to cancel'),
    },
    async ({ job_id }) => {
      try {
        const job = jobService.cancelJob(job_id);
        return text(`# Cancellation Requested\n\nJob ID: ${job.jobId}\nStatus: ${job.status}`);
      } catch (error) {
        return failure('Error cancelling job', error);
      }
    }
  );

  // retry-job tool
  server.tool(
    'retry-job',
    'Run a failed or cancelled job again from the first stage',
    {
      job_id: z.string().describe('The ID of the job to retry'),
    },
    async ({ job_id }) => {
      try {
        const job = jobService.retryJob(job_id);
        return text(`# Job Scheduled for Retry\n\nJob ID: ${job.jobId}\nStatus: ${job.status}`);
      } catch (error) {
        return failure('Error retrying job', error);
      }
    }
  );

  // delete-job tool
  server.tool(
    'delete-job',
    'Delete a job that is not running',
    {
      job_id: z.string().describe('The ID of the job to delete'),
    },
    async ({ job_id }) => {
      try {
        jobService.deleteJob(job_id);
        return text(`Job ${job_id} deleted`);
      } catch (error) {
        return failure('Error deleting job', error);
      }
    }
  );

  // get-job-history tool
  server.tool(
    'get-job-history',
    'Get the per-stage execution history of a job',
    {
      job_id: z.string().describe('The ID of the job'),
    },
    async ({ job_id }) => {
      try {
        const history = jobService.getExecutionHistory(job_id).map(toExecutionRecordView);
        const job = toJobView(jobService.getJob(job_id));
        return text(
          `# Execution History: ${job_id}\n\nStatus: ${job.status}\nRecords: ${history.length}\n\n${json(history)}`
        );
      } catch (error) {
        return failure('Error getting job history', error);
      }
    }
  );
}
