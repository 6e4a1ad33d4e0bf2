import { ProgressSnapshot, ProgressTracker } from './ProgressTracker.js';

/**
 * Job domain entity
 */
export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled', 'retry'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Stages of the research pipeline, in execution order
 */
export const STAGE_ORDER = [
  'initialization',
  'document_retrieval',
  'web_research',
  'citation_verification',
  'compliance_check',
  'report_generation',
  'finalization',
] as const;

export type JobStage = (typeof STAGE_ORDER)[number];

export const STAGE_LABELS: Record<JobStage, string> = {
  initialization: 'Initialization',
  document_retrieval: 'Document Retrieval',
  web_research: 'Web Research',
  citation_verification: 'Citation Verification',
  compliance_check: 'Compliance Check',
  report_generation: 'Report Generation',
  finalization: 'Finalization',
};

export interface ExecutionRecord {
  timestamp: Date;
  stage: JobStage;
  success: boolean;
  details: string;
  attempt: number;
}

/**
 * Mutable job record. Only the registry holds instances of this type;
 * everything outside it works on snapshots.
 */
export interface JobRecord {
  jobId: string;
  query: string;
  status: JobStatus;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  progress: ProgressTracker;
  result?: Record<string, unknown>;
  error?: string;
  retryCount: number;
  maxRetries: number;
  attempt: number;
  cancellationRequested: boolean;
  idempotencyKey?: string;
  executionHistory: ExecutionRecord[];
}

export interface JobSnapshot {
  readonly jobId: string;
  readonly query: string;
  readonly status: JobStatus;
  readonly createdAt: Date;
  readonly startedAt?: Date;
  readonly completedAt?: Date;
  readonly progress: ProgressSnapshot;
  readonly result?: Record<string, unknown>;
  readonly error?: string;
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly attempt: number;
  readonly cancellationRequested: boolean;
  readonly idempotencyKey?: string;
  readonly executionHistory: readonly ExecutionRecord[];
}

export function snapshotJob(job: JobRecord): JobSnapshot {
  return {
    jobId: job.jobId,
    query: job.query,
    status: job.status,
    createdAt: new Date(job.createdAt.getTime()),
    startedAt: job.startedAt ? new Date(job.startedAt.getTime()) : undefined,
    completedAt: job.completedAt ? new Date(job.completedAt.getTime()) : undefined,
    progress: job.progress.snapshot(),
    result: job.result ? structuredClone(job.result) : undefined,
    error: job.error,
    retryCount: job.retryCount,
    maxRetries: job.maxRetries,
    attempt: job.attempt,
    cancellationRequested: job.cancellationRequested,
    idempotencyKey: job.idempotencyKey,
    executionHistory: job.executionHistory.map((record) => ({
      ...record,
      timestamp: new Date(record.timestamp.getTime()),
    })),
  };
}

/**
 * Wire representation shared by the REST API, the MCP tools and the stream
 */
export interface JobView {
  job_id: string;
  query: string;
  status: JobStatus;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  progress: {
    current_stage: JobStage;
    stages_completed: JobStage[];
    completed_stages: number;
    total_stages: number;
    percentage: number;
    current_operation: string;
    last_updated: string;
  };
  result: Record<string, unknown> | null;
  error: string | null;
  retry_count: number;
  max_retries: number;
  attempt: number;
}

export interface ExecutionRecordView {
  timestamp: string;
  stage: JobStage;
  success: boolean;
  details: string;
  attempt: number;
}

export function toJobView(job: JobSnapshot): JobView {
  return {
    job_id: job.jobId,
    query: job.query,
    status: job.status,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString() ?? null,
    completed_at: job.completedAt?.toISOString() ?? null,
    progress: {
      current_stage: job.progress.currentStage,
      stages_completed: [...job.progress.stagesCompleted],
      completed_stages: job.progress.completedStages,
      total_stages: job.progress.totalStages,
      percentage: job.progress.percentage,
      current_operation: job.progress.currentOperation,
      last_updated: job.progress.lastUpdated.toISOString(),
    },
    result: job.result ?? null,
    error: job.error ?? null,
    retry_count: job.retryCount,
    max_retries: job.maxRetries,
    attempt: job.attempt,
  };
}

export function toExecutionRecordView(record: ExecutionRecord): ExecutionRecordView {
  return {
    timestamp: record.timestamp.toISOString(),
    stage: record.stage,
    success: record.success,
    details: record.details,
    attempt: record.attempt,
  };
}

export interface JobCreateOptions {
  idempotencyKey?: string;
  maxRetries?: number;
}

export interface JobListOptions {
  status?: JobStatus;
  limit?: number;
}

export interface JobStatistics {
  total: number;
  pending: number;
  running: number;
  completed: number;
  failed: number;
  cancelled: number;
  retry: number;
}
