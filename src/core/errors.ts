import type { JobStage, JobStatus } from './entities/Job.js';

export type JobErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'STAGE_FAILURE'
  | 'COLLABORATOR_FAILURE';

/**
 * Base class for errors raised by the job core
 */
export class JobError extends Error {
  constructor(
    readonly code: JobErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'JobError';
  }
}

export class NotFoundError extends JobError {
  constructor(readonly jobId: string) {
    super('NOT_FOUND', `Job ${jobId} not found`);
    this.name = 'NotFoundError';
  }
}

export class InvalidStateError extends JobError {
  constructor(
    readonly jobId: string,
    readonly status: JobStatus,
    action: string
  ) {
    super('INVALID_STATE', `Cannot ${action} job with status: ${status}`);
    this.name = 'InvalidStateError';
  }
}

export class StageFailureError extends JobError {
  constructor(
    readonly stage: JobStage,
    message: string,
    code: JobErrorCode = 'STAGE_FAILURE'
  ) {
    super(code, message);
    this.name = 'StageFailureError';
  }
}

/**
 * The research workflow reported failure or threw. Handled exactly like a
 * stage failure at report generation.
 */
export class CollaboratorFailureError extends StageFailureError {
  constructor(message: string) {
    super('report_generation', message, 'COLLABORATOR_FAILURE');
    this.name = 'CollaboratorFailureError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
