import { AuditLogType } from '../entities/AuditEntry.js';
import { JobStage } from '../entities/Job.js';

/**
 * Read side of a job's cancellation flag
 */
export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}

export interface StageContext {
  jobId: string;
  query: string;
  attempt: number;
  token: CancellationToken;
  /**
   * Outputs of the stages that already ran in this execution
   */
  outputs: Partial<Record<JobStage, unknown>>;
  reportProgress(operation: string): void;
  audit(type: AuditLogType, message: string, metadata?: Record<string, unknown>): Promise<void>;
}

export interface StageResult {
  success: boolean;
  details: string;
  output?: unknown;
}

/**
 * Work performed for one pipeline stage
 */
export interface IStageHandler {
  readonly stage: JobStage;
  /** Operation text shown while the stage runs */
  readonly operation: string;
  execute(context: StageContext): Promise<StageResult>;
}
