import { AuditLogType } from '../../core/entities/AuditEntry.js';
import { JobStage, STAGE_LABELS, STAGE_ORDER } from '../../core/entities/Job.js';
import { StageFailureError, errorMessage } from '../../core/errors.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import {
  CancellationToken,
  IStageHandler,
  StageContext,
} from '../../core/interfaces/IStageHandler.js';
import { JobRegistry } from '../../infrastructure/queue/JobRegistry.js';
import { isRecord } from '../../utils/guards.js';
import { createLogger } from '../../utils/logger.js';
import { sleep } from '../../utils/retry.js';

const log = createLogger('StageRunner');

export interface PacingConfig {
  /** Nominal duration of each stage before scaling */
  stageDelaysMs: Record<JobStage, number>;
  /** Checkpoints per stage */
  subSteps: number;
  /** Multiplier applied to every delay; 0 removes the pacing */
  scale: number;
}

export const DEFAULT_PACING: PacingConfig = {
  stageDelaysMs: {
    initialization: 2000,
    document_retrieval: 3000,
    web_research: 4000,
    citation_verification: 2000,
    compliance_check: 2000,
    report_generation: 3000,
    finalization: 1000,
  },
  subSteps: 5,
  scale: 1,
};

export type ExecutionOutcome =
  | { status: 'completed'; jobId: string; result: Record<string, unknown> }
  | { status: 'cancelled'; jobId: string; stage: JobStage; result: Record<string, unknown> }
  | { status: 'retry' | 'failed'; jobId: string; stage: JobStage; error: string }
  | { status: 'skipped'; jobId: string; reason: string };

/**
 * Drives one job through the seven pipeline stages.
 *
 * Cancellation is cooperative: the token is checked before each stage,
 * between paced sub-steps, after pacing, and before completion. Stage work
 * already in flight always runs to the end.
 */
export class StageRunner {
  private handlers: Map<JobStage, IStageHandler> = new Map();

  constructor(
    private registry: JobRegistry,
    handlers: IStageHandler[],
    private auditLog: IAuditLog,
    private pacing: PacingConfig = DEFAULT_PACING
  ) {
    for (const handler of handlers) {
      this.handlers.set(handler.stage, handler);
    }
    const missing = STAGE_ORDER.filter((stage) => !this.handlers.has(stage));
    if (missing.length > 0) {
      throw new Error(`No stage handler registered for: ${missing.join(', ')}`);
    }
  }

  async execute(jobId: string): Promise<ExecutionOutcome> {
    const job = this.registry.claim(jobId);
    if (!job) {
      const current = this.registry.get(jobId);
      const reason = current ? `Job is ${current.status}` : 'Job not found';
      log.warn(`Job ${shortId(jobId)} not executed: ${reason}`);
      return { status: 'skipped', jobId, reason };
    }

    const token = this.registry.cancellationToken(jobId);
    const outputs: Partial<Record<JobStage, unknown>> = {};
    let stage: JobStage = STAGE_ORDER[0];

    await this.audit(jobId, 'status', `Job started (attempt ${job.attempt})`, {
      query: job.query,
      attempt: job.attempt,
    });

    try {
      for (const [index, current] of STAGE_ORDER.entries()) {
        stage = current;
        const handler = this.handler(stage);

        if (token.isCancellationRequested) {
          return await this.cancel(jobId, stage);
        }

        this.registry.updateProgress(jobId, stage, handler.operation);
        await this.audit(jobId, 'stage', `Stage ${index + 1}/${STAGE_ORDER.length}: ${STAGE_LABELS[stage]} started`, {
          stage,
        });

        await this.pace(jobId, stage, handler.operation, token);
        if (token.isCancellationRequested) {
          return await this.cancel(jobId, stage);
        }

        const context: StageContext = {
          jobId,
          query: job.query,
          attempt: job.attempt,
          token,
          outputs,
          reportProgress: (operation) => this.registry.updateProgress(jobId, stage, operation),
          audit: (type, message, metadata = {}) => this.audit(jobId, type, message, { stage, ...metadata }),
        };

        const result = await handler.execute(context);
        if (!result.success) {
          throw new StageFailureError(stage, `${STAGE_LABELS[stage]} failed: ${result.details}`);
        }

        outputs[stage] = result.output;
        this.registry.recordExecution(jobId, stage, true, result.details);
        log.info(
          `Job ${shortId(jobId)} stage ${index + 1}/${STAGE_ORDER.length}: ${STAGE_LABELS[stage]} completed`
        );
        await this.audit(jobId, 'stage', `${STAGE_LABELS[stage]} completed: ${result.details}`, { stage });
      }

      if (token.isCancellationRequested) {
        return await this.cancel(jobId, stage);
      }

      const finalOutput = outputs.finalization;
      const result = isRecord(finalOutput) ? finalOutput : { success: true };
      this.registry.markCompleted(jobId, result);
      log.info(`Job ${shortId(jobId)} ✓ All stages completed successfully`);
      await this.audit(jobId, 'success', 'Job completed successfully');
      return { status: 'completed', jobId, result };
    } catch (error) {
      return await this.fail(jobId, stage, error, token);
    }
  }

  private handler(stage: JobStage): IStageHandler {
    const handler = this.handlers.get(stage);
    if (!handler) {
      throw new Error(`No stage handler registered for: ${stage}`);
    }
    return handler;
  }

  /**
   * Spread the stage's nominal duration over sub-steps, updating the
   * operation text and checking for cancellation after each one
   */
  private async pace(
    jobId: string,
    stage: JobStage,
    operation: string,
    token: CancellationToken
  ): Promise<void> {
    const steps = this.pacing.subSteps;
    if (steps <= 0) return;

    const stepDelay = (this.pacing.stageDelaysMs[stage] * this.pacing.scale) / steps;
    for (let step = 0; step < steps; step++) {
      await sleep(stepDelay);

      if (token.isCancellationRequested) {
        return;
      }

      const percent = Math.round(((step + 1) / steps) * 100);
      this.registry.updateProgress(jobId, stage, `${operation} (${percent}%)`);
    }
  }

  private async cancel(jobId: string, stage: JobStage): Promise<ExecutionOutcome> {
    this.registry.updateStatus(jobId, 'cancelled');
    log.warn(`Job ${shortId(jobId)} cancelled during ${STAGE_LABELS[stage]}`);
    await this.audit(jobId, 'warning', 'Job was cancelled', { stage });
    return {
      status: 'cancelled',
      jobId,
      stage,
      result: { success: false, cancelled: true, message: 'Job was cancelled' },
    };
  }

  private async fail(
    jobId: string,
    stage: JobStage,
    error: unknown,
    token: CancellationToken
  ): Promise<ExecutionOutcome> {
    const message = errorMessage(error);
    this.registry.recordExecution(jobId, stage, false, message);
    log.error(`Job ${shortId(jobId)} failed at ${STAGE_LABELS[stage]}: ${message}`, error);
    await this.audit(jobId, 'error', `Stage ${STAGE_LABELS[stage]} failed: ${message}`, {
      stage,
      error: message,
      error_type: error instanceof Error ? error.name : typeof error,
    });

    if (token.isCancellationRequested) {
      return this.cancel(jobId, stage);
    }

    const status = this.registry.markFailed(jobId, message, true);
    if (status === 'retry') {
      await this.audit(jobId, 'status', 'Job scheduled for automatic retry', { stage });
      return { status: 'retry', jobId, stage, error: message };
    }
    return { status: 'failed', jobId, stage, error: message };
  }

  private audit(
    jobId: string,
    type: AuditLogType,
    message: string,
    metadata: Record<string, unknown> = {}
  ): Promise<void> {
    return this.auditLog.log(jobId, type, message, metadata);
  }
}

function shortId(jobId: string): string {
  return jobId.slice(0, 8);
}
