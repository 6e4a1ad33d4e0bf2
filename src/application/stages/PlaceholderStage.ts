import { JobStage } from '../../core/entities/Job.js';
import { IStageHandler, StageContext, StageResult } from '../../core/interfaces/IStageHandler.js';

/**
 * Stage whose real work happens inside the research workflow. It only reports
 * that the stage was reached.
 */
export class PlaceholderStage implements IStageHandler {
  constructor(
    readonly stage: JobStage,
    readonly operation: string,
    private readonly details: string
  ) {}

  async execute(context: StageContext): Promise<StageResult> {
    await context.audit('stage', this.details);
    return { success: true, details: this.details };
  }
}
