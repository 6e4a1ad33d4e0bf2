import { ResearchOutcome } from '../../core/entities/Research.js';
import { IStageHandler, StageContext, StageResult } from '../../core/interfaces/IStageHandler.js';
import { isRecord } from '../../utils/guards.js';

/**
 * Assembles the job result from the research outcome
 */
export class FinalizationStage implements IStageHandler {
  readonly stage = 'finalization' as const;
  readonly operation = 'Finalizing report and cleanup';

  async execute(context: StageContext): Promise<StageResult> {
    const outcome = context.outputs.report_generation;
    if (!isResearchOutcome(outcome)) {
      return { success: false, details: 'No research outcome to finalize' };
    }

    const result: Record<string, unknown> = {
      success: true,
      query: context.query,
      report: outcome.report ?? '',
      summary: outcome.summary ?? {},
      compliance: outcome.compliance ?? null,
      logs: outcome.logs ?? [],
      session_id: context.jobId,
    };
    return { success: true, details: 'Job finalized', output: result };
  }
}

function isResearchOutcome(value: unknown): value is ResearchOutcome {
  return isRecord(value) && typeof value.success === 'boolean';
}
