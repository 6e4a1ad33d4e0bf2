import { ResearchOutcome } from '../../core/entities/Research.js';
import { CollaboratorFailureError, errorMessage } from '../../core/errors.js';
import { IResearchWorkflow } from '../../core/interfaces/IResearchWorkflow.js';
import { IStageHandler, StageContext, StageResult } from '../../core/interfaces/IStageHandler.js';

/**
 * Runs the research workflow once for the job's query. The call is not
 * interrupted by cancellation; the runner checks again once it returns.
 */
export class ReportGenerationStage implements IStageHandler {
  readonly stage = 'report_generation' as const;
  readonly operation = 'Generating comprehensive research report';

  constructor(private readonly workflow: IResearchWorkflow) {}

  async execute(context: StageContext): Promise<StageResult> {
    context.reportProgress(`${this.operation} (running research workflow)`);

    let outcome: ResearchOutcome;
    try {
      outcome = await this.workflow.run(context.query);
    } catch (error) {
      throw new CollaboratorFailureError(`Research workflow error: ${errorMessage(error)}`);
    }

    if (!outcome.success) {
      throw new CollaboratorFailureError(outcome.error || 'Research workflow reported failure');
    }

    await context.audit('success', 'Research workflow completed', {
      report_length: outcome.report?.length ?? 0,
    });
    return { success: true, details: 'Report generated successfully', output: outcome };
  }
}
