import { IStageHandler, StageContext, StageResult } from '../../core/interfaces/IStageHandler.js';

export class InitializationStage implements IStageHandler {
  readonly stage = 'initialization' as const;
  readonly operation = 'Initializing research agent and loading configurations';

  async execute(context: StageContext): Promise<StageResult> {
    const query = context.query.trim();
    if (!query) {
      return { success: false, details: 'Query is empty' };
    }

    await context.audit('info', 'Research agent initialized', { attempt: context.attempt });
    return {
      success: true,
      details: 'Agent initialized successfully',
      output: { query, words: query.split(/\s+/).length },
    };
  }
}
