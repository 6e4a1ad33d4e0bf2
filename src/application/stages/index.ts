import { IResearchWorkflow } from '../../core/interfaces/IResearchWorkflow.js';
import { IStageHandler } from '../../core/interfaces/IStageHandler.js';
import { FinalizationStage } from './FinalizationStage.js';
import { InitializationStage } from './InitializationStage.js';
import { PlaceholderStage } from './PlaceholderStage.js';
import { ReportGenerationStage } from './ReportGenerationStage.js';

export { FinalizationStage, InitializationStage, PlaceholderStage, ReportGenerationStage };

/**
 * One handler per pipeline stage, in execution order
 */
export function createDefaultStageHandlers(workflow: IResearchWorkflow): IStageHandler[] {
  return [
    new InitializationStage(),
    new PlaceholderStage(
      'document_retrieval',
      'Searching document database using RAG',
      'Documents retrieved from vector database'
    ),
    new PlaceholderStage(
      'web_research',
      'Conducting web research for current information',
      'Web research completed'
    ),
    new PlaceholderStage(
      'citation_verification',
      'Verifying and formatting citations',
      'Citations verified and formatted'
    ),
    new PlaceholderStage(
      'compliance_check',
      'Running PII scan and compliance checks',
      'Compliance check passed'
    ),
    new ReportGenerationStage(workflow),
    new FinalizationStage(),
  ];
}
