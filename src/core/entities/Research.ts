/**
 * Result returned by the research workflow for one query
 */
export interface ResearchOutcome {
  success: boolean;
  report?: string;
  summary?: Record<string, unknown>;
  compliance?: Record<string, unknown>;
  logs?: unknown[];
  error?: string;
}
