import { ResearchOutcome } from '../../core/entities/Research.js';
import { IResearchWorkflow } from '../../core/interfaces/IResearchWorkflow.js';
import { sleep } from '../../utils/retry.js';

export interface SimulatedResearchOptions {
  /** Artificial latency of one run */
  latencyMs?: number;
  /** Queries matching this pattern come back as failures */
  failPattern?: RegExp;
}

/**
 * Local research workflow used when no research backend is configured.
 * Produces a deterministic Markdown report for the query.
 */
export class SimulatedResearchWorkflow implements IResearchWorkflow {
  private runs = 0;

  constructor(private options: SimulatedResearchOptions = {}) {}

  async run(query: string): Promise<ResearchOutcome> {
    this.runs += 1;
    if (this.options.latencyMs) {
      await sleep(this.options.latencyMs);
    }

    if (this.options.failPattern?.test(query)) {
      return { success: false, error: `Research failed for query: ${query}` };
    }

    const report = [
      `# Research Report`,
      '',
      `## Query`,
      query,
      '',
      `## Findings`,
      `No document store or web search backend is configured, so this report was produced locally.`,
      '',
      `## Sources`,
      `- none`,
    ].join('\n');

    return {
      success: true,
      report,
      summary: {
        query,
        retrieved_documents: 0,
        web_sources: 0,
        citations_verified: 0,
        pii_redacted: 0,
      },
      compliance: { pii_found: 0, redacted: 0, passed: true },
      logs: [],
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  get runCount(): number {
    return this.runs;
  }
}
