import { ResearchOutcome } from '../src/core/entities/Research.js';
import { IResearchWorkflow } from '../src/core/interfaces/IResearchWorkflow.js';
import { PacingConfig } from '../src/application/services/StageRunner.js';
import { SimulatedResearchWorkflow } from '../src/infrastructure/research/SimulatedResearchWorkflow.js';
import { sleep } from '../src/utils/retry.js';

export const NO_DELAY: PacingConfig = {
  stageDelaysMs: {
    initialization: 0,
    document_retrieval: 0,
    web_research: 0,
    citation_verification: 0,
    compliance_check: 0,
    report_generation: 0,
    finalization: 0,
  },
  subSteps: 1,
  scale: 0,
};

/**
 * Research workflow that holds every run until released
 */
export class GatedWorkflow implements IResearchWorkflow {
  blocked = true;
  private waiters: Array<() => void> = [];
  private inner = new SimulatedResearchWorkflow();

  get waiting(): number {
    return this.waiters.length;
  }

  async run(query: string): Promise<ResearchOutcome> {
    if (this.blocked) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
    return this.inner.run(query);
  }

  release(): void {
    this.blocked = false;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve());
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

export async function waitFor(condition: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error('Timed out waiting for condition');
    }
    await sleep(5);
  }
}
