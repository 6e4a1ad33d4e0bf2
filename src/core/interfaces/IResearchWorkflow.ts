import { CircuitBreakerStats } from '../../utils/retry.js';
import { ResearchOutcome } from '../entities/Research.js';

/**
 * The long-running research workflow invoked at report generation.
 * Implementations may reject; the stage runner treats that as a failure.
 */
export interface IResearchWorkflow {
  run(query: string): Promise<ResearchOutcome>;

  /**
   * Health check for the workflow backend
   */
  healthCheck(): Promise<boolean>;

  /**
   * State of the circuit breaker guarding a remote backend, when there is one
   */
  getCircuitBreakerStats?(): CircuitBreakerStats;
}
