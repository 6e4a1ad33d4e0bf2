import fetch from 'node-fetch';
import { z } from 'zod';
import { ResearchOutcome } from '../../core/entities/Research.js';
import { IResearchWorkflow } from '../../core/interfaces/IResearchWorkflow.js';
import { createLogger } from '../../utils/logger.js';
import {
  CircuitBreaker,
  CircuitBreakerStats,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  isRetryableError,
  withRetry,
} from '../../utils/retry.js';

const log = createLogger('ResearchClient');

const ResearchOutcomeSchema = z.object({
  success: z.boolean(),
  report: z.string().optional(),
  summary: z.record(z.unknown()).optional(),
  compliance: z.record(z.unknown()).optional(),
  logs: z.array(z.unknown()).optional(),
  error: z.string().optional(),
});

/**
 * Research workflow served by a remote agent over HTTP.
 * POST <apiUrl>/research with { query }; GET <apiUrl>/health for liveness.
 */
export class HttpResearchWorkflow implements IResearchWorkflow {
  private apiUrl: string;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;

  constructor(apiUrl: string, circuitBreaker?: CircuitBreaker, retryConfig?: RetryConfig) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
    this.circuitBreaker = circuitBreaker || new CircuitBreaker(5, 60000);
    const config = retryConfig || DEFAULT_RETRY_CONFIG;
    // Client errors (4xx) will not succeed on a second attempt
    this.retryConfig = { ...config, retryIf: config.retryIf ?? isRetryableError };
  }

  async run(query: string): Promise<ResearchOutcome> {
    const body = await this.circuitBreaker.execute(async () => {
      return withRetry(
        async () => {
          const res = await fetch(`${this.apiUrl}/research`, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
            },
            body: JSON.stringify({ query }),
          });

          if (!res.ok) {
            throw new Error(`HTTP error! status: ${res.status}`);
          }

          const data: unknown = await res.json();
          return data;
        },
        this.retryConfig,
        (entry) => {
          if (!entry.success) {
            log.warn(
              `Research request attempt ${entry.attempt} failed: ${entry.error}` +
                (entry.nextRetryInMs !== undefined ? ` (retrying in ${entry.nextRetryInMs}ms)` : '')
            );
          }
        }
      );
    });

    const parsed = ResearchOutcomeSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid research response: ${issues.join('; ')}`);
    }
    return parsed.data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await withRetry(
        async () => {
          const response = await fetch(`${this.apiUrl}/health`, { method: 'GET' });
          if (!response.ok) throw new Error(`HTTP error! status: ${response.status}`);
          return response;
        },
        { ...this.retryConfig, maxAttempts: 2 }
      );
      return res.ok;
    } catch (error) {
      log.debug('Research backend health check failed:', error);
      return false;
    }
  }

  getCircuitBreakerStats(): CircuitBreakerStats {
    return this.circuitBreaker.getStats();
  }
}
