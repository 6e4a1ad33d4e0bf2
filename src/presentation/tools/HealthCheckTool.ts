import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { JobService } from '../../application/services/JobService.js';
import { errorMessage } from '../../core/errors.js';
import { IResearchWorkflow } from '../../core/interfaces/IResearchWorkflow.js';
import { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';

interface ComponentHealth {
  status: 'healthy' | 'error' | 'disabled';
  message: string;
  [detail: string]: unknown;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    database: ComponentHealth;
    research: ComponentHealth;
    jobs: ReturnType<JobService['getStatistics']>;
  };
}

/**
 * Probe every component. A failing component degrades the report, it never
 * throws.
 */
export async function checkHealth(
  jobService: JobService,
  workflow: IResearchWorkflow,
  dbConnection: DatabaseConnection | null
): Promise<HealthReport> {
  const health: HealthReport = {
    timestamp: new Date().toISOString(),
    status: 'healthy',
    components: {
      database: { status: 'disabled', message: 'Persistence disabled' },
      research: { status: 'error', message: 'Not checked' },
      jobs: jobService.getStatistics(),
    },
  };

  // Check database
  if (dbConnection) {
    try {
      const stats = dbConnection.getStatistics();
      health.components.database = {
        status: 'healthy',
        message: `Database connected - ${stats.jobStats.total} jobs, ${stats.totalHistoryRecords} history records`,
        statistics: stats,
      };
    } catch (error) {
      health.components.database = { status: 'error', message: errorMessage(error) };
      health.status = 'degraded';
    }
  }

  // Check research backend
  try {
    if (await workflow.healthCheck()) {
      health.components.research = { status: 'healthy', message: 'Research workflow reachable' };
    } else {
      health.components.research = { status: 'error', message: 'Health check failed' };
      health.status = 'degraded';
    }
  } catch (error) {
    health.components.research = { status: 'error', message: errorMessage(error) };
    health.status = 'degraded';
  }

  const circuitBreaker = workflow.getCircuitBreakerStats?.();
  if (circuitBreaker) {
    health.components.research.circuitBreaker = circuitBreaker;
  }

  return health;
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(
  server: McpServer,
  jobService: JobService,
  workflow: IResearchWorkflow,
  dbConnection: DatabaseConnection | null
) {
  server.tool(
    'health-check',
    'Check the health of the server and its components (database, research backend, job counts)',
    {},
    async (): Promise<CallToolResult> => {
      try {
        const health = await checkHealth(jobService, workflow, dbConnection);
        return {
          content: [
            {
              type: 'text',
              text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [{ type: 'text', text: `Health check error: ${errorMessage(error)}` }],
        };
      }
    }
  );
}
