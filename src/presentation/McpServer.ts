import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { JobService } from '../application/services/JobService.js';
import { StageRunner } from '../application/services/StageRunner.js';
import { createDefaultStageHandlers } from '../application/stages/index.js';
import { Config } from '../config.js';
import { IResearchWorkflow } from '../core/interfaces/IResearchWorkflow.js';
import { FileAuditLog } from '../infrastructure/audit/FileAuditLog.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { JobRepository } from '../infrastructure/database/repositories/JobRepository.js';
import { JobRegistry } from '../infrastructure/queue/JobRegistry.js';
import { JobScheduler } from '../infrastructure/queue/JobScheduler.js';
import { HttpResearchWorkflow } from '../infrastructure/research/HttpResearchWorkflow.js';
import { SimulatedResearchWorkflow } from '../infrastructure/research/SimulatedResearchWorkflow.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { createLogger, setDebug } from '../utils/logger.js';
import { CircuitBreaker, RetryConfig } from '../utils/retry.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { registerJobManagementTools } from './tools/JobManagementTools.js';

const log = createLogger('Server');

export interface McpServerOverrides {
  /** Replaces the workflow chosen from config.research */
  workflow?: IResearchWorkflow;
}

/**
 * Main server class that wires all components together: persistence, the
 * job core, the REST/WebSocket API and the MCP tools
 */
export class McpServer {
  private server: BaseMcpServer | null = null;
  private dbConnection: DatabaseConnection | null = null;
  private webServer: WebServer | null = null;
  private registry: JobRegistry;
  private auditLog: FileAuditLog;
  private workflow: IResearchWorkflow;
  private jobService: JobService;

  constructor(
    private config: Config,
    overrides: McpServerOverrides = {}
  ) {
    setDebug(config.server.debug);

    // Initialize database
    let jobRepo: JobRepository | undefined;
    if (config.database.enabled) {
      this.dbConnection = new DatabaseConnection(config.database.path);
      jobRepo = new JobRepository(this.dbConnection.getDatabase());
    }

    this.registry = new JobRegistry({
      defaultMaxRetries: config.jobs.maxRetries,
      repository: jobRepo,
    });
    this.auditLog = new FileAuditLog({
      directory: config.audit.directory,
      tailSize: config.audit.tailSize,
    });

    this.workflow = overrides.workflow ?? this.createWorkflow();

    const runner = new StageRunner(
      this.registry,
      createDefaultStageHandlers(this.workflow),
      this.auditLog,
      config.pacing
    );
    const scheduler = new JobScheduler(this.registry, runner, {
      maxConcurrent: config.jobs.maxConcurrentJobs,
      backoff: {
        initialDelayMs: config.jobs.retryInitialDelayMs,
        maxDelayMs: config.jobs.retryMaxDelayMs,
        multiplier: config.jobs.retryMultiplier,
      },
    });
    scheduler.jobFinishedCallback = (outcome) => {
      log.debug(`Job ${outcome.jobId} finished with outcome ${outcome.status}`);
    };

    this.jobService = new JobService(this.registry, scheduler, this.auditLog);

    if (config.webServer.enabled) {
      this.webServer = new WebServer(this.jobService, this.registry, this.auditLog, {
        port: config.webServer.port,
        streamIntervalMs: config.audit.streamIntervalMs,
      });
    }

    if (config.mcp.enabled) {
      this.server = new BaseMcpServer({
        name: config.server.name,
        version: config.server.version,
      });
      this.registerToolsForServer(this.server);
    }
  }

  private createWorkflow(): IResearchWorkflow {
    const { research, jobs } = this.config;
    if (!research.apiUrl) {
      log.warn('RESEARCH_API_URL not set, using the simulated research workflow');
      return new SimulatedResearchWorkflow();
    }

    const retryConfig: RetryConfig = {
      maxAttempts: research.retryAttempts,
      initialDelayMs: jobs.retryInitialDelayMs,
      maxDelayMs: jobs.retryMaxDelayMs,
      multiplier: jobs.retryMultiplier,
      timeoutMs: research.timeoutMs,
    };
    return new HttpResearchWorkflow(research.apiUrl, new CircuitBreaker(5, 60000), retryConfig);
  }

  /**
   * Register tools on a specific server instance
   */
  registerToolsForServer(server: BaseMcpServer) {
    registerJobManagementTools(server, this.jobService);
    registerHealthCheckTool(server, this.jobService, this.workflow, this.dbConnection);
  }

  getJobService(): JobService {
    return this.jobService;
  }

  getWebServer(): WebServer | null {
    return this.webServer;
  }

  /**
   * Print database statistics
   */
  printStats() {
    if (!this.dbConnection) return;
    const stats = this.dbConnection.getStatistics();
    console.error(
      `📊 Database Statistics: ${stats.jobStats.total} jobs, ${stats.totalHistoryRecords} history records, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
    console.error(
      `📋 Job Statistics: ${stats.jobStats.pending} pending, ${stats.jobStats.retry} retry, ${stats.jobStats.completed} completed, ${stats.jobStats.failed} failed, ${stats.jobStats.cancelled} cancelled`
    );
  }

  /**
   * Start the server
   */
  async start() {
    if (this.dbConnection) {
      log.debug(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);
    }

    this.jobService.restoreIncompleteJobs();
    this.jobService.startCleanupSweep(
      this.config.jobs.cleanupIntervalMinutes,
      this.config.jobs.cleanupMaxAgeHours
    );

    if (this.webServer) {
      await this.webServer.start();
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        log.warn(`stdin error (non-fatal): ${error.message}`);
      });
      process.stdin.on('end', () => {
        log.warn('stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      log.info('✅ MCP server running on stdio');
    }
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    log.info('👋 Shutting down gracefully...');

    if (this.webServer) {
      await this.webServer.stop();
    }
    if (this.server) {
      await this.server.close();
    }

    await this.jobService.shutdown();
    this.dbConnection?.close();
  }
}
