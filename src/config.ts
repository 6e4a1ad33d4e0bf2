import * as dotenv from 'dotenv';
import { z } from 'zod';
import { JobStage, STAGE_ORDER } from './core/entities/Job.js';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  jobs: {
    maxConcurrentJobs: number;
    maxRetries: number;
    retryInitialDelayMs: number;
    retryMaxDelayMs: number;
    retryMultiplier: number;
    cleanupMaxAgeHours: number;
    cleanupIntervalMinutes: number;
  };
  pacing: {
    stageDelaysMs: Record<JobStage, number>;
    subSteps: number;
    scale: number;
  };
  research: {
    apiUrl?: string;
    timeoutMs: number;
    retryAttempts: number;
  };
  audit: {
    directory: string;
    streamIntervalMs: number;
    tailSize: number;
  };
  database: {
    enabled: boolean;
    path: string;
  };
  webServer: {
    enabled: boolean;
    port: number;
  };
  mcp: {
    enabled: boolean;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_STAGE_DELAYS_MS: Record<JobStage, number> = {
  initialization: 2000,
  document_retrieval: 3000,
  web_research: 4000,
  citation_verification: 2000,
  compliance_check: 2000,
  report_generation: 3000,
  finalization: 1000,
};

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  jobs: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(32),
    maxRetries: z.number().int().min(0).max(10),
    retryInitialDelayMs: z.number().int().min(0).max(60000),
    retryMaxDelayMs: z.number().int().min(0).max(600000),
    retryMultiplier: z.number().min(1).max(10),
    cleanupMaxAgeHours: z.number().positive(),
    cleanupIntervalMinutes: z.number().positive(),
  }),
  pacing: z.object({
    stageDelaysMs: z.record(z.enum(STAGE_ORDER), z.number().int().min(0)),
    subSteps: z.number().int().min(0).max(100),
    scale: z.number().min(0),
  }),
  research: z.object({
    apiUrl: z.string().url('Invalid research API URL format').optional(),
    timeoutMs: z.number().int().min(1000),
    retryAttempts: z.number().int().min(1).max(10),
  }),
  audit: z.object({
    directory: z.string().min(1),
    streamIntervalMs: z.number().int().min(50),
    tailSize: z.number().int().min(1),
  }),
  database: z.object({
    enabled: z.boolean(),
    path: z.string().min(1),
  }),
  webServer: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(0).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --research-url http://localhost:9000 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

export interface ConfigSources {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  /** Load `.env` into process.env first (on by default for the real process) */
  loadDotenv?: boolean;
}

/**
 * Get configuration from CLI arguments, environment variables or defaults,
 * in that order of precedence. Throws ConfigError when validation fails.
 */
export function getConfig(sources: ConfigSources = {}): Config {
  if (sources.loadDotenv ?? sources.env === undefined) {
    dotenv.config();
  }
  const cliArgs = parseArgs(sources.argv ?? process.argv.slice(2));
  const env = sources.env ?? process.env;

  // Helpers to get a value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return cli;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return cli;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cli = cliArgs[cliKey];
    if (cli !== undefined) return cli === true || cli === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string') return Number(cli);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const stageDelaysMs = { ...DEFAULT_STAGE_DELAYS_MS };
  for (const stage of STAGE_ORDER) {
    const flag = `${stage.replace(/_/g, '-')}-delay-ms`;
    const envKey = `STAGE_DELAY_${stage.toUpperCase()}_MS`;
    stageDelaysMs[stage] = getNumber(flag, envKey, DEFAULT_STAGE_DELAYS_MS[stage]);
  }

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'research-job-server'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    jobs: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 3),
      maxRetries: getNumber('max-retries', 'JOB_MAX_RETRIES', 3),
      retryInitialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
      retryMaxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
      retryMultiplier: getNumber('retry-multiplier', 'RETRY_MULTIPLIER', 2),
      cleanupMaxAgeHours: getNumber('cleanup-max-age-hours', 'CLEANUP_MAX_AGE_HOURS', 24),
      cleanupIntervalMinutes: getNumber('cleanup-interval-minutes', 'CLEANUP_INTERVAL_MINUTES', 60),
    },
    pacing: {
      stageDelaysMs,
      subSteps: getNumber('pacing-sub-steps', 'PACING_SUB_STEPS', 5),
      scale: getNumber('pacing-scale', 'PACING_SCALE', 1),
    },
    research: {
      apiUrl: getOptionalString('research-url', 'RESEARCH_API_URL'),
      timeoutMs: getNumber('research-timeout', 'RESEARCH_TIMEOUT_MS', 600000),
      retryAttempts: getNumber('research-retry-attempts', 'RESEARCH_RETRY_ATTEMPTS', 2),
    },
    audit: {
      directory: getString('audit-dir', 'AUDIT_LOG_DIR', './audit_logs'),
      streamIntervalMs: getNumber('stream-interval', 'STREAM_INTERVAL_MS', 500),
      tailSize: getNumber('audit-tail-size', 'AUDIT_TAIL_SIZE', 200),
    },
    database: {
      enabled: getBoolean('database', 'DATABASE_ENABLED', true),
      path: getString('database-path', 'DATABASE_PATH', 'data/jobs.db'),
    },
    webServer: {
      enabled: getBoolean('web-server', 'WEB_SERVER_ENABLED', true),
      port: getNumber('port', 'PORT', 8000),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', false),
    },
  };

  // Validate configuration
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`);
    console.error('\n❌ Configuration Validation Failed!\n');
    console.error('Errors:');
    issues.forEach((issue) => console.error(`  • ${issue}`));
    console.error('\n💡 Tips:');
    console.error('  - Check your .env file');
    console.error('  - Verify CLI arguments');
    console.error('  - The research URL must be valid (e.g., http://localhost:9000)');
    console.error();
    throw new ConfigError(issues);
  }

  return { ...parsed.data, pacing: { ...parsed.data.pacing, stageDelaysMs } };
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔════════════════════════════════════════════════════════════════════╗');
  console.error('║              Research Job Server - Configuration                   ║');
  console.error('╚════════════════════════════════════════════════════════════════════╝');

  console.error(
    `\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`
  );
  console.error(`🔬 Research: ${config.research.apiUrl ?? 'simulated (no RESEARCH_API_URL)'}`);

  console.error(
    `\n⚙️  Jobs: ${config.jobs.maxConcurrentJobs} concurrent | Retry: ${config.jobs.maxRetries}x (${config.jobs.retryInitialDelayMs}-${config.jobs.retryMaxDelayMs}ms)`
  );
  console.error(
    `⏱️  Pacing: ${config.pacing.subSteps} sub-steps per stage, scale ${config.pacing.scale}`
  );
  console.error(`🧹 Cleanup: every ${config.jobs.cleanupIntervalMinutes}m, max age ${config.jobs.cleanupMaxAgeHours}h`);
  console.error(`📝 Audit logs: ${config.audit.directory}`);
  console.error(`💾 Database: ${config.database.enabled ? config.database.path : 'disabled (in-memory only)'}`);

  if (config.webServer.enabled) {
    console.error(`\n🌐 API: http://localhost:${config.webServer.port}/api`);
    console.error(`   Stream: ws://localhost:${config.webServer.port}/ws?session=<job_id>`);
  }

  console.error(`\n📡 MCP: ${config.mcp.enabled ? 'STDIO mode' : 'disabled'}`);

  console.error('\n' + '─'.repeat(70));
}
