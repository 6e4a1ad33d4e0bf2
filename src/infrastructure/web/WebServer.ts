import cors from 'cors';
import express, { Express, Request, Response } from 'express';
import { IncomingMessage, Server as HttpServer } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { JobService } from '../../application/services/JobService.js';
import { JOB_STATUSES, toExecutionRecordView, toJobView } from '../../core/entities/Job.js';
import { InvalidStateError, NotFoundError, errorMessage } from '../../core/errors.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import { createLogger } from '../../utils/logger.js';
import { JobRegistry, JobUpdateEvent } from '../queue/JobRegistry.js';
import { JobStream } from './JobStream.js';

const log = createLogger('WebServer');

const CreateJobSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  idempotency_key: z.string().min(1).optional(),
  max_retries: z.number().int().min(0).max(10).optional(),
});

const ListJobsSchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export interface WebServerOptions {
  port?: number;
  streamIntervalMs?: number;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private streams: Set<JobStream> = new Set();
  private unsubscribe?: () => void;
  private readonly port: number;
  private readonly streamIntervalMs: number;

  constructor(
    private jobService: JobService,
    private registry: JobRegistry,
    private auditLog: IAuditLog,
    options: WebServerOptions = {}
  ) {
    this.port = options.port ?? 8000;
    this.streamIntervalMs = options.streamIntervalMs ?? 500;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ success: true, data: { status: 'ok', timestamp: new Date().toISOString() } });
    });

    // API: Create job
    this.app.post('/api/jobs', (req: Request, res: Response) => {
      try {
        const body = CreateJobSchema.parse(req.body);
        const { job, created } = this.jobService.createJob(body.query, {
          idempotencyKey: body.idempotency_key,
          maxRetries: body.max_retries,
        });
        res.status(created ? 201 : 200).json({ success: true, data: toJobView(job) });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: List jobs
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      try {
        const query = ListJobsSchema.parse(req.query);
        const jobs = this.jobService.listJobs({ status: query.status, limit: query.limit });
        res.json({ success: true, data: jobs.map(toJobView) });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Get job by ID
    this.app.get('/api/jobs/:id', (req: Request, res: Response) => {
      try {
        res.json({ success: true, data: toJobView(this.jobService.getJob(req.params.id)) });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Cancel job
    this.app.post('/api/jobs/:id/cancel', (req: Request, res: Response) => {
      try {
        const job = this.jobService.cancelJob(req.params.id);
        res.json({ success: true, message: 'Cancellation requested', data: toJobView(job) });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Retry job
    this.app.post('/api/jobs/:id/retry', (req: Request, res: Response) => {
      try {
        const job = this.jobService.retryJob(req.params.id);
        res.json({ success: true, message: 'Job scheduled for retry', data: toJobView(job) });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Delete job
    this.app.delete('/api/jobs/:id', (req: Request, res: Response) => {
      try {
        this.jobService.deleteJob(req.params.id);
        res.json({ success: true, message: 'Job deleted' });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Execution history
    this.app.get('/api/jobs/:id/history', (req: Request, res: Response) => {
      try {
        const history = this.jobService.getExecutionHistory(req.params.id);
        res.json({ success: true, data: history.map(toExecutionRecordView) });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Audit report
    this.app.get('/api/jobs/:id/audit', async (req: Request, res: Response) => {
      try {
        const report = await this.jobService.getAuditReport(req.params.id);
        res.json({ success: true, data: report });
      } catch (error) {
        this.handleError(res, error);
      }
    });

    // API: Get statistics
    this.app.get('/api/stats', (_req: Request, res: Response) => {
      try {
        res.json({ success: true, data: this.jobService.getStatistics() });
      } catch (error) {
        this.handleError(res, error);
      }
    });
  }

  private handleError(res: Response, error: unknown): void {
    if (error instanceof NotFoundError) {
      res.status(404).json({ success: false, error: error.message });
    } else if (error instanceof InvalidStateError) {
      res.status(400).json({ success: false, error: error.message });
    } else if (error instanceof z.ZodError) {
      const details = error.errors.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
      res.status(400).json({ success: false, error: details.join('; ') });
    } else {
      log.error('Request failed:', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  }

  private setupWebSocket(httpServer: HttpServer): void {
    this.wss = new WebSocketServer({ server: httpServer, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      const session = new URL(req.url ?? '/ws', 'http://localhost').searchParams.get('session');

      if (session) {
        log.debug(`Stream opened for session ${session}`);
        const stream = new JobStream(ws, session, this.registry, this.auditLog, this.streamIntervalMs);
        this.streams.add(stream);
        ws.on('close', () => this.streams.delete(stream));
        stream.start();
        return;
      }

      log.debug('New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        log.debug('WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        log.error('WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });

    this.unsubscribe = this.registry.onJobUpdate((event) => this.notifyJobUpdate(event));
  }

  public broadcast(message: Record<string, unknown>): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  /**
   * Progress ticks are left to the per-session streams
   */
  public notifyJobUpdate(event: JobUpdateEvent): void {
    if (event.type === 'progress' || this.clients.size === 0) return;

    this.broadcast({
      type: 'job_updated',
      event: event.type,
      jobId: event.jobId,
      status: event.status,
      percentage: event.progress.percentage,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port the server listens on (differs from the configured one when 0 was
   * requested)
   */
  public getPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const httpServer = this.app.listen(this.port, () => {
        log.info(`API available at http://localhost:${this.getPort() ?? this.port}`);
        this.setupWebSocket(httpServer);
        resolve();
      });
      this.httpServer = httpServer;

      httpServer.on('error', (error) => {
        log.error('Server error:', error);
        reject(error);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      this.unsubscribe?.();

      this.streams.forEach((stream) => stream.stop());
      this.streams.clear();
      this.clients.clear();

      // Close all WebSocket connections
      if (this.wss) {
        this.wss.clients.forEach((client) => client.terminate());
        this.wss.close();
        this.wss = null;
      }

      // Close HTTP server
      if (this.httpServer) {
        this.httpServer.close(() => {
          log.info('HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}
