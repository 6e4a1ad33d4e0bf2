import { WebSocket } from 'ws';
import { JobView, toJobView } from '../../core/entities/Job.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import { JobRegistry } from '../queue/JobRegistry.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('JobStream');

export type StreamMessage =
  | { type: 'state'; data: JobView }
  | { type: 'log'; data: unknown }
  | { type: 'error'; error: string };

/**
 * Live view of one session over a WebSocket: the current state right away,
 * then every interval the log entries appended since the last tick followed
 * by the state again. Runs until the socket closes.
 */
export class JobStream {
  private timer?: NodeJS.Timeout;
  private cursor = 0;

  constructor(
    private socket: WebSocket,
    private sessionId: string,
    private registry: JobRegistry,
    private auditLog: IAuditLog,
    private intervalMs: number = 500
  ) {}

  start(): void {
    // Listeners go on first: an unknown session closes the socket right away
    this.socket.on('close', () => this.stop());
    this.socket.on('error', (error) => {
      log.error(`Stream for session ${this.sessionId} failed:`, error);
      this.stop();
    });

    if (!this.sendState()) {
      return;
    }

    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private tick(): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      this.stop();
      return;
    }

    const { entries, cursor } = this.auditLog.entriesSince(this.sessionId, this.cursor);
    this.cursor = cursor;
    for (const entry of entries) {
      this.send({ type: 'log', data: entry });
    }
    this.sendState();
  }

  /**
   * Returns false (and closes the socket) when the job does not exist
   */
  private sendState(): boolean {
    const job = this.registry.get(this.sessionId);
    if (!job) {
      this.send({ type: 'error', error: `Job ${this.sessionId} not found` });
      this.stop();
      this.socket.close(1008, 'Job not found');
      return false;
    }

    this.send({ type: 'state', data: toJobView(job) });
    return true;
  }

  private send(message: StreamMessage): void {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.send(JSON.stringify(message));
    }
  }
}
