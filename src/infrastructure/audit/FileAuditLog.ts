import { appendFile, mkdir, readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { AUDIT_LOG_TYPES, AuditEntry, AuditLogType } from '../../core/entities/AuditEntry.js';
import { errorMessage } from '../../core/errors.js';
import { IAuditLog } from '../../core/interfaces/IAuditLog.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('AuditLog');

const AuditEntrySchema = z.object({
  timestamp: z.string(),
  type: z.enum(AUDIT_LOG_TYPES),
  message: z.string(),
  metadata: z.record(z.unknown()).default({}),
  session_id: z.string(),
});

export interface FileAuditLogOptions {
  directory: string;
  /** Entries kept in memory per session for the live stream */
  tailSize?: number;
  now?: () => Date;
}

interface SessionRing {
  /** Sequence number of entries[0] */
  offset: number;
  entries: AuditEntry[];
}

/**
 * Session file name; anything outside [A-Za-z0-9_-] is replaced so a session
 * id can never point outside the audit directory
 */
export function sessionFileName(sessionId: string): string {
  return `session_${sessionId.replace(/[^A-Za-z0-9_-]/g, '_')}.jsonl`;
}

/**
 * JSONL audit sink: one append-only file per session plus an in-memory ring
 * of the latest entries.
 *
 * Appends to the same session are chained so lines land in call order.
 */
export class FileAuditLog implements IAuditLog {
  private readonly directory: string;
  private readonly tailSize: number;
  private readonly now: () => Date;
  private rings: Map<string, SessionRing> = new Map();
  private writeChains: Map<string, Promise<void>> = new Map();
  private directoryReady?: Promise<void>;

  constructor(options: FileAuditLogOptions) {
    this.directory = options.directory;
    this.tailSize = Math.max(1, options.tailSize ?? 200);
    this.now = options.now ?? (() => new Date());
  }

  filePath(sessionId: string): string {
    return path.join(this.directory, sessionFileName(sessionId));
  }

  log(
    sessionId: string,
    type: AuditLogType,
    message: string,
    metadata: Record<string, unknown> = {}
  ): Promise<void> {
    return this.write(sessionId, {
      timestamp: this.now().toISOString(),
      type,
      message,
      metadata,
      session_id: sessionId,
    });
  }

  write(sessionId: string, entry: AuditEntry): Promise<void> {
    this.remember(sessionId, entry);

    const previous = this.writeChains.get(sessionId) ?? Promise.resolve();
    const next = previous.then(() => this.append(sessionId, entry));
    this.writeChains.set(sessionId, next);
    void next.then(() => {
      if (this.writeChains.get(sessionId) === next) {
        this.writeChains.delete(sessionId);
      }
    });
    return next;
  }

  private async append(sessionId: string, entry: AuditEntry): Promise<void> {
    try {
      await this.ensureDirectory();
      await appendFile(this.filePath(sessionId), JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      log.error(`Failed to write audit log for session ${sessionId}: ${errorMessage(error)}`);
    }
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = mkdir(this.directory, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.directoryReady = undefined;
          throw error;
        }
      );
    }
    return this.directoryReady;
  }

  private remember(sessionId: string, entry: AuditEntry): void {
    let ring = this.rings.get(sessionId);
    if (!ring) {
      ring = { offset: 0, entries: [] };
      this.rings.set(sessionId, ring);
    }

    ring.entries.push(entry);
    const overflow = ring.entries.length - this.tailSize;
    if (overflow > 0) {
      ring.entries.splice(0, overflow);
      ring.offset += overflow;
    }
  }

  tail(sessionId: string, count: number): AuditEntry[] {
    const ring = this.rings.get(sessionId);
    if (!ring || count <= 0) return [];
    return ring.entries.slice(-count);
  }

  /**
   * Entries with a sequence number at or after `cursor`. Entries that already
   * fell out of the ring are skipped.
   */
  entriesSince(sessionId: string, cursor: number): { entries: AuditEntry[]; cursor: number } {
    const ring = this.rings.get(sessionId);
    if (!ring) {
      return { entries: [], cursor };
    }

    const end = ring.offset + ring.entries.length;
    const start = Math.max(cursor, ring.offset) - ring.offset;
    return { entries: ring.entries.slice(start), cursor: Math.max(cursor, end) };
  }

  /**
   * Parse a session's audit file. Lines that are not valid entries are
   * skipped with a warning.
   */
  async readSession(sessionId: string): Promise<AuditEntry[]> {
    await this.writeChains.get(sessionId);

    let content: string;
    try {
      content = await readFile(this.filePath(sessionId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const entries: AuditEntry[] = [];
    const lines = content.split('\n');
    for (const [index, line] of lines.entries()) {
      if (!line.trim()) continue;
      try {
        const parsed = AuditEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          entries.push(parsed.data);
        } else {
          log.warn(`Skipping invalid audit entry at ${sessionFileName(sessionId)}:${index + 1}`);
        }
      } catch (error) {
        log.warn(
          `Skipping unreadable audit line at ${sessionFileName(sessionId)}:${index + 1}: ${errorMessage(error)}`
        );
      }
    }
    return entries;
  }

  /**
   * Drop the in-memory ring of a session. The file stays on disk.
   */
  forget(sessionId: string): void {
    this.rings.delete(sessionId);
  }

  /**
   * Wait for every pending append
   */
  async flush(): Promise<void> {
    await Promise.all(this.writeChains.values());
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
