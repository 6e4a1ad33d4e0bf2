import { AuditEntry, AuditLogType } from '../entities/AuditEntry.js';

/**
 * Append-only audit sink, one log per session
 */
export interface IAuditLog {
  /**
   * Append an entry. Never rejects: write failures are logged by the sink.
   */
  write(sessionId: string, entry: AuditEntry): Promise<void>;

  /**
   * Build and append an entry stamped with the current time
   */
  log(
    sessionId: string,
    type: AuditLogType,
    message: string,
    metadata?: Record<string, unknown>
  ): Promise<void>;

  tail(sessionId: string, count: number): AuditEntry[];

  /**
   * Entries appended after `cursor`, plus the cursor to pass next time
   */
  entriesSince(sessionId: string, cursor: number): { entries: AuditEntry[]; cursor: number };

  readSession(sessionId: string): Promise<AuditEntry[]>;

  forget(sessionId: string): void;

  /**
   * Resolves once every pending append has landed
   */
  flush(): Promise<void>;
}
