/**
 * Audit log domain entity
 */
export const AUDIT_LOG_TYPES = ['info', 'warning', 'error', 'success', 'stage', 'status'] as const;

export type AuditLogType = (typeof AUDIT_LOG_TYPES)[number];

/**
 * One line of a session's JSONL audit file
 */
export interface AuditEntry {
  timestamp: string;
  type: AuditLogType;
  message: string;
  metadata: Record<string, unknown>;
  session_id: string;
}

export interface AuditReport {
  session_id: string;
  generated_at: string;
  total_entries: number;
  counts_by_type: Record<AuditLogType, number>;
  first_entry_at: string | null;
  last_entry_at: string | null;
  job: Record<string, unknown> | null;
  entries: AuditEntry[];
}
