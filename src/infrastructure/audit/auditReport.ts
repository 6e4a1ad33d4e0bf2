import { AuditEntry, AuditLogType, AuditReport } from '../../core/entities/AuditEntry.js';

/**
 * Summarize a session's audit trail for postmortem inspection
 */
export function buildAuditReport(
  sessionId: string,
  entries: AuditEntry[],
  job: Record<string, unknown> | null = null,
  generatedAt: Date = new Date()
): AuditReport {
  const countsByType: Record<AuditLogType, number> = {
    info: 0,
    warning: 0,
    error: 0,
    success: 0,
    stage: 0,
    status: 0,
  };
  for (const entry of entries) {
    countsByType[entry.type] += 1;
  }

  return {
    session_id: sessionId,
    generated_at: generatedAt.toISOString(),
    total_entries: entries.length,
    counts_by_type: countsByType,
    first_entry_at: entries.length > 0 ? entries[0].timestamp : null,
    last_entry_at: entries.length > 0 ? entries[entries.length - 1].timestamp : null,
    job,
    entries,
  };
}
