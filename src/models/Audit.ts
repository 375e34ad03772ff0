// src/models/Audit.ts

/**
 * Append-only audit log entry
 */
export interface AuditEntry {
    id: string;
    timestamp: string;
    actor: string;
    action: string;
    details: Record<string, unknown>;
}
