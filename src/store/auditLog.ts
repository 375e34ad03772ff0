// src/store/auditLog.ts

import { randomUUID } from 'crypto';
import { AuditEntry } from '../models/Audit';
import { Logger } from '../utils/logger';
import { Clock, systemClock, toIsoSeconds } from '../utils/time';

/**
 * Append-only audit sink
 */
export interface AuditSink {
    record(actor: string, action: string, details?: Record<string, unknown>): void;
}

/**
 * Audit sink appending to a shared in-memory array
 */
export class AuditLog implements AuditSink {
    private entries: AuditEntry[];
    private clock: Clock;

    constructor(entries: AuditEntry[] = [], clock: Clock = systemClock) {
        this.entries = entries;
        this.clock = clock;
    }

    record(actor: string, action: string, details: Record<string, unknown> = {}): void {
        this.entries.push({
            id: randomUUID(),
            timestamp: toIsoSeconds(this.clock()),
            actor,
            action,
            details
        });
    }

    /**
     * Entries at or after `since`, oldest first; all entries when omitted
     */
    list(since?: Date): AuditEntry[] {
        if (!since) {
            return [...this.entries];
        }
        return this.entries.filter(entry => new Date(entry.timestamp).getTime() >= since.getTime());
    }
}

/**
 * Record without ever failing the caller - audit is best-effort
 */
export function recordAudit(
    sink: AuditSink,
    logger: Logger,
    actor: string,
    action: string,
    details?: Record<string, unknown>
): void {
    try {
        sink.record(actor, action, details);
    } catch (err) {
        logger.warn(`Audit write failed for ${action} by ${actor}`, err);
    }
}
