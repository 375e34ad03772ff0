import { describe, it, expect, vi } from 'vitest';
import { AuditEntry } from '../models/Audit';
import { createTestClock } from '../test-utils/fixtures';
import { Logger } from '../utils/logger';
import { AuditLog, AuditSink, recordAudit } from './auditLog';

describe('AuditLog', () => {
    it('appends entries stamped by its clock', () => {
        const entries: AuditEntry[] = [];
        const log = new AuditLog(entries, createTestClock().now);

        log.record('s001', 'check_fees');

        expect(entries).toHaveLength(1);
        expect(entries[0]).toMatchObject({
            actor: 's001',
            action: 'check_fees',
            details: {},
            timestamp: '2026-01-10T08:00:00Z'
        });
    });

    it('lists entries at or after a point in time', () => {
        const clock = createTestClock();
        const log = new AuditLog([], clock.now);
        log.record('s001', 'first');
        clock.advanceMinutes(10);
        log.record('s001', 'second');

        expect(log.list(new Date('2026-01-10T08:10:00Z')).map(entry => entry.action)).toEqual(['second']);
        expect(log.list()).toHaveLength(2);
    });
});

describe('recordAudit', () => {
    it('logs and swallows sink failures', () => {
        const sink: AuditSink = {
            record: () => {
                throw new Error('disk full');
            }
        };
        const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

        expect(() => recordAudit(sink, logger, 's001', 'enrolled')).not.toThrow();
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });
});
