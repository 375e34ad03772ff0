import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { ValidationError } from '../errors';
import { createTestContext } from '../test-utils/fixtures';
import { decideLeave, handleLeaveApplication, leaveDurationDays, LeaveApplication } from './leaveHandler';

const policy = loadConfig({}).leavePolicy;

function application(overrides: Partial<LeaveApplication> = {}): LeaveApplication {
    return {
        studentId: 's001',
        startDate: '2026-02-02',
        endDate: '2026-02-04',
        reason: '',
        ...overrides
    };
}

describe('leaveDurationDays', () => {
    it('counts both ends of a date range', () => {
        expect(leaveDurationDays('2026-02-02', '2026-02-04')).toBe(3);
        expect(leaveDurationDays('2026-02-02', '2026-02-02')).toBe(1);
    });

    it('counts whole elapsed days for date-times', () => {
        expect(leaveDurationDays('2026-02-02T10:00:00', '2026-02-03T09:00:00')).toBe(1);
    });

    it('rejects dates that are not ISO formatted', () => {
        expect(() => leaveDurationDays('next monday', '2026-02-04')).toThrow(ValidationError);
    });

    it('rejects an end before the start', () => {
        expect(() => leaveDurationDays('2026-02-04', '2026-02-02')).toThrow('end_date must not be before start_date');
    });
});

describe('decideLeave', () => {
    it('approves short leave with a reason', () => {
        expect(decideLeave(application({ reason: 'family visit' }), 3, policy)).toBe('approved');
        expect(decideLeave(application({ reason: 'family visit' }), 4, policy)).toBe('pending');
        expect(decideLeave(application(), 1, policy)).toBe('pending');
    });

    it('approves short leave of an unrestricted type', () => {
        expect(decideLeave(application({ leaveType: 'casual' }), 2, policy)).toBe('approved');
        expect(decideLeave(application({ leaveType: 'casual' }), 3, policy)).toBe('pending');
        expect(decideLeave(application({ leaveType: 'Medical', reason: 'flu' }), 1, policy)).toBe('pending');
    });
});

describe('handleLeaveApplication', () => {
    it('stores the request and audits the decision', async () => {
        const { context, persistence } = createTestContext();

        const request = await handleLeaveApplication(context, application({ reason: 'family visit' }));

        expect(request).toMatchObject({
            studentId: 's001',
            start: '2026-02-02',
            end: '2026-02-04',
            status: 'approved',
            durationDays: 3,
            created: '2026-01-10T08:00:00Z'
        });
        expect(request.leaveType).toBeUndefined();
        expect(context.state.leaveRequests.get(request.id)).toBe(request);
        expect(context.state.auditLogs.map(entry => entry.action)).toEqual(['leave_applied']);
        expect(context.state.auditLogs[0].details).toEqual({ leaveId: request.id, status: 'approved' });
        expect(persistence.saves).toBe(1);
    });
});
