// src/events/leaveHandler.ts

import { randomUUID } from 'crypto';
import { LeavePolicy } from '../config';
import { HelpdeskContext } from '../context';
import { decide } from '../engine/approvalRule';
import { ValidationError } from '../errors';
import { LeaveRequest } from '../models/Helpdesk';
import { recordAudit } from '../store/auditLog';
import { MS_PER_DAY, parseTimestamp, toIsoSeconds } from '../utils/time';

export interface LeaveApplication {
    studentId: string;
    startDate: string;
    endDate: string;
    reason: string;
    leaveType?: string;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2})?)?$/;

function parseLeaveDate(value: string): Date {
    const parsed = ISO_DATE.test(value) ? parseTimestamp(value) : null;
    if (!parsed) {
        throw new ValidationError('dates must be ISO format YYYY-MM-DD or YYYY-MM-DDTHH:MM:SS');
    }
    return parsed;
}

/**
 * Whole calendar days covered, both ends inclusive
 *
 * @throws ValidationError on unparseable dates or end before start
 */
export function leaveDurationDays(startDate: string, endDate: string): number {
    const start = parseLeaveDate(startDate);
    const end = parseLeaveDate(endDate);
    if (end.getTime() < start.getTime()) {
        throw new ValidationError('end_date must not be before start_date');
    }
    return Math.floor((end.getTime() - start.getTime()) / MS_PER_DAY) + 1;
}

/**
 * Pick the auto-approval rule for an application
 *
 * - leave_type given: short leave of a non-restricted type
 * - otherwise: short leave with a reason
 */
export function decideLeave(application: LeaveApplication, durationDays: number, policy: LeavePolicy) {
    if (application.leaveType) {
        const restricted = policy.restrictedTypes.includes(application.leaveType.toLowerCase());
        return decide(durationDays, !restricted, policy.typeThresholdDays);
    }
    return decide(durationDays, application.reason.length > 0, policy.reasonThresholdDays);
}

/**
 * Handle leave application event
 *
 * State transition: none → APPROVED | PENDING
 */
export async function handleLeaveApplication(
    context: HelpdeskContext,
    application: LeaveApplication
): Promise<LeaveRequest> {
    const durationDays = leaveDurationDays(application.startDate, application.endDate);
    const status = decideLeave(application, durationDays, context.config.leavePolicy);

    const request: LeaveRequest = {
        id: randomUUID(),
        studentId: application.studentId,
        start: application.startDate,
        end: application.endDate,
        reason: application.reason,
        ...(application.leaveType ? { leaveType: application.leaveType } : {}),
        status,
        durationDays,
        created: toIsoSeconds(context.clock())
    };
    context.state.leaveRequests.set(request.id, request);

    recordAudit(context.audit, context.logger, request.studentId, 'leave_applied', {
        leaveId: request.id,
        status
    });
    await context.state.persist();

    return request;
}
