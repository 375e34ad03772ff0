// src/events/otpHandler.ts

import { randomUUID } from 'crypto';
import { HelpdeskContext } from '../context';
import { OtpRecord } from '../models/Helpdesk';
import { recordAudit } from '../store/auditLog';
import { addMinutes, parseTimestamp, toIsoSeconds } from '../utils/time';

export type OtpFailureReason = 'no_otp_requested' | 'invalid_code' | 'expired';

export type OtpVerification =
    | { verified: true }
    | { verified: false; reason: OtpFailureReason };

/**
 * Issue a one-time code for a student, replacing any earlier one
 *
 * Nothing is delivered; the code goes back to the caller.
 */
export async function handleOtpRequest(context: HelpdeskContext, studentId: string): Promise<OtpRecord> {
    const record: OtpRecord = {
        code: randomUUID().replace(/-/g, '').slice(0, 6),
        expiresAt: toIsoSeconds(addMinutes(context.clock(), context.config.otpTtlMinutes))
    };
    context.state.otps.set(studentId, record);

    recordAudit(context.audit, context.logger, studentId, 'otp_requested');
    await context.state.persist();

    return record;
}

/**
 * Check a code; a verified code is consumed, a failed check leaves it in place
 */
export async function handleOtpConfirm(
    context: HelpdeskContext,
    studentId: string,
    code: string
): Promise<OtpVerification> {
    const record = context.state.otps.get(studentId);
    if (!record) {
        return { verified: false, reason: 'no_otp_requested' };
    }

    if (record.code !== code) {
        return { verified: false, reason: 'invalid_code' };
    }

    const expiresAt = parseTimestamp(record.expiresAt);
    if (!expiresAt || expiresAt.getTime() < context.clock().getTime()) {
        return { verified: false, reason: 'expired' };
    }

    context.state.otps.delete(studentId);
    recordAudit(context.audit, context.logger, studentId, 'otp_verified');
    await context.state.persist();

    return { verified: true };
}
