import { describe, it, expect } from 'vitest';
import { createTestClock, createTestContext } from '../test-utils/fixtures';
import { handleOtpConfirm, handleOtpRequest } from './otpHandler';

describe('OTP verification', () => {
    it('issues a six character code valid for five minutes', async () => {
        const { context } = createTestContext();

        const record = await handleOtpRequest(context, 's001');

        expect(record.code).toMatch(/^[0-9a-f]{6}$/);
        expect(record.expiresAt).toBe('2026-01-10T08:05:00Z');
    });

    it('verifies the right code once', async () => {
        const { context } = createTestContext();
        const { code } = await handleOtpRequest(context, 's001');

        expect(await handleOtpConfirm(context, 's001', code)).toEqual({ verified: true });
        expect(await handleOtpConfirm(context, 's001', code)).toEqual({
            verified: false,
            reason: 'no_otp_requested'
        });
    });

    it('keeps the code after a wrong guess', async () => {
        const { context } = createTestContext();
        const { code } = await handleOtpRequest(context, 's001');

        expect(await handleOtpConfirm(context, 's001', 'zzzzzz')).toEqual({ verified: false, reason: 'invalid_code' });
        expect(await handleOtpConfirm(context, 's001', code)).toEqual({ verified: true });
    });

    it('refuses an expired code', async () => {
        const clock = createTestClock();
        const { context } = createTestContext(clock);
        const { code } = await handleOtpRequest(context, 's001');

        clock.advanceMinutes(6);

        expect(await handleOtpConfirm(context, 's001', code)).toEqual({ verified: false, reason: 'expired' });
        expect(context.state.otps.has('s001')).toBe(true);
    });

    it('audits request and verification', async () => {
        const { context } = createTestContext();
        const { code } = await handleOtpRequest(context, 's001');
        await handleOtpConfirm(context, 's001', code);

        expect(context.state.auditLogs.map(entry => entry.action)).toEqual(['otp_requested', 'otp_verified']);
    });
});
