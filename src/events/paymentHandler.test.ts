import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../errors';
import { createTestContext } from '../test-utils/fixtures';
import { handlePaymentCallback, handlePaymentRequest } from './paymentHandler';

describe('handlePaymentRequest', () => {
    it('creates a pending payment expiring after the configured TTL', async () => {
        const { context } = createTestContext();

        const { payment, link } = await handlePaymentRequest(context, 's001', 500);

        expect(payment).toMatchObject({
            studentId: 's001',
            amount: 500,
            status: 'pending',
            created: '2026-01-10T08:00:00Z',
            expiresAt: '2026-01-10T09:00:00Z'
        });
        expect(link).toBe(`https://payments.example/university/pay/${payment.id}`);
        expect(context.state.auditLogs[0].details).toEqual({ paymentId: payment.id, amount: 500 });
    });
});

describe('handlePaymentCallback', () => {
    it('completes the payment and credits the fee account', async () => {
        const { context } = createTestContext();
        const { payment } = await handlePaymentRequest(context, 's001', 500);

        const completed = await handlePaymentCallback(context, payment.id);

        expect(completed.status).toBe('completed');
        expect(completed.completedAt).toBe('2026-01-10T08:00:00Z');
        expect(context.state.fees.get('s001')).toEqual({
            balance: 1000,
            items: [
                { desc: 'Tuition', amount: 1500 },
                { desc: 'Online payment', amount: -500 }
            ]
        });
    });

    it('never takes a balance below zero', async () => {
        const { context } = createTestContext();
        const { payment } = await handlePaymentRequest(context, 's002', 100);

        await handlePaymentCallback(context, payment.id);

        expect(context.state.fees.get('s002')?.balance).toBe(0);
    });

    it('ignores a repeated callback', async () => {
        const { context } = createTestContext();
        const { payment } = await handlePaymentRequest(context, 's001', 200);

        await handlePaymentCallback(context, payment.id);
        await handlePaymentCallback(context, payment.id);

        expect(context.state.fees.get('s001')?.balance).toBe(1300);
        expect(context.state.auditLogs.map(entry => entry.action)).toEqual(['generate_payment', 'payment_completed']);
    });

    it('completes payments of students without a fee account', async () => {
        const { context } = createTestContext();
        const { payment } = await handlePaymentRequest(context, 's777', 50);

        const completed = await handlePaymentCallback(context, payment.id);

        expect(completed.status).toBe('completed');
        expect(context.state.fees.has('s777')).toBe(false);
    });

    it('rejects unknown payments', async () => {
        const { context } = createTestContext();

        await expect(handlePaymentCallback(context, 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });
});
