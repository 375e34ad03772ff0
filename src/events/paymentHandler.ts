// src/events/paymentHandler.ts

import { randomUUID } from 'crypto';
import { HelpdeskContext } from '../context';
import { NotFoundError } from '../errors';
import { Payment } from '../models/Helpdesk';
import { recordAudit } from '../store/auditLog';
import { addMinutes, toIsoSeconds } from '../utils/time';

export interface PaymentLink {
    payment: Payment;
    link: string;
}

/**
 * Handle payment link request
 *
 * Creates a PENDING payment that expires after the configured TTL.
 * No money moves until the callback arrives.
 */
export async function handlePaymentRequest(
    context: HelpdeskContext,
    studentId: string,
    amount: number
): Promise<PaymentLink> {
    const { state, config } = context;
    const now = context.clock();

    const payment: Payment = {
        id: randomUUID(),
        studentId,
        amount,
        created: toIsoSeconds(now),
        status: 'pending',
        expiresAt: toIsoSeconds(addMinutes(now, config.paymentTtlMinutes))
    };
    state.payments.set(payment.id, payment);

    recordAudit(context.audit, context.logger, studentId, 'generate_payment', {
        paymentId: payment.id,
        amount
    });
    await state.persist();

    return { payment, link: `${config.paymentLinkBase}/${payment.id}` };
}

/**
 * Handle payment provider callback
 *
 * State transition: PENDING → COMPLETED
 *
 * Side effects:
 * 1. Balance reduced by the amount, never below zero
 * 2. Negative "Online payment" line added to the account
 *
 * A repeated callback for a completed payment changes nothing.
 */
export async function handlePaymentCallback(context: HelpdeskContext, paymentId: string): Promise<Payment> {
    const { state } = context;
    const payment = state.payments.get(paymentId);
    if (!payment) {
        throw new NotFoundError(`payment ${paymentId} not found`);
    }

    if (payment.status === 'completed') {
        return payment;
    }

    payment.status = 'completed';
    payment.completedAt = toIsoSeconds(context.clock());

    // Payments for students without a fee account are recorded but not applied
    const account = state.fees.get(payment.studentId);
    if (account) {
        account.balance = Math.max(0, account.balance - payment.amount);
        account.items.push({ desc: 'Online payment', amount: -payment.amount });
    }

    recordAudit(context.audit, context.logger, payment.studentId, 'payment_completed', { paymentId });
    await state.persist();

    return payment;
}
