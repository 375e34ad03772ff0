// src/routes/feesRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { handlePaymentCallback, handlePaymentRequest } from '../events/paymentHandler';
import { recordAudit } from '../store/auditLog';
import { parseBody } from './validation';

const paymentSchema = z.object({
    amount: z
        .number({ required_error: 'amount required', invalid_type_error: 'amount must be a number' })
        .positive('amount must be positive')
});

/**
 * Fees routes - HTTP mapping only
 */
export function createFeesRoutes(context: HelpdeskContext): Router {
    const router = Router();

    /**
     * Create a payment link
     * POST /fees/pay/:studentId
     * Body: { amount }
     */
    router.post('/pay/:studentId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(paymentSchema, req.body);
            const { payment, link } = await handlePaymentRequest(context, req.params.studentId, body.amount);
            res.json({ payment_id: payment.id, payment_link: link, expires_at: payment.expiresAt });
        } catch (error) {
            next(error);
        }
    });

    /**
     * Payment provider callback
     * POST /fees/pay/callback/:paymentId
     */
    router.post('/pay/callback/:paymentId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const payment = await handlePaymentCallback(context, req.params.paymentId);
            res.json({ ok: true, payment_id: payment.id });
        } catch (error) {
            next(error);
        }
    });

    /**
     * Fee account for a student (empty account when unknown)
     * GET /fees/:studentId
     */
    router.get('/:studentId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const studentId = req.params.studentId;
            const account = context.state.fees.get(studentId) ?? { balance: 0, items: [] };

            recordAudit(context.audit, context.logger, studentId, 'check_fees');
            await context.state.persist();

            res.json({ student_id: studentId, balance: account.balance, items: account.items });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
