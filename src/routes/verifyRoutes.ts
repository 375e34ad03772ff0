// src/routes/verifyRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { handleOtpConfirm, handleOtpRequest } from '../events/otpHandler';
import { parseBody, requiredString } from './validation';

const requestSchema = z.object({
    student_id: requiredString('student_id')
});

const confirmRequired = 'student_id and otp required';

const confirmSchema = z.object({
    student_id: z.string({ required_error: confirmRequired }).min(1, confirmRequired),
    otp: z.string({ required_error: confirmRequired }).min(1, confirmRequired)
});

/**
 * OTP identity check routes - HTTP mapping only
 */
export function createVerifyRoutes(context: HelpdeskContext): Router {
    const router = Router();

    /**
     * POST /verify/otp/request
     * Body: { student_id }
     */
    router.post('/otp/request', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(requestSchema, req.body);
            const record = await handleOtpRequest(context, body.student_id);
            res.json({ student_id: body.student_id, otp: record.code, expires_at: record.expiresAt });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /verify/otp/confirm
     * Body: { student_id, otp }
     */
    router.post('/otp/confirm', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(confirmSchema, req.body);
            const verification = await handleOtpConfirm(context, body.student_id, body.otp);
            res.status(verification.verified ? 200 : 400).json(verification);
        } catch (error) {
            next(error);
        }
    });

    return router;
}
