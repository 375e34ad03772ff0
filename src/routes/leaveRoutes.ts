// src/routes/leaveRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { handleLeaveApplication } from '../events/leaveHandler';
import { parseBody } from './validation';

const required = 'student_id, start_date and end_date required';

const leaveSchema = z.object({
    student_id: z.string({ required_error: required }).min(1, required),
    start_date: z.string({ required_error: required }).min(1, required),
    end_date: z.string({ required_error: required }).min(1, required),
    reason: z.string().default(''),
    leave_type: z.string().optional()
});

/**
 * Leave routes - HTTP mapping only
 */
export function createLeaveRoutes(context: HelpdeskContext): Router {
    const router = Router();

    /**
     * Apply for leave; short qualifying requests are approved on the spot
     * POST /leave/apply
     * Body: { student_id, start_date, end_date, reason?, leave_type? }
     */
    router.post('/apply', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(leaveSchema, req.body);
            const request = await handleLeaveApplication(context, {
                studentId: body.student_id,
                startDate: body.start_date,
                endDate: body.end_date,
                reason: body.reason,
                leaveType: body.leave_type
            });
            res.json({ leave_id: request.id, status: request.status, duration_days: request.durationDays });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
