// src/routes/eventRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { parseBody, requiredString, toRegistrationResponse } from './validation';

const registerSchema = z.object({
    student_id: requiredString('student_id'),
    event_id: requiredString('event_id')
});

/**
 * Event routes - HTTP mapping only
 */
export function createEventRoutes(context: HelpdeskContext): Router {
    const router = Router();
    const engine = context.engines.event;

    /**
     * POST /events/register
     * Body: { student_id, event_id }
     */
    router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(registerSchema, req.body);
            const result = await engine.register(body.event_id, body.student_id);
            res.json(toRegistrationResponse(result));
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /events/status/:eventId
     */
    router.get('/status/:eventId', (req: Request, res: Response, next: NextFunction) => {
        try {
            const status = engine.status(req.params.eventId);
            res.json({
                event: status.resourceId,
                title: status.title,
                capacity: status.capacity,
                registered: status.holders,
                waitlist: status.waitlist
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
