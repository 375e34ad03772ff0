// src/routes/hostelRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { handleMaintenanceTicket } from '../events/ticketHandler';
import { parseBody, requiredString, toRegistrationResponse } from './validation';

const bookSchema = z.object({
    student_id: requiredString('student_id'),
    hostel_id: requiredString('hostel_id')
});

const maintenanceSchema = z.object({
    student_id: requiredString('student_id'),
    hostel_id: requiredString('hostel_id'),
    description: z.string().default('')
});

/**
 * Hostel routes - HTTP mapping only
 * Booking goes through the hostel engine (no waitlist)
 */
export function createHostelRoutes(context: HelpdeskContext): Router {
    const router = Router();
    const engine = context.engines.hostel;

    /**
     * Rooms per hostel
     * GET /hostel/availability
     */
    router.get('/availability', (_req: Request, res: Response) => {
        const availability: Record<string, { name: string; rooms_total: number; rooms_available: number }> = {};
        for (const hostel of context.state.hostels.values()) {
            const status = engine.status(hostel.id);
            availability[hostel.id] = {
                name: status.title,
                rooms_total: status.capacity,
                rooms_available: status.available
            };
        }
        res.json(availability);
    });

    /**
     * Book a room
     * POST /hostel/book
     * Body: { student_id, hostel_id }
     */
    router.post('/book', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(bookSchema, req.body);
            const result = await engine.register(body.hostel_id, body.student_id);
            const bookingId = result.details?.bookingId;

            res.json({
                ...toRegistrationResponse(result),
                ...(typeof bookingId === 'string' ? { booking_id: bookingId } : {})
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * Report a maintenance issue
     * POST /hostel/maintenance
     * Body: { student_id, hostel_id, description? }
     */
    router.post('/maintenance', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(maintenanceSchema, req.body);
            const ticket = await handleMaintenanceTicket(context, body.student_id, body.hostel_id, body.description);
            res.json({ ticket_id: ticket.id, status: ticket.status });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
