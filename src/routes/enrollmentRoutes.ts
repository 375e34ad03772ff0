// src/routes/enrollmentRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { parseBody, requiredString, toRegistrationResponse } from './validation';

const enrollSchema = z.object({
    student_id: requiredString('student_id'),
    course_code: requiredString('course_code')
});

/**
 * Enrollment routes - HTTP mapping only
 * Business logic delegated to the enrollment engine
 */
export function createEnrollmentRoutes(context: HelpdeskContext): Router {
    const router = Router();
    const engine = context.engines.enrollment;

    /**
     * Enroll in a course, or join its waitlist when full
     * POST /enroll
     * Body: { student_id, course_code }
     */
    router.post('/', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(enrollSchema, req.body);
            const result = await engine.register(body.course_code, body.student_id);
            res.json(toRegistrationResponse(result));
        } catch (error) {
            next(error);
        }
    });

    /**
     * Enrolled students and waitlist for a course
     * GET /enroll/status/:courseCode
     */
    router.get('/status/:courseCode', (req: Request, res: Response, next: NextFunction) => {
        try {
            const status = engine.status(req.params.courseCode);
            res.json({
                course: status.resourceId,
                capacity: status.capacity,
                enrolled: status.holders,
                waitlist: status.waitlist
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
