// src/routes/examRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { HelpdeskContext } from '../context';
import { handleSpecialExamRequest } from '../events/ticketHandler';
import { ExamSitting } from '../models/Helpdesk';
import { recordAudit } from '../store/auditLog';
import { parseBody, requiredString } from './validation';

const specialSchema = z.object({
    student_id: requiredString('student_id'),
    course_code: requiredString('course_code'),
    reason: z.string().default('')
});

/**
 * Exam routes - HTTP mapping only
 */
export function createExamRoutes(context: HelpdeskContext): Router {
    const router = Router();

    /**
     * Exam sittings for every course the student is enrolled in
     * GET /exam/timetable/:studentId
     */
    router.get('/timetable/:studentId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const studentId = req.params.studentId;
            const timetable: Record<string, ExamSitting[]> = {};
            for (const course of context.state.courses.values()) {
                if (course.holders.includes(studentId)) {
                    timetable[course.id] = context.state.examTimetables.get(course.id) ?? [];
                }
            }

            recordAudit(context.audit, context.logger, studentId, 'view_exam_timetable');
            await context.state.persist();

            res.json({ student_id: studentId, timetable });
        } catch (error) {
            next(error);
        }
    });

    /**
     * Request special exam arrangements
     * POST /exam/special
     * Body: { student_id, course_code, reason? }
     */
    router.post('/special', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseBody(specialSchema, req.body);
            const ticket = await handleSpecialExamRequest(context, body.student_id, body.course_code, body.reason);
            res.json({ ticket_id: ticket.id, status: ticket.status });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
