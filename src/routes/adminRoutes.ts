// src/routes/adminRoutes.ts

import { NextFunction, Request, Response, Router } from 'express';
import { HelpdeskContext } from '../context';
import { NotFoundError } from '../errors';
import { recordAudit } from '../store/auditLog';
import { parseTimestamp, toIsoSeconds } from '../utils/time';

/**
 * Lookup, audit and admin routes - HTTP mapping only
 */
export function createAdminRoutes(context: HelpdeskContext): Router {
    const router = Router();

    /**
     * Audit log, optionally from a point in time
     * GET /audit/logs?since=<iso>
     *
     * An unparseable `since` is ignored.
     */
    router.get('/audit/logs', (req: Request, res: Response) => {
        const since = typeof req.query.since === 'string' ? parseTimestamp(req.query.since) : null;
        const logs = context.audit.list(since ?? undefined);
        res.json({ count: logs.length, logs });
    });

    /**
     * GET /students/:studentId
     */
    router.get('/students/:studentId', (req: Request, res: Response, next: NextFunction) => {
        const student = context.state.students.get(req.params.studentId);
        if (!student) {
            next(new NotFoundError(`student ${req.params.studentId} not found`));
            return;
        }
        res.json(student);
    });

    /**
     * GET /courses
     */
    router.get('/courses', (_req: Request, res: Response) => {
        const courses = Array.from(context.state.courses.values()).map(course => ({
            code: course.id,
            title: course.title,
            capacity: course.capacity
        }));
        res.json(courses);
    });

    /**
     * GET /health
     */
    router.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok', time: toIsoSeconds(context.clock()) });
    });

    /**
     * Reload state from persistence (dev only)
     * POST /admin/reset
     */
    router.post('/admin/reset', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            await context.state.reload(context.logger, context.seed);
            recordAudit(context.audit, context.logger, 'admin', 'reset');
            await context.state.persist();
            res.json({ ok: true });
        } catch (error) {
            next(error);
        }
    });

    return router;
}
