// src/app.ts

import cors from 'cors';
import express, { Express } from 'express';
import { HelpdeskContext } from './context';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { createAdminRoutes } from './routes/adminRoutes';
import { createEnrollmentRoutes } from './routes/enrollmentRoutes';
import { createEventRoutes } from './routes/eventRoutes';
import { createExamRoutes } from './routes/examRoutes';
import { createFeesRoutes } from './routes/feesRoutes';
import { createHostelRoutes } from './routes/hostelRoutes';
import { createLeaveRoutes } from './routes/leaveRoutes';
import { createVerifyRoutes } from './routes/verifyRoutes';

/**
 * Express application setup
 *
 * All state comes from the context:
 * - state: students, resources, fees, tickets, audit log
 * - engines: one registration engine per domain
 */
export function createApp(context: HelpdeskContext): Express {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Routes
    app.use('/fees', createFeesRoutes(context));
    app.use('/enroll', createEnrollmentRoutes(context));
    app.use('/exam', createExamRoutes(context));
    app.use('/hostel', createHostelRoutes(context));
    app.use('/leave', createLeaveRoutes(context));
    app.use('/events', createEventRoutes(context));
    app.use('/verify', createVerifyRoutes(context));
    app.use('/', createAdminRoutes(context));

    // Error handling
    app.use(notFoundHandler);
    app.use(createErrorHandler(context.logger));

    return app;
}
