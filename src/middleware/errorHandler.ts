// src/middleware/errorHandler.ts

import { ErrorRequestHandler, Request, Response } from 'express';
import { AppError } from '../errors';
import { Logger } from '../utils/logger';

/**
 * Map thrown errors to JSON responses
 *
 * - AppError: its own status, `{ error, code }`
 * - malformed JSON body: 400
 * - anything else: logged, 500
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (err: unknown, req, res, next) => {
        if (res.headersSent) {
            next(err);
            return;
        }

        if (err instanceof AppError) {
            res.status(err.status).json({ error: err.message, code: err.code });
            return;
        }

        // express.json() reports unparseable bodies as SyntaxError
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'malformed JSON body', code: 'validation_error' });
            return;
        }

        logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
        res.status(500).json({ error: 'Internal Server Error' });
    };
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({ error: `no route for ${req.method} ${req.path}` });
}
