// src/errors.ts

import { RegistrationOutcome } from './models/Resource';

/**
 * Error carrying the HTTP status it maps to
 */
export class AppError extends Error {
    readonly status: number;
    readonly code: string;

    constructor(message: string, status: number, code: string) {
        super(message);
        this.name = new.target.name;
        this.status = status;
        this.code = code;
    }
}

/**
 * Missing or malformed input - no mutation attempted
 */
export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400, 'validation_error');
    }
}

/**
 * Unknown resource or record - no mutation attempted
 */
export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404, RegistrationOutcome.NOT_FOUND);
    }
}
