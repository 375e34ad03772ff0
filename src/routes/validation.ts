// src/routes/validation.ts

import { z } from 'zod';
import { ValidationError } from '../errors';
import { RegistrationResult } from '../models/Resource';

/**
 * Non-empty string field; missing, empty and non-string all read "<field> required"
 */
export function requiredString(field: string) {
    const message = `${field} required`;
    return z.string({ required_error: message, invalid_type_error: message }).min(1, message);
}

/**
 * Parse a JSON body; the first issue becomes the ValidationError message
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    const result = schema.safeParse(body ?? {});
    if (!result.success) {
        throw new ValidationError(result.error.issues[0]?.message ?? 'invalid request body');
    }
    return result.data;
}

export interface RegistrationResponse {
    status: string;
    resource_id: string;
    position?: number;
}

export function toRegistrationResponse(result: RegistrationResult): RegistrationResponse {
    return {
        status: result.outcome,
        resource_id: result.resourceId,
        ...(result.position !== undefined ? { position: result.position } : {})
    };
}
