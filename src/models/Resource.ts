// src/models/Resource.ts

/**
 * Outcome of a single registration attempt
 *
 * NOT_FOUND is reported through NotFoundError (its `code`), never returned
 */
export enum RegistrationOutcome {
    ALREADY_REGISTERED = 'already_registered',
    ADMITTED = 'admitted',
    WAITLISTED = 'waitlisted',
    ALREADY_WAITLISTED = 'already_waitlisted',
    NOT_FOUND = 'not_found',
    FULL = 'full'            // Capacity reached and resource keeps no waitlist
}

/**
 * Waitlist entry - one student waiting for a place
 */
export interface WaitlistEntry {
    studentId: string;
    requestedAt: string;     // ISO-8601 UTC, second precision
}

/**
 * Resource model - a course, hostel or event with bounded capacity
 *
 * Data only, no methods. Capacity enforcement handled by engine.
 *
 * Invariant: holders.length <= capacity
 * Invariant: a student id is in at most one of holders / waitlist
 */
export interface Resource {
    id: string;
    title: string;
    capacity: number;        // Maximum concurrent holders
    holders: string[];       // Insertion order = admission order
    waitlist: WaitlistEntry[];
}

export interface RegistrationResult {
    outcome: RegistrationOutcome;
    resourceId: string;
    position?: number;       // 1-based, waitlist outcomes only
    details?: Record<string, unknown>;
}

export interface ResourceStatus {
    resourceId: string;
    title: string;
    capacity: number;
    available: number;
    holders: string[];
    waitlist: WaitlistEntry[];
}
