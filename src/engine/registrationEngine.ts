// src/engine/registrationEngine.ts

import { NotFoundError, ValidationError } from '../errors';
import {
    RegistrationOutcome,
    RegistrationResult,
    Resource,
    ResourceStatus
} from '../models/Resource';
import { AuditSink, recordAudit } from '../store/auditLog';
import { ResourceStore } from '../store/resourceStore';
import { Logger, silentLogger } from '../utils/logger';
import { Clock, systemClock, toIsoSeconds } from '../utils/time';
import { ResourceLock } from './resourceLock';
import { WaitlistManager } from './waitlistManager';

/**
 * Called inside the critical section right after an admission.
 * Returned details are merged into the result and the audit entry.
 */
export type AdmissionHook = (resource: Resource, studentId: string, admittedAt: Date) => Record<string, unknown>;

export interface RegistrationEngineOptions {
    category: string;                // Audit action prefix, e.g. 'enrollment'
    store: ResourceStore;
    audit: AuditSink;
    waitlist?: boolean;              // Default true; false answers FULL instead
    lock?: ResourceLock;
    clock?: Clock;
    persist?: () => Promise<void>;
    onAdmitted?: AdmissionHook;
    logger?: Logger;
}

/**
 * Core registration engine - capacity-bounded admission with FIFO waitlist
 *
 * One instance per domain (courses, hostels, events)
 * Enforces capacity invariant: never exceed resource capacity
 *
 * Each call on a resource is one critical section:
 * read capacity -> compare -> mutate -> audit -> persist
 */
export class RegistrationEngine {
    private readonly category: string;
    private readonly store: ResourceStore;
    private readonly audit: AuditSink;
    private readonly waitlistEnabled: boolean;
    private readonly lock: ResourceLock;
    private readonly clock: Clock;
    private readonly persist: () => Promise<void>;
    private readonly onAdmitted?: AdmissionHook;
    private readonly logger: Logger;
    private readonly waitlistManager = new WaitlistManager();

    constructor(options: RegistrationEngineOptions) {
        this.category = options.category;
        this.store = options.store;
        this.audit = options.audit;
        this.waitlistEnabled = options.waitlist ?? true;
        this.lock = options.lock ?? new ResourceLock();
        this.clock = options.clock ?? systemClock;
        this.persist = options.persist ?? (() => Promise.resolve());
        this.onAdmitted = options.onAdmitted;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Register a student for a resource
     *
     * @throws ValidationError when either id is empty
     * @throws NotFoundError when the resource does not exist
     */
    async register(resourceId: string, studentId: string): Promise<RegistrationResult> {
        if (!resourceId || !studentId) {
            throw new ValidationError('resource id and student id required');
        }

        return this.lock.runExclusive(resourceId, async () => {
            const resource = this.store.get(resourceId);
            if (!resource) {
                throw new NotFoundError(`${this.category} resource ${resourceId} not found`);
            }

            const result = this.admitOrWaitlist(resource, studentId);

            if (result.outcome === RegistrationOutcome.ADMITTED || result.outcome === RegistrationOutcome.WAITLISTED) {
                recordAudit(this.audit, this.logger, studentId, `${this.category}.${result.outcome}`, {
                    resourceId,
                    ...(result.position !== undefined ? { position: result.position } : {}),
                    ...result.details
                });
                await this.persist();
            }

            this.logger.debug(`${this.category}: ${studentId} -> ${resourceId}: ${result.outcome}`);
            return result;
        });
    }

    /**
     * Current holders and waitlist of a resource
     *
     * @throws NotFoundError when the resource does not exist
     */
    status(resourceId: string): ResourceStatus {
        const resource = this.store.get(resourceId);
        if (!resource) {
            throw new NotFoundError(`${this.category} resource ${resourceId} not found`);
        }

        const capacity = this.store.capacity(resourceId);
        return {
            resourceId,
            title: resource.title,
            capacity,
            available: Math.max(0, capacity - resource.holders.length),
            holders: [...resource.holders],
            waitlist: this.waitlistManager.getQueue(resource)
        };
    }

    /**
     * Decide and apply the outcome; synchronous so nothing interleaves
     */
    private admitOrWaitlist(resource: Resource, studentId: string): RegistrationResult {
        const resourceId = resource.id;

        if (resource.holders.includes(studentId)) {
            return { outcome: RegistrationOutcome.ALREADY_REGISTERED, resourceId };
        }

        const now = this.clock();

        if (resource.holders.length < this.store.capacity(resourceId)) {
            resource.holders.push(studentId);
            const details = this.onAdmitted ? this.onAdmitted(resource, studentId, now) : undefined;
            return { outcome: RegistrationOutcome.ADMITTED, resourceId, ...(details ? { details } : {}) };
        }

        if (!this.waitlistEnabled) {
            return { outcome: RegistrationOutcome.FULL, resourceId };
        }

        const existing = this.waitlistManager.positionOf(resource, studentId);
        if (existing !== null) {
            return { outcome: RegistrationOutcome.ALREADY_WAITLISTED, resourceId, position: existing };
        }

        const position = this.waitlistManager.enqueue(resource, studentId, toIsoSeconds(now));
        return { outcome: RegistrationOutcome.WAITLISTED, resourceId, position };
    }
}
