// src/context.ts

import { randomUUID } from 'crypto';
import { AppConfig, loadConfig } from './config';
import { RegistrationEngine } from './engine/registrationEngine';
import { ResourceLock } from './engine/resourceLock';
import { HostelBooking } from './models/Helpdesk';
import { Snapshot } from './models/Snapshot';
import { AuditLog } from './store/auditLog';
import { HelpdeskState } from './store/helpdeskState';
import { NoopPersistence, PersistencePort } from './store/persistence';
import { InMemoryResourceStore } from './store/resourceStore';
import { loadSeedSnapshot } from './store/seed';
import { createLogger, Logger } from './utils/logger';
import { Clock, systemClock, toIsoSeconds } from './utils/time';

export interface RegistrationEngines {
    enrollment: RegistrationEngine;
    hostel: RegistrationEngine;
    event: RegistrationEngine;
}

/**
 * Everything a request handler needs; one per app instance
 */
export interface HelpdeskContext {
    config: AppConfig;
    state: HelpdeskState;
    audit: AuditLog;
    engines: RegistrationEngines;
    clock: Clock;
    logger: Logger;
    seed: () => Snapshot;
}

export interface HelpdeskContextOptions {
    config?: AppConfig;
    persistence?: PersistencePort;
    snapshot?: Snapshot;             // Initial state; seed data when omitted
    clock?: Clock;
    logger?: Logger;
    seed?: () => Snapshot;
}

/**
 * Wire state, audit log and one registration engine per domain
 *
 * Synchronous: callers wanting persisted state load it first
 * (see loadHelpdeskContext).
 */
export function createHelpdeskContext(options: HelpdeskContextOptions = {}): HelpdeskContext {
    const config = options.config ?? loadConfig({});
    const clock = options.clock ?? systemClock;
    const logger = options.logger ?? createLogger(config.logLevel);
    const seed = options.seed ?? loadSeedSnapshot;
    const state = new HelpdeskState(options.persistence ?? new NoopPersistence(), options.snapshot ?? seed());
    const audit = new AuditLog(state.auditLogs, clock);
    const persist = () => state.persist();

    // Resource ids are unique per domain only, so each engine gets its own lock
    const engines: RegistrationEngines = {
        enrollment: new RegistrationEngine({
            category: 'enrollment',
            store: new InMemoryResourceStore(state.courses),
            audit,
            lock: new ResourceLock(),
            clock,
            persist,
            logger
        }),
        hostel: new RegistrationEngine({
            category: 'hostel',
            store: new InMemoryResourceStore(state.hostels),
            audit,
            waitlist: false,
            lock: new ResourceLock(),
            clock,
            persist,
            logger,
            onAdmitted: (hostel, studentId, admittedAt) => {
                const booking: HostelBooking = {
                    id: randomUUID(),
                    studentId,
                    hostelId: hostel.id,
                    created: toIsoSeconds(admittedAt)
                };
                state.hostelBookings.set(booking.id, booking);
                return { bookingId: booking.id };
            }
        }),
        event: new RegistrationEngine({
            category: 'event',
            store: new InMemoryResourceStore(state.events),
            audit,
            lock: new ResourceLock(),
            clock,
            persist,
            logger
        })
    };

    return { config, state, audit, engines, clock, logger, seed };
}

/**
 * Context whose state comes from persistence, or the seed when nothing is stored
 */
export async function loadHelpdeskContext(options: HelpdeskContextOptions = {}): Promise<HelpdeskContext> {
    const context = createHelpdeskContext(options);
    await context.state.reload(context.logger, context.seed);
    return context;
}
