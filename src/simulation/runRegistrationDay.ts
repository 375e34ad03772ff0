// src/simulation/runRegistrationDay.ts

import { createHelpdeskContext, RegistrationEngines } from '../context';
import { decide } from '../engine/approvalRule';
import { NotFoundError } from '../errors';
import { RegistrationOutcome, Resource } from '../models/Resource';
import { NoopPersistence } from '../store/persistence';
import { Logger, silentLogger } from '../utils/logger';

/**
 * Full registration day simulation
 *
 * Demonstrates:
 * - Course enrollment with waitlisting
 * - Event registration with waitlisting
 * - Hostel booking without a waitlist
 * - Concurrent burst against one hostel
 * - Unknown resource handling
 * - Leave auto-approval decisions
 * - Invariant preservation
 */

type Domain = keyof RegistrationEngines;

interface ScriptedRequest {
    domain: Domain;
    resourceId: string;
    studentId: string;
}

const MORNING_REQUESTS: ScriptedRequest[] = [
    { domain: 'enrollment', resourceId: 'CSE101', studentId: 's001' },
    { domain: 'enrollment', resourceId: 'CSE101', studentId: 's002' },
    { domain: 'enrollment', resourceId: 'CSE101', studentId: 's003' },
    { domain: 'enrollment', resourceId: 'CSE101', studentId: 's004' },
    { domain: 'enrollment', resourceId: 'CSE101', studentId: 's003' },
    { domain: 'enrollment', resourceId: 'CSE101', studentId: 's001' },
    { domain: 'enrollment', resourceId: 'MTH101', studentId: 's002' },
    { domain: 'enrollment', resourceId: 'MTH101', studentId: 's001' },
    { domain: 'event', resourceId: 'EVT100', studentId: 's001' },
    { domain: 'event', resourceId: 'EVT100', studentId: 's002' },
    { domain: 'event', resourceId: 'EVT100', studentId: 's003' },
    { domain: 'hostel', resourceId: 'H1', studentId: 's001' },
    { domain: 'hostel', resourceId: 'H1', studentId: 's002' },
    { domain: 'hostel', resourceId: 'H1', studentId: 's003' },
    { domain: 'hostel', resourceId: 'H1', studentId: 's001' },
    { domain: 'enrollment', resourceId: 'ZZZ', studentId: 's001' }
];

const BURST_HOSTEL = 'H2';
const BURST_SIZE = 10;

export interface SimulationSummary {
    outcomes: Record<RegistrationOutcome, number>;
    auditEntries: number;
    invariantsHold: boolean;
}

function emptyTally(): Record<RegistrationOutcome, number> {
    return {
        [RegistrationOutcome.ALREADY_REGISTERED]: 0,
        [RegistrationOutcome.ADMITTED]: 0,
        [RegistrationOutcome.WAITLISTED]: 0,
        [RegistrationOutcome.ALREADY_WAITLISTED]: 0,
        [RegistrationOutcome.NOT_FOUND]: 0,
        [RegistrationOutcome.FULL]: 0
    };
}

function checkResource(resource: Resource, log: (message: string) => void): boolean {
    let holds = true;

    if (resource.holders.length > resource.capacity) {
        log(`  ✗ VIOLATED: ${resource.id} has ${resource.holders.length}/${resource.capacity} holders`);
        holds = false;
    }

    if (new Set(resource.holders).size !== resource.holders.length) {
        log(`  ✗ VIOLATED: ${resource.id} has duplicate holders`);
        holds = false;
    }

    for (const entry of resource.waitlist) {
        if (resource.holders.includes(entry.studentId)) {
            log(`  ✗ VIOLATED: ${entry.studentId} both holds and waits for ${resource.id}`);
            holds = false;
        }
    }

    return holds;
}

export async function runRegistrationDay(logger: Logger = silentLogger): Promise<SimulationSummary> {
    const log = (message: string) => logger.info(message);
    const logSection = (title: string) => log(`${'='.repeat(20)} ${title} ${'='.repeat(20)}`);

    logSection('REGISTRATION DAY SIMULATION - START');

    const context = createHelpdeskContext({ persistence: new NoopPersistence(), logger: silentLogger });
    const { engines, state } = context;
    const tally = emptyTally();

    // ========== STEP 1: Scripted requests ==========
    logSection('STEP 1: Morning requests');

    for (const request of MORNING_REQUESTS) {
        try {
            const result = await engines[request.domain].register(request.resourceId, request.studentId);
            tally[result.outcome]++;
            const position = result.position !== undefined ? ` (position ${result.position})` : '';
            log(`  ${request.studentId} -> ${request.domain}/${request.resourceId}: ${result.outcome}${position}`);
        } catch (error) {
            if (!(error instanceof NotFoundError)) {
                throw error;
            }
            tally[RegistrationOutcome.NOT_FOUND]++;
            log(`  ${request.studentId} -> ${request.domain}/${request.resourceId}: ${error.message}`);
        }
    }

    // ========== STEP 2: Concurrent burst ==========
    logSection(`STEP 2: ${BURST_SIZE} simultaneous bookings for ${BURST_HOSTEL}`);

    const burst = await Promise.all(
        Array.from({ length: BURST_SIZE }, (_, i) =>
            engines.hostel.register(BURST_HOSTEL, `s${String(101 + i).padStart(3, '0')}`)
        )
    );
    for (const result of burst) {
        tally[result.outcome]++;
    }
    const burstStatus = engines.hostel.status(BURST_HOSTEL);
    log(`  Booked: ${burstStatus.holders.join(', ')} (${burstStatus.holders.length}/${burstStatus.capacity})`);

    // ========== STEP 3: Leave decisions ==========
    logSection('STEP 3: Leave auto-approval');

    const { leavePolicy } = context.config;
    log(`  3 days with reason: ${decide(3, true, leavePolicy.reasonThresholdDays)}`);
    log(`  4 days with reason: ${decide(4, true, leavePolicy.reasonThresholdDays)}`);
    log(`  2 days medical: ${decide(2, false, leavePolicy.typeThresholdDays)}`);

    // ========== STEP 4: Invariants ==========
    logSection('STEP 4: Verifying invariants');

    let invariantsHold = true;
    for (const resources of [state.courses, state.hostels, state.events]) {
        for (const resource of resources.values()) {
            if (!checkResource(resource, log)) {
                invariantsHold = false;
            }
        }
    }
    log(invariantsHold ? '  ✓ Capacity and membership invariants hold' : '  ✗ Invariants violated');

    logSection('SIMULATION SUMMARY');
    for (const [outcome, count] of Object.entries(tally)) {
        log(`  ${outcome}: ${count}`);
    }
    log(`  Audit entries: ${state.auditLogs.length}`);

    return { outcomes: tally, auditEntries: state.auditLogs.length, invariantsHold };
}
