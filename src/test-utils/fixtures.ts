// src/test-utils/fixtures.ts

import { createHelpdeskContext, HelpdeskContext, HelpdeskContextOptions } from '../context';
import { Resource } from '../models/Resource';
import { InMemoryPersistence } from '../store/persistence';
import { silentLogger } from '../utils/logger';
import { addMinutes, Clock } from '../utils/time';

export const TEST_START = '2026-01-10T08:00:00Z';

export interface TestClock {
    now: Clock;
    advanceMinutes(minutes: number): void;
}

export function createTestClock(start: string = TEST_START): TestClock {
    let current = new Date(start);
    return {
        now: () => new Date(current.getTime()),
        advanceMinutes: minutes => {
            current = addMinutes(current, minutes);
        }
    };
}

export function buildResource(id: string, capacity: number, holders: string[] = []): Resource {
    return { id, title: `Resource ${id}`, capacity, holders: [...holders], waitlist: [] };
}

/**
 * Seeded context with an in-memory persister and a frozen clock
 */
export function createTestContext(
    clock: TestClock = createTestClock(),
    options: HelpdeskContextOptions = {}
): { context: HelpdeskContext; persistence: InMemoryPersistence } {
    const persistence = new InMemoryPersistence();
    const context = createHelpdeskContext({
        persistence,
        clock: clock.now,
        logger: silentLogger,
        ...options
    });
    return { context, persistence };
}
