// src/engine/waitlistManager.ts

import { Resource, WaitlistEntry } from '../models/Resource';

/**
 * Waitlist manager for a resource's FIFO waitlist
 *
 * Entries live on the resource itself; order is request order.
 *
 * Performance:
 * - enqueue: O(1) append
 * - positionOf: O(n) scan
 */
export class WaitlistManager {
    /**
     * Append a student to the back of the waitlist
     *
     * @returns 1-based position after append
     */
    enqueue(resource: Resource, studentId: string, requestedAt: string): number {
        const entry: WaitlistEntry = { studentId, requestedAt };
        resource.waitlist.push(entry);
        return resource.waitlist.length;
    }

    /**
     * @returns 1-based position, or null when not waitlisted
     */
    positionOf(resource: Resource, studentId: string): number | null {
        const index = resource.waitlist.findIndex(entry => entry.studentId === studentId);
        return index === -1 ? null : index + 1;
    }

    /**
     * Copy of the waitlist (for display)
     */
    getQueue(resource: Resource): WaitlistEntry[] {
        return resource.waitlist.map(entry => ({ ...entry }));
    }

    getQueueLength(resource: Resource): number {
        return resource.waitlist.length;
    }
}
