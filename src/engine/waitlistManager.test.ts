import { describe, it, expect } from 'vitest';
import { buildResource } from '../test-utils/fixtures';
import { WaitlistManager } from './waitlistManager';

describe('WaitlistManager', () => {
    it('appends in request order and reports 1-based positions', () => {
        const manager = new WaitlistManager();
        const course = buildResource('CSE101', 0);

        expect(manager.enqueue(course, 's001', '2026-01-10T08:00:00Z')).toBe(1);
        expect(manager.enqueue(course, 's002', '2026-01-10T08:01:00Z')).toBe(2);

        expect(manager.positionOf(course, 's002')).toBe(2);
        expect(manager.positionOf(course, 's999')).toBeNull();
        expect(manager.getQueueLength(course)).toBe(2);
    });

    it('hands out copies of the queue', () => {
        const manager = new WaitlistManager();
        const course = buildResource('CSE101', 0);
        manager.enqueue(course, 's001', '2026-01-10T08:00:00Z');

        const copy = manager.getQueue(course);
        copy[0].studentId = 'changed';

        expect(course.waitlist[0].studentId).toBe('s001');
    });
});
