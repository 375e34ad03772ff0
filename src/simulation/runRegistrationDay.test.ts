import { describe, it, expect } from 'vitest';
import { runRegistrationDay } from './runRegistrationDay';

describe('runRegistrationDay', () => {
    it('plays the scripted day without breaking capacity', async () => {
        const summary = await runRegistrationDay();

        expect(summary.outcomes).toEqual({
            already_registered: 2,
            admitted: 10,
            waitlisted: 4,
            already_waitlisted: 1,
            not_found: 1,
            full: 8
        });
        expect(summary.auditEntries).toBe(14);
        expect(summary.invariantsHold).toBe(true);
    });
});
