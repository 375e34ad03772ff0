import { describe, it, expect } from 'vitest';
import { decide } from './approvalRule';

describe('decide', () => {
    it('approves at the threshold when the condition holds', () => {
        expect(decide(3, true, 3)).toBe('approved');
    });

    it('leaves requests over the threshold pending', () => {
        expect(decide(4, true, 3)).toBe('pending');
    });

    it('leaves short requests pending when the condition fails', () => {
        expect(decide(2, false, 2)).toBe('pending');
    });
});
