import { describe, it, expect } from 'vitest';
import { ResourceLock } from './resourceLock';

const tick = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('ResourceLock', () => {
    it('runs tasks on the same key one at a time in call order', async () => {
        const lock = new ResourceLock();
        const events: string[] = [];

        await Promise.all([
            lock.runExclusive('k', async () => {
                events.push('first:start');
                await tick(5);
                events.push('first:end');
            }),
            lock.runExclusive('k', () => {
                events.push('second');
            })
        ]);

        expect(events).toEqual(['first:start', 'first:end', 'second']);
    });

    it('lets a different key run while another is held', async () => {
        const lock = new ResourceLock();
        const events: string[] = [];

        const slow = lock.runExclusive('a', async () => {
            await tick(10);
            events.push('a');
        });
        await lock.runExclusive('b', () => {
            events.push('b');
        });
        await slow;

        expect(events).toEqual(['b', 'a']);
    });

    it('passes a failure to its caller and keeps serving the key', async () => {
        const lock = new ResourceLock();

        const failed = lock.runExclusive('k', () => {
            throw new Error('boom');
        });
        const next = lock.runExclusive('k', () => 42);

        await expect(failed).rejects.toThrow('boom');
        await expect(next).resolves.toBe(42);
    });

    it('forgets keys once their tasks settle', async () => {
        const lock = new ResourceLock();

        const running = lock.runExclusive('k', () => tick(1));
        expect(lock.isLocked('k')).toBe(true);

        await running;
        await tick(0);
        expect(lock.activeKeys).toBe(0);
    });
});
