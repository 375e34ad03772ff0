import { describe, it, expect } from 'vitest';
import { silentLogger } from '../utils/logger';
import { HelpdeskState } from './helpdeskState';
import { InMemoryPersistence, PersistencePort } from './persistence';
import { loadSeedSnapshot } from './seed';

describe('HelpdeskState', () => {
    it('round-trips the seed through a snapshot', () => {
        const seed = loadSeedSnapshot();
        const state = new HelpdeskState(new InMemoryPersistence(), seed);

        expect(state.toSnapshot()).toEqual(seed);
        expect(state.courses.get('MTH101')?.capacity).toBe(1);
        expect(state.hostels.get('H1')?.holders).toHaveLength(2);
    });

    it('reloads the persisted snapshot into the same maps', async () => {
        const persisted = loadSeedSnapshot();
        persisted.events.EVT100.holders.push('s001');
        const state = new HelpdeskState(new InMemoryPersistence(persisted), loadSeedSnapshot());
        const events = state.events;

        await state.reload(silentLogger);

        expect(state.events).toBe(events);
        expect(events.get('EVT100')?.holders).toEqual(['s001']);
    });

    it('falls back to the seed when nothing is persisted', async () => {
        const state = new HelpdeskState(new InMemoryPersistence());

        await state.reload(silentLogger);

        expect(state.students.get('s001')?.name).toBe('Alice Example');
    });

    it('falls back to the seed when the persisted state is unreadable', async () => {
        const broken: PersistencePort = {
            load: () => Promise.reject(new Error('corrupt file')),
            save: () => Promise.resolve()
        };
        const state = new HelpdeskState(broken);

        await state.reload(silentLogger);

        expect(state.courses.size).toBe(2);
    });

    it('writes the current state through the port', async () => {
        const persistence = new InMemoryPersistence();
        const state = new HelpdeskState(persistence, loadSeedSnapshot());
        state.otps.set('s001', { code: 'abc123', expiresAt: '2026-01-10T08:05:00Z' });

        await state.persist();

        expect(persistence.lastSaved?.otps).toEqual({ s001: { code: 'abc123', expiresAt: '2026-01-10T08:05:00Z' } });
    });
});
