// src/store/persistence.ts

import { promises as fs } from 'fs';
import { Snapshot } from '../models/Snapshot';
import { parseSnapshot } from './snapshotSchema';

/**
 * Persistence port - where snapshots of the helpdesk state go
 */
export interface PersistencePort {
    load(): Promise<Snapshot | undefined>;
    save(snapshot: Snapshot): Promise<void>;
}

/**
 * Keeps nothing; state lives only in memory
 */
export class NoopPersistence implements PersistencePort {
    async load(): Promise<Snapshot | undefined> {
        return undefined;
    }

    async save(_snapshot: Snapshot): Promise<void> {
        return;
    }
}

/**
 * Holds the last saved snapshot in memory (deep copied both ways)
 */
export class InMemoryPersistence implements PersistencePort {
    private stored: Snapshot | undefined;
    private saveCount = 0;

    constructor(initial?: Snapshot) {
        this.stored = initial ? structuredClone(initial) : undefined;
    }

    async load(): Promise<Snapshot | undefined> {
        return this.stored ? structuredClone(this.stored) : undefined;
    }

    async save(snapshot: Snapshot): Promise<void> {
        this.stored = structuredClone(snapshot);
        this.saveCount++;
    }

    get saves(): number {
        return this.saveCount;
    }

    get lastSaved(): Snapshot | undefined {
        return this.stored;
    }
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Pretty-printed JSON file, rewritten on every save
 *
 * Writes are chained so two saves never interleave on disk; each one
 * writes the snapshot it was given, so the file ends with the latest.
 */
export class JsonFilePersistence implements PersistencePort {
    private readonly filePath: string;
    private writeChain: Promise<void> = Promise.resolve();

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    async load(): Promise<Snapshot | undefined> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) {
                return undefined;
            }
            throw err;
        }

        return parseSnapshot(JSON.parse(raw));
    }

    save(snapshot: Snapshot): Promise<void> {
        const payload = JSON.stringify(snapshot, null, 2);
        const write = this.writeChain.then(() => fs.writeFile(this.filePath, payload, 'utf-8'));

        // Chain continues after a failed write; the failure reaches the caller via `write`
        this.writeChain = write.catch(() => undefined);
        return write;
    }
}
