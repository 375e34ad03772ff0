// src/store/seed.ts

import fs from 'fs';
import path from 'path';
import { Snapshot } from '../models/Snapshot';
import { parseSnapshot } from './snapshotSchema';

const SEED_FILE = path.join(__dirname, '..', '..', 'data', 'seed.json');

/**
 * Static seed data used when nothing has been persisted yet
 *
 * Read fresh on every call so callers get independent copies.
 */
export function loadSeedSnapshot(seedFile: string = SEED_FILE): Snapshot {
    const raw = fs.readFileSync(seedFile, 'utf-8');
    return parseSnapshot(JSON.parse(raw));
}
