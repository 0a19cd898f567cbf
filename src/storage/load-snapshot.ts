import { extname } from 'node:path';
import type { GraphSnapshot } from '../types/index.js';
import { GraphStore } from '../graph/graph-store.js';
import { getLogger } from '../utils/logger.js';
import { SnapshotDatabase } from './snapshot-db.js';
import { readSnapshotFile } from './snapshot-file.js';

const DATABASE_EXTENSIONS: ReadonlySet<string> = new Set(['.db', '.sqlite', '.sqlite3']);

export function isDatabasePath(path: string): boolean {
    return DATABASE_EXTENSIONS.has(extname(path).toLowerCase());
}

/**
 * Read snapshot records from a SQLite database or a JSON file, by extension.
 */
export async function readSnapshot(path: string): Promise<GraphSnapshot> {
    if (isDatabasePath(path)) {
        const db = new SnapshotDatabase(path);
        try {
            return db.readSnapshot();
        } finally {
            db.close();
        }
    }
    return readSnapshotFile(path);
}

/**
 * Import metadata stored with a database snapshot; JSON files carry none.
 */
export function readSnapshotMeta(path: string): Record<string, string> {
    if (!isDatabasePath(path)) return {};

    const db = new SnapshotDatabase(path);
    try {
        return db.getStats().meta;
    } finally {
        db.close();
    }
}

/**
 * Read a snapshot and load it into a new GraphStore.
 */
export async function loadSnapshot(path: string): Promise<GraphStore> {
    const snapshot = await readSnapshot(path);
    const store = GraphStore.fromSnapshot(snapshot);
    getLogger().info({ path, ...store.getStats() }, 'Graph snapshot loaded');
    return store;
}
