import { NotLoadedError } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import type { GraphStore } from './graph-store.js';

/**
 * Holds the store that new queries should read.
 *
 * Swapping replaces the reference only; a query that already took
 * `current()` keeps reading the store it started with.
 */
export class SnapshotHandle {
    private store: GraphStore | null = null;
    private generation = 0;

    constructor(initial?: GraphStore) {
        if (initial) this.swap(initial);
    }

    /**
     * The store new queries should use.
     */
    current(): GraphStore {
        if (!this.store) {
            throw new NotLoadedError('No graph snapshot has been swapped in');
        }
        return this.store;
    }

    /** Number of swaps so far */
    get version(): number {
        return this.generation;
    }

    /**
     * Make `next` the current store. Returns the previous one, if any.
     */
    swap(next: GraphStore): GraphStore | null {
        if (!next.isLoaded) {
            throw new NotLoadedError('Cannot swap in a store that has not been loaded');
        }

        const previous = this.store;
        this.store = next;
        this.generation++;
        getLogger().debug({ version: this.generation, ...next.getStats() }, 'Graph snapshot swapped');
        return previous;
    }
}
