import { DEFAULT_RECALL_CONFIG } from '../types/index.js';
import type { GraphSnapshot, RecallConfig, RecallResult } from '../types/index.js';
import { GraphStore } from '../graph/graph-store.js';
import type { SnapshotHandle } from '../graph/snapshot-handle.js';
import { defaultSimilarityEngine, type SimilarityEngine } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';
import { recall } from './recall.js';

/**
 * Serves recall queries against whatever snapshot the handle currently holds.
 */
export class RecallService {
    constructor(
        private readonly handle: SnapshotHandle,
        private readonly engine: SimilarityEngine = defaultSimilarityEngine
    ) {}

    /**
     * Run one query. The store is read from the handle once, so a concurrent
     * reload does not affect a query already in flight.
     */
    recall(query: string, config: RecallConfig = DEFAULT_RECALL_CONFIG): RecallResult[] {
        const store = this.handle.current();
        return recall(query, store, config, this.engine);
    }

    /**
     * Load a new snapshot and swap it in. The current store stays in place
     * if loading fails.
     */
    async reload(loader: () => Promise<GraphSnapshot>): Promise<void> {
        const snapshot = await loader();
        const next = GraphStore.fromSnapshot(snapshot);
        this.handle.swap(next);
        getLogger().info({ version: this.handle.version }, 'Graph snapshot reloaded');
    }
}
