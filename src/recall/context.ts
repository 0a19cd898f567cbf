import type { GraphStore } from '../graph/graph-store.js';
import type { SimilarityEngine } from '../nlp/similarity.js';

/**
 * Everything a path scorer reads for one query. Built once per query and
 * shared read-only by the three paths.
 */
export interface QueryContext {
    /** Query text as given */
    text: string;

    /** Query token set under the engine's tokenizer */
    tokens: ReadonlySet<string>;

    store: GraphStore;

    engine: SimilarityEngine;
}

export function createQueryContext(text: string, store: GraphStore, engine: SimilarityEngine): QueryContext {
    return { text, tokens: engine.tokenSet(text), store, engine };
}

/**
 * Similarity of the query to a corpus text.
 */
export function similarityToQuery(context: QueryContext, text: string): number {
    return context.engine.similarityToTokens(context.tokens, text);
}
