import { NodeType } from '../types/index.js';
import type { IdeaNode } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { similarityToQuery, type QueryContext } from './context.js';
import { accumulate, selectTopK } from './select.js';

/**
 * An idea selected for the query, with its similarity to the query.
 */
export interface IdeaMatch {
    idea: IdeaNode;
    similarity: number;
}

/**
 * Score every idea against the query and keep the `topK` most similar.
 * Ideas with zero similarity are never selected.
 */
export function matchIdeas(context: QueryContext, topK: number): IdeaMatch[] {
    const candidates: IdeaMatch[] = [];

    for (const idea of context.store.nodesOfType(NodeType.IDEA)) {
        const similarity = similarityToQuery(context, idea.description);
        if (similarity > 0) {
            candidates.push({ idea, similarity });
        }
    }

    const selected = selectTopK(candidates, topK, (m) => m.similarity, (m) => m.idea.id);
    getLogger().debug({ candidates: candidates.length, selected: selected.length }, 'Idea path: ideas matched');
    return selected;
}

/**
 * score[pattern] += similarity(query, idea) × pattern_relevance, summed
 * over the selected ideas.
 */
export function scoreByIdeas(matches: readonly IdeaMatch[]): Map<string, number> {
    const scores = new Map<string, number>();

    for (const { idea, similarity } of matches) {
        for (const { pattern_id, relevance } of idea.pattern_relevance) {
            accumulate(scores, pattern_id, similarity * relevance);
        }
    }

    return scores;
}
