import { NodeType, Relation } from '../types/index.js';
import type { PaperNode } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { similarityToQuery, type QueryContext } from './context.js';
import { accumulate, selectTopK } from './select.js';

export interface PaperMatch {
    paper: PaperNode;
    similarity: number;
    /** similarity × paper quality */
    combinedWeight: number;
}

/**
 * Keep papers at or above `threshold` similarity (and above zero), then the
 * `topK` with the highest combined weight.
 */
export function matchPapers(context: QueryContext, topK: number, threshold: number): PaperMatch[] {
    const candidates: PaperMatch[] = [];

    for (const paper of context.store.nodesOfType(NodeType.PAPER)) {
        const similarity = similarityToQuery(context, paper.core_idea);
        if (similarity <= 0 || similarity < threshold) continue;

        candidates.push({ paper, similarity, combinedWeight: similarity * paper.quality });
    }

    const selected = selectTopK(candidates, topK, (m) => m.combinedWeight, (m) => m.paper.id);
    getLogger().debug(
        { candidates: candidates.length, selected: selected.length, threshold },
        'Paper path: papers matched'
    );
    return selected;
}

/**
 * score[pattern] += combined_weight × uses_pattern.quality.
 */
export function scoreByPapers(context: QueryContext, papers: readonly PaperMatch[]): Map<string, number> {
    const scores = new Map<string, number>();

    for (const { paper, combinedWeight } of papers) {
        for (const { id, attributes } of context.store.successors(paper.id, Relation.USES_PATTERN)) {
            accumulate(scores, id, combinedWeight * attributes.quality);
        }
    }

    return scores;
}
