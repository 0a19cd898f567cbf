import { DEFAULT_RECALL_CONFIG, NodeType } from '../types/index.js';
import type { PatternSnapshot, RecallConfig, RecallResult } from '../types/index.js';
import type { GraphStore } from '../graph/graph-store.js';
import { defaultSimilarityEngine, type SimilarityEngine } from '../nlp/similarity.js';
import { fusionWeights, validateRecallConfig } from './config.js';
import { createQueryContext } from './context.js';
import { matchIdeas, scoreByIdeas, type IdeaMatch } from './idea-recall.js';
import { matchDomains, scoreByDomains, type DomainMatch } from './domain-recall.js';
import { matchPapers, scoreByPapers, type PaperMatch } from './paper-recall.js';
import { fuse } from './fusion.js';

/**
 * Per-path output of one query, before fusion.
 */
export interface PathScores {
    ideas: IdeaMatch[];
    domains: DomainMatch[];
    papers: PaperMatch[];
    ideaScores: Map<string, number>;
    domainScores: Map<string, number>;
    paperScores: Map<string, number>;
}

/**
 * Run the three recall paths against one store.
 *
 * The paths share no mutable state; the domain path reads only the idea
 * path's already computed selection.
 */
export function scorePaths(
    query: string,
    store: GraphStore,
    config: RecallConfig,
    engine: SimilarityEngine = defaultSimilarityEngine
): PathScores {
    const context = createQueryContext(query, store, engine);

    const ideas = matchIdeas(context, config.path1TopKIdeas);
    const domains = matchDomains(context, ideas, config.domainStrategy, config.path2TopKDomains);
    const papers = matchPapers(context, config.path3TopKPapers, config.paperSimilarityThreshold);

    return {
        ideas,
        domains,
        papers,
        ideaScores: scoreByIdeas(ideas),
        domainScores: scoreByDomains(context, domains, config.effectivenessFloor),
        paperScores: scoreByPapers(context, papers),
    };
}

function snapshotPattern(store: GraphStore, patternId: string): PatternSnapshot {
    const pattern = store.getNode(NodeType.PATTERN, patternId);
    if (!pattern) {
        // Unreachable for a store that passed its integrity checks
        throw new Error(`Scored pattern ${patternId} is not in the snapshot`);
    }
    const { type: _type, extra, ...fields } = pattern;
    return { ...fields, extra: structuredClone(extra) };
}

/**
 * Rank writing patterns for a free-text research idea.
 *
 * Pure with respect to its inputs: no state survives the call, and the same
 * (query, store, config) always yields the same results in the same order.
 * An empty query, or one sharing nothing with the corpus, yields [].
 */
export function recall(
    query: string,
    store: GraphStore,
    config: RecallConfig = DEFAULT_RECALL_CONFIG,
    engine: SimilarityEngine = defaultSimilarityEngine
): RecallResult[] {
    validateRecallConfig(config);

    const paths = scorePaths(query, store, config, engine);
    const fused = fuse(
        paths.ideaScores,
        paths.domainScores,
        paths.paperScores,
        fusionWeights(config),
        config.finalTopK
    );

    return fused.map((entry) => ({
        ...entry,
        pattern: snapshotPattern(store, entry.patternId),
    }));
}
