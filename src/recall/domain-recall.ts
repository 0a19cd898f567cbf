import { NodeType, Relation } from '../types/index.js';
import type { DomainNode, DomainStrategy } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { QueryContext } from './context.js';
import type { IdeaMatch } from './idea-recall.js';
import { accumulate, selectTopK } from './select.js';

/**
 * A domain considered relevant to the query.
 */
export interface DomainMatch {
    domain: DomainNode;
    relevance: number;
}

/**
 * A keyword matches when every one of its tokens occurs among the query's
 * tokens, so CJK keywords match through their bigrams.
 */
function keywordMatches(context: QueryContext, keyword: string): boolean {
    const tokens = context.engine.tokenSet(keyword);
    if (tokens.size === 0) return false;
    for (const token of tokens) {
        if (!context.tokens.has(token)) return false;
    }
    return true;
}

/**
 * Relevance = number of the domain's distinct keywords found in the query.
 * A domain without keywords is matched on its display name.
 */
export function keywordDomainRelevance(context: QueryContext): DomainMatch[] {
    const matches: DomainMatch[] = [];

    for (const domain of context.store.nodesOfType(NodeType.DOMAIN)) {
        const keywords = domain.keywords.length > 0 ? domain.keywords : [domain.name];
        const distinct = new Set(keywords.map((k) => k.normalize('NFKC').toLowerCase().trim()));

        let relevance = 0;
        for (const keyword of distinct) {
            if (keywordMatches(context, keyword)) relevance++;
        }
        if (relevance > 0) {
            matches.push({ domain, relevance });
        }
    }

    return matches;
}

/**
 * Relevance = Σ similarity(query, idea) × belongs_to.weight over the selected ideas.
 */
export function ideaDomainRelevance(context: QueryContext, ideas: readonly IdeaMatch[]): DomainMatch[] {
    const relevance = new Map<string, number>();

    for (const { idea, similarity } of ideas) {
        for (const { id, attributes } of context.store.successors(idea.id, Relation.BELONGS_TO)) {
            accumulate(relevance, id, similarity * attributes.weight);
        }
    }

    const matches: DomainMatch[] = [];
    for (const [domainId, score] of relevance) {
        const domain = context.store.getNode(NodeType.DOMAIN, domainId);
        if (domain && score > 0) {
            matches.push({ domain, relevance: score });
        }
    }
    return matches;
}

/**
 * Rank domains by the configured strategy and keep the `topK` most relevant.
 */
export function matchDomains(
    context: QueryContext,
    ideas: readonly IdeaMatch[],
    strategy: DomainStrategy,
    topK: number
): DomainMatch[] {
    let candidates: DomainMatch[];
    switch (strategy) {
        case 'keywords':
            candidates = keywordDomainRelevance(context);
            break;
        case 'ideas':
            candidates = ideaDomainRelevance(context, ideas);
            break;
        case 'keywords-then-ideas':
            candidates = keywordDomainRelevance(context);
            if (candidates.length === 0) {
                candidates = ideaDomainRelevance(context, ideas);
            }
            break;
    }

    const selected = selectTopK(candidates, topK, (m) => m.relevance, (m) => m.domain.id);
    getLogger().debug(
        { strategy, candidates: candidates.length, selected: selected.length },
        'Domain path: domains matched'
    );
    return selected;
}

/**
 * One works_well_in edge's contribution. Effectiveness is clamped to the
 * floor before multiplying; confidence is used as stored.
 */
export function domainContribution(
    relevance: number,
    effectiveness: number,
    confidence: number,
    floor: number
): number {
    return relevance * Math.max(effectiveness, floor) * confidence;
}

/**
 * score[pattern] += relevance × max(effectiveness, floor) × confidence,
 * over the patterns that work well in each selected domain.
 */
export function scoreByDomains(
    context: QueryContext,
    domains: readonly DomainMatch[],
    effectivenessFloor: number
): Map<string, number> {
    const scores = new Map<string, number>();

    for (const { domain, relevance } of domains) {
        for (const { id, attributes } of context.store.predecessors(domain.id, Relation.WORKS_WELL_IN)) {
            accumulate(
                scores,
                id,
                domainContribution(relevance, attributes.effectiveness, attributes.confidence, effectivenessFloor)
            );
        }
    }

    return scores;
}
