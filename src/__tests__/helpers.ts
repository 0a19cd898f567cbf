import type { GraphSnapshot, RawEdgeRecord, RawNodeRecord } from '../types/index.js';

// Helpers: build raw snapshot records

export function paper(id: string, coreIdea: string, quality = 0.5): RawNodeRecord {
    return { id, type: 'Paper', attributes: { core_idea: coreIdea, quality } };
}

export function domain(id: string, name: string, keywords: string[] = []): RawNodeRecord {
    return { id, type: 'Domain', attributes: { name, keywords } };
}

export function idea(id: string, description: string, patterns: Array<[string, number]> = []): RawNodeRecord {
    return {
        id,
        type: 'Idea',
        attributes: {
            description,
            pattern_relevance: patterns.map(([pattern_id, relevance]) => ({ pattern_id, relevance })),
        },
    };
}

export function pattern(id: string, name = `Pattern ${id}`, clusterSize = 5): RawNodeRecord {
    return {
        id,
        type: 'Pattern',
        attributes: { name, summary: `Summary of ${name}`, cluster_size: clusterSize, coherence: 0.7 },
    };
}

export function usesPattern(paperId: string, patternId: string, quality: number): RawEdgeRecord {
    return { source: paperId, target: patternId, relation: 'uses_pattern', attributes: { quality } };
}

export function belongsTo(ideaId: string, domainId: string, weight: number): RawEdgeRecord {
    return { source: ideaId, target: domainId, relation: 'belongs_to', attributes: { weight } };
}

export function worksWellIn(
    patternId: string,
    domainId: string,
    effectiveness: number,
    confidence: number,
    frequency = 10
): RawEdgeRecord {
    return {
        source: patternId,
        target: domainId,
        relation: 'works_well_in',
        attributes: { frequency, effectiveness, confidence },
    };
}

export function snapshot(nodes: RawNodeRecord[], edges: RawEdgeRecord[] = []): GraphSnapshot {
    return { nodes, edges };
}
