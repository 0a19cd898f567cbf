import { NodeType, Relation } from '../types/index.js';
import { expectedConfidence } from '../recall/config.js';
import type { GraphStats, GraphStore } from './graph-store.js';

/** Tolerance when comparing stored and expected confidence */
const CONFIDENCE_TOLERANCE = 1e-6;

export interface SnapshotDiagnostics extends GraphStats {
    /** works_well_in edges whose confidence is not min(frequency / saturation, 1) */
    confidenceMismatches: string[];

    /** Patterns no recall path can reach */
    unreachablePatterns: string[];
}

/**
 * Consistency report for a loaded store.
 */
export function diagnoseSnapshot(store: GraphStore, confidenceSaturation: number): SnapshotDiagnostics {
    const confidenceMismatches: string[] = [];
    for (const edge of store.edgesOf(Relation.WORKS_WELL_IN)) {
        const { frequency, confidence } = edge.attributes;
        const expected = expectedConfidence(frequency, confidenceSaturation);
        if (Math.abs(confidence - expected) > CONFIDENCE_TOLERANCE) {
            confidenceMismatches.push(
                `${edge.source} -> ${edge.target}: confidence ${confidence}, expected ${expected}`
            );
        }
    }

    const referenced = new Set<string>();
    for (const idea of store.nodesOfType(NodeType.IDEA)) {
        for (const { pattern_id } of idea.pattern_relevance) referenced.add(pattern_id);
    }

    const unreachablePatterns = store
        .nodesOfType(NodeType.PATTERN)
        .filter((pattern) =>
            !referenced.has(pattern.id) &&
            store.predecessors(pattern.id, Relation.USES_PATTERN).length === 0 &&
            store.successors(pattern.id, Relation.WORKS_WELL_IN).length === 0
        )
        .map((pattern) => pattern.id);

    return { ...store.getStats(), confidenceMismatches, unreachablePatterns };
}
