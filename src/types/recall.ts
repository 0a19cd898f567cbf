import type { PatternNode } from './node.js';

/** Pattern id → raw path score */
export type ScoreMap = ReadonlyMap<string, number>;

/** The three recall paths */
export type PathName = 'idea' | 'domain' | 'paper';

export const PATH_NAMES: readonly PathName[] = ['idea', 'domain', 'paper'];

/**
 * One path's share of a pattern's final score.
 */
export interface PathContribution {
    /** Score the path produced before weighting */
    rawScore: number;
    weight: number;
    /** rawScore × weight */
    contribution: number;
    /** contribution / finalScore × 100, or 0 when finalScore is 0 */
    percentage: number;
}

export type ScoreBreakdown = Record<PathName, PathContribution>;

export interface FusionWeights {
    idea: number;
    domain: number;
    paper: number;
}

/**
 * A fused, not yet materialized ranking entry.
 */
export interface FusedPattern {
    patternId: string;
    finalScore: number;
    breakdown: ScoreBreakdown;
}

/**
 * Plain copy of a Pattern node's attributes at snapshot time.
 */
export type PatternSnapshot = Omit<PatternNode, 'type'>;

/**
 * A ranked recall result. Carries everything a caller needs without a graph handle.
 */
export interface RecallResult extends FusedPattern {
    pattern: PatternSnapshot;
}
