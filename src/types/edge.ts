import { NodeType } from './node.js';

/**
 * Relations used by recall.
 *
 *   uses_pattern   Paper   → Pattern
 *   belongs_to     Idea    → Domain
 *   works_well_in  Pattern → Domain
 */
export enum Relation {
    USES_PATTERN = 'uses_pattern',
    BELONGS_TO = 'belongs_to',
    WORKS_WELL_IN = 'works_well_in',
}

export interface UsesPatternAttributes {
    /** Quality of the paper's use of the pattern, 0.0 to 1.0 */
    quality: number;
}

export interface BelongsToAttributes {
    /** Share of the idea's papers that fall in the domain, 0.0 to 1.0 */
    weight: number;
}

export interface WorksWellInAttributes {
    /** Number of papers in the domain using the pattern */
    frequency: number;

    /** Gain over the domain's baseline quality; may be negative */
    effectiveness: number;

    /** min(frequency / saturation, 1.0), computed upstream */
    confidence: number;
}

/** Typed attribute set for each relation */
export interface RelationAttributes {
    [Relation.USES_PATTERN]: UsesPatternAttributes;
    [Relation.BELONGS_TO]: BelongsToAttributes;
    [Relation.WORKS_WELL_IN]: WorksWellInAttributes;
}

/**
 * Directed edge between two modeled nodes.
 */
export interface GraphEdge<R extends Relation = Relation> {
    source: string;
    target: string;
    relation: R;
    attributes: Readonly<RelationAttributes[R]>;
}

/** Source and target namespaces for each relation */
export const RELATION_ENDPOINTS: Readonly<Record<Relation, { source: NodeType; target: NodeType }>> = {
    [Relation.USES_PATTERN]: { source: NodeType.PAPER, target: NodeType.PATTERN },
    [Relation.BELONGS_TO]: { source: NodeType.IDEA, target: NodeType.DOMAIN },
    [Relation.WORKS_WELL_IN]: { source: NodeType.PATTERN, target: NodeType.DOMAIN },
};

export const RELATIONS: readonly Relation[] = [
    Relation.USES_PATTERN,
    Relation.BELONGS_TO,
    Relation.WORKS_WELL_IN,
];
