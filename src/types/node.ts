/**
 * Node types present in a recall snapshot.
 *
 * Other node types produced upstream (reviews, tricks, ...) are not
 * modeled and are skipped at load time.
 */
export enum NodeType {
    PAPER = 'Paper',
    DOMAIN = 'Domain',
    IDEA = 'Idea',
    PATTERN = 'Pattern',
}

/** Attributes the snapshot carried that are not modeled as typed fields */
export type ExtraAttributes = Readonly<Record<string, unknown>>;

interface NodeBase {
    /** Identifier, unique within its type namespace */
    id: string;

    /** Unmodeled attributes, kept as given */
    extra: ExtraAttributes;
}

/**
 * An annotated paper.
 */
export interface PaperNode extends NodeBase {
    type: NodeType.PAPER;

    /** Review-derived quality, 0.0 to 1.0 */
    quality: number;

    /** Short statement of the paper's core idea ('' when absent) */
    core_idea: string;
}

/**
 * A research-area grouping.
 */
export interface DomainNode extends NodeBase {
    type: NodeType.DOMAIN;

    /** Display name */
    name: string;

    /** Keywords used for direct query matching */
    keywords: readonly string[];
}

/** One precomputed (pattern, relevance) pair on an Idea */
export interface PatternRelevance {
    pattern_id: string;
    relevance: number;
}

/**
 * The core innovation of a paper, with its precomputed pattern relevance list.
 */
export interface IdeaNode extends NodeBase {
    type: NodeType.IDEA;

    description: string;

    pattern_relevance: readonly PatternRelevance[];
}

/**
 * A reusable writing pattern distilled from a cluster of papers.
 */
export interface PatternNode extends NodeBase {
    type: NodeType.PATTERN;

    name: string;

    summary: string;

    /** Number of papers in the cluster the pattern was distilled from */
    cluster_size: number;

    /** Cluster coherence score */
    coherence: number;
}

export type GraphNode = PaperNode | DomainNode | IdeaNode | PatternNode;

/** The node variant for a given type tag */
export type NodeOfType<T extends NodeType> = Extract<GraphNode, { type: T }>;

/** All modeled node type tags, in load-report order */
export const NODE_TYPES: readonly NodeType[] = [
    NodeType.PAPER,
    NodeType.DOMAIN,
    NodeType.IDEA,
    NodeType.PATTERN,
];
