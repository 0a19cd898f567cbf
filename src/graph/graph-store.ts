import { NodeType, RELATION_ENDPOINTS, RELATIONS, Relation } from '../types/index.js';
import type {
    GraphEdge,
    GraphNode,
    GraphSnapshot,
    NodeOfType,
    RawEdgeRecord,
    RawNodeRecord,
    RelationAttributes,
} from '../types/index.js';
import { GraphIntegrityError, NotLoadedError } from '../errors.js';
import { getLogger } from '../utils/logger.js';
import {
    ViolationLog,
    edgeLabel,
    isModeledNodeType,
    isModeledRelation,
    parseBelongsTo,
    parseNode,
    parseUsesPattern,
    parseWorksWellIn,
} from './records.js';

/**
 * A neighbor reached over one edge, with that edge's attributes.
 */
export interface Neighbor<A> {
    id: string;
    attributes: Readonly<A>;
}

/**
 * Materialized adjacency for one relation. Lists are indexed by the
 * position of the node in its type's arena.
 */
interface RelationIndex<R extends Relation> {
    edges: readonly GraphEdge<R>[];
    forward: ReadonlyArray<readonly Neighbor<RelationAttributes[R]>[]>;
    backward: ReadonlyArray<readonly Neighbor<RelationAttributes[R]>[]>;
}

type NodeArenas = { [T in NodeType]: NodeOfType<T>[] };
type RelationIndexes = { [R in Relation]: RelationIndex<R> };

interface LoadedGraph {
    nodes: NodeArenas;
    positions: Record<NodeType, Map<string, number>>;
    relations: RelationIndexes;
}

export interface GraphStats {
    nodes: Record<NodeType, number>;
    edges: Record<Relation, number>;
}

const EMPTY: readonly never[] = Object.freeze([]);

/**
 * Read-only index over typed nodes and typed, weighted, directed edges.
 *
 * Nodes live in dense per-type arrays; each relation keeps forward and
 * backward neighbor lists keyed by arena position, so neighbor queries
 * cost O(1) per neighbor. A store is loaded once and never mutated after;
 * to pick up a new snapshot, load a new store and swap it in.
 */
export class GraphStore {
    private graph: LoadedGraph | null = null;

    /**
     * Build a loaded store from a snapshot.
     */
    static fromSnapshot(snapshot: GraphSnapshot): GraphStore {
        return new GraphStore().load(snapshot.nodes, snapshot.edges);
    }

    get isLoaded(): boolean {
        return this.graph !== null;
    }

    /**
     * Build the node arenas and adjacency indexes.
     *
     * Fails with GraphIntegrityError listing every violation; nothing is
     * loaded in that case. For a repeated (source, target, relation) triple
     * the later record's attributes win and the first position is kept.
     */
    load(nodes: readonly RawNodeRecord[], edges: readonly RawEdgeRecord[]): this {
        if (this.graph) {
            throw new Error('GraphStore is already loaded; load a new store and swap it in');
        }

        const log = new ViolationLog();
        const arenas: NodeArenas = {
            [NodeType.PAPER]: [],
            [NodeType.DOMAIN]: [],
            [NodeType.IDEA]: [],
            [NodeType.PATTERN]: [],
        };
        const positions: Record<NodeType, Map<string, number>> = {
            [NodeType.PAPER]: new Map(),
            [NodeType.DOMAIN]: new Map(),
            [NodeType.IDEA]: new Map(),
            [NodeType.PATTERN]: new Map(),
        };

        // Every id in the input, modeled or not; edges of skipped relations are checked against it
        const knownIds = new Set<string>();
        const skippedTypes = new Map<string, number>();
        for (const record of nodes) {
            knownIds.add(record.id);
            const type = record.type;
            if (!isModeledNodeType(type)) {
                skippedTypes.set(type, (skippedTypes.get(type) ?? 0) + 1);
                continue;
            }

            const namespace = positions[type];
            if (namespace.has(record.id)) {
                log.add(`duplicate ${type} id ${record.id}`);
                continue;
            }

            const node = Object.freeze(parseNode({ ...record, type }, log));
            namespace.set(node.id, pushNode(arenas, node));
        }

        // Pattern lists on ideas are references too
        for (const idea of arenas[NodeType.IDEA]) {
            for (const { pattern_id } of idea.pattern_relevance) {
                if (!positions[NodeType.PATTERN].has(pattern_id)) {
                    log.add(`Idea ${idea.id}: pattern_relevance names unknown Pattern ${pattern_id}`);
                }
            }
        }

        const byRelation = new Map<Relation, RawEdgeRecord[]>(RELATIONS.map((r) => [r, []]));
        const skippedRelations = new Map<string, number>();
        for (const record of edges) {
            if (isModeledRelation(record.relation)) {
                byRelation.get(record.relation)?.push(record);
            } else {
                for (const endpoint of [record.source, record.target]) {
                    if (!knownIds.has(endpoint)) {
                        log.add(`${edgeLabel(record)}: unknown node ${endpoint}`);
                    }
                }
                skippedRelations.set(record.relation, (skippedRelations.get(record.relation) ?? 0) + 1);
            }
        }

        const recordsOf = (relation: Relation): RawEdgeRecord[] => byRelation.get(relation) ?? [];
        const relations: RelationIndexes = {
            [Relation.USES_PATTERN]: buildRelationIndex(
                Relation.USES_PATTERN, recordsOf(Relation.USES_PATTERN), parseUsesPattern, positions, log
            ),
            [Relation.BELONGS_TO]: buildRelationIndex(
                Relation.BELONGS_TO, recordsOf(Relation.BELONGS_TO), parseBelongsTo, positions, log
            ),
            [Relation.WORKS_WELL_IN]: buildRelationIndex(
                Relation.WORKS_WELL_IN, recordsOf(Relation.WORKS_WELL_IN), parseWorksWellIn, positions, log
            ),
        };

        if (log.size > 0) {
            throw new GraphIntegrityError(log.entries);
        }

        if (skippedTypes.size > 0 || skippedRelations.size > 0) {
            getLogger().warn(
                {
                    skippedNodeTypes: Object.fromEntries(skippedTypes),
                    skippedRelations: Object.fromEntries(skippedRelations),
                },
                'Skipped snapshot records of unmodeled types'
            );
        }

        this.graph = { nodes: arenas, positions, relations };
        getLogger().debug(this.getStats(), 'Graph snapshot loaded');
        return this;
    }

    /**
     * All nodes of one type, in load order.
     */
    nodesOfType<T extends NodeType>(type: T): readonly NodeOfType<T>[] {
        return this.loaded().nodes[type];
    }

    getNode<T extends NodeType>(type: T, id: string): NodeOfType<T> | undefined {
        const graph = this.loaded();
        const position = graph.positions[type].get(id);
        if (position === undefined) return undefined;
        return graph.nodes[type][position];
    }

    /**
     * Targets of `relation` edges leaving `nodeId`, in load order.
     * Unknown ids have no neighbors.
     */
    successors<R extends Relation>(nodeId: string, relation: R): readonly Neighbor<RelationAttributes[R]>[] {
        const graph = this.loaded();
        const position = graph.positions[RELATION_ENDPOINTS[relation].source].get(nodeId);
        if (position === undefined) return EMPTY;
        const index: RelationIndex<R> = graph.relations[relation];
        return index.forward[position] ?? EMPTY;
    }

    /**
     * Sources of `relation` edges entering `nodeId`, in load order.
     * Unknown ids have no neighbors.
     */
    predecessors<R extends Relation>(nodeId: string, relation: R): readonly Neighbor<RelationAttributes[R]>[] {
        const graph = this.loaded();
        const position = graph.positions[RELATION_ENDPOINTS[relation].target].get(nodeId);
        if (position === undefined) return EMPTY;
        const index: RelationIndex<R> = graph.relations[relation];
        return index.backward[position] ?? EMPTY;
    }

    /**
     * All edges of one relation, deduplicated, in load order.
     */
    edgesOf<R extends Relation>(relation: R): readonly GraphEdge<R>[] {
        const index: RelationIndex<R> = this.loaded().relations[relation];
        return index.edges;
    }

    getStats(): GraphStats {
        const { nodes, relations } = this.loaded();
        return {
            nodes: {
                [NodeType.PAPER]: nodes[NodeType.PAPER].length,
                [NodeType.DOMAIN]: nodes[NodeType.DOMAIN].length,
                [NodeType.IDEA]: nodes[NodeType.IDEA].length,
                [NodeType.PATTERN]: nodes[NodeType.PATTERN].length,
            },
            edges: {
                [Relation.USES_PATTERN]: relations[Relation.USES_PATTERN].edges.length,
                [Relation.BELONGS_TO]: relations[Relation.BELONGS_TO].edges.length,
                [Relation.WORKS_WELL_IN]: relations[Relation.WORKS_WELL_IN].edges.length,
            },
        };
    }

    private loaded(): LoadedGraph {
        if (!this.graph) {
            throw new NotLoadedError();
        }
        return this.graph;
    }
}

function pushNode(arenas: NodeArenas, node: GraphNode): number {
    switch (node.type) {
        case NodeType.PAPER:
            return arenas[NodeType.PAPER].push(node) - 1;
        case NodeType.DOMAIN:
            return arenas[NodeType.DOMAIN].push(node) - 1;
        case NodeType.IDEA:
            return arenas[NodeType.IDEA].push(node) - 1;
        case NodeType.PATTERN:
            return arenas[NodeType.PATTERN].push(node) - 1;
    }
}

/**
 * Resolve endpoints, collapse repeated triples, and materialize
 * forward/backward neighbor lists for one relation.
 */
function buildRelationIndex<R extends Relation>(
    relation: R,
    records: readonly RawEdgeRecord[],
    parse: (record: RawEdgeRecord, log: ViolationLog) => RelationAttributes[R],
    positions: Record<NodeType, Map<string, number>>,
    log: ViolationLog
): RelationIndex<R> {
    const { source: sourceType, target: targetType } = RELATION_ENDPOINTS[relation];
    const staged = new Map<string, { source: number; target: number; edge: GraphEdge<R> }>();

    for (const record of records) {
        const source = positions[sourceType].get(record.source);
        const target = positions[targetType].get(record.target);
        if (source === undefined) {
            log.add(`${edgeLabel(record)}: unknown ${sourceType} ${record.source}`);
        }
        if (target === undefined) {
            log.add(`${edgeLabel(record)}: unknown ${targetType} ${record.target}`);
        }

        const attributes = Object.freeze(parse(record, log));
        if (source === undefined || target === undefined) continue;

        // Map.set on an existing key keeps its insertion position
        staged.set(`${source}\u0000${target}`, {
            source,
            target,
            edge: Object.freeze({ source: record.source, target: record.target, relation, attributes }),
        });
    }

    const forward: Neighbor<RelationAttributes[R]>[][] = Array.from(
        { length: positions[sourceType].size }, () => []
    );
    const backward: Neighbor<RelationAttributes[R]>[][] = Array.from(
        { length: positions[targetType].size }, () => []
    );
    const edges: GraphEdge<R>[] = [];

    for (const { source, target, edge } of staged.values()) {
        edges.push(edge);
        forward[source]?.push(Object.freeze({ id: edge.target, attributes: edge.attributes }));
        backward[target]?.push(Object.freeze({ id: edge.source, attributes: edge.attributes }));
    }

    return { edges, forward, backward };
}
