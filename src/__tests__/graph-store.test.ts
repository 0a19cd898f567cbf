import { describe, it, expect } from 'vitest';
import { GraphStore } from '../graph/graph-store.js';
import { GraphIntegrityError, NotLoadedError } from '../errors.js';
import { NodeType, Relation } from '../types/index.js';
import { belongsTo, domain, idea, paper, pattern, snapshot, usesPattern, worksWellIn } from './helpers.js';

// Helper: the message list of a GraphIntegrityError thrown by `fn`
function violationsOf(fn: () => unknown): readonly string[] {
    try {
        fn();
    } catch (err) {
        if (err instanceof GraphIntegrityError) return err.violations;
        throw err;
    }
    throw new Error('expected GraphIntegrityError');
}

function sampleSnapshot() {
    return snapshot(
        [
            paper('paper_1', 'graph neural networks', 0.8),
            paper('paper_2', 'contrastive learning'),
            domain('domain_1', 'Graphs', ['graph']),
            idea('idea_1', 'message passing', [['pattern_1', 0.6]]),
            pattern('pattern_1'),
            pattern('pattern_2'),
        ],
        [
            usesPattern('paper_1', 'pattern_1', 0.9),
            usesPattern('paper_2', 'pattern_1', 0.4),
            usesPattern('paper_1', 'pattern_2', 0.3),
            belongsTo('idea_1', 'domain_1', 0.7),
            worksWellIn('pattern_2', 'domain_1', 0.2, 0.5),
        ]
    );
}

describe('GraphStore', () => {
    describe('before load', () => {
        it('should throw NotLoadedError on every query', () => {
            const store = new GraphStore();
            expect(store.isLoaded).toBe(false);
            expect(() => store.nodesOfType(NodeType.PAPER)).toThrow(NotLoadedError);
            expect(() => store.successors('paper_1', Relation.USES_PATTERN)).toThrow(NotLoadedError);
            expect(() => store.predecessors('pattern_1', Relation.USES_PATTERN)).toThrow(NotLoadedError);
            expect(() => store.getStats()).toThrow(NotLoadedError);
        });
    });

    describe('load', () => {
        it('should keep nodes of each type in load order', () => {
            const store = GraphStore.fromSnapshot(sampleSnapshot());
            expect(store.isLoaded).toBe(true);
            expect(store.nodesOfType(NodeType.PAPER).map((p) => p.id)).toEqual(['paper_1', 'paper_2']);
            expect(store.nodesOfType(NodeType.PATTERN).map((p) => p.id)).toEqual(['pattern_1', 'pattern_2']);
        });

        it('should parse typed attributes', () => {
            const store = GraphStore.fromSnapshot(sampleSnapshot());
            const first = store.getNode(NodeType.PAPER, 'paper_1');
            expect(first?.quality).toBe(0.8);
            expect(first?.core_idea).toBe('graph neural networks');
            // quality defaults to 0.5 when absent
            expect(store.getNode(NodeType.PAPER, 'paper_2')?.quality).toBe(0.5);
            expect(store.getNode(NodeType.IDEA, 'idea_1')?.pattern_relevance).toEqual([
                { pattern_id: 'pattern_1', relevance: 0.6 },
            ]);
            expect(store.getNode(NodeType.DOMAIN, 'domain_1')?.keywords).toEqual(['graph']);
        });

        it('should read missing text attributes as empty strings', () => {
            const store = GraphStore.fromSnapshot(snapshot([
                { id: 'paper_x', type: 'Paper', attributes: {} },
                { id: 'idea_x', type: 'Idea', attributes: {} },
            ]));
            expect(store.getNode(NodeType.PAPER, 'paper_x')?.core_idea).toBe('');
            expect(store.getNode(NodeType.IDEA, 'idea_x')?.description).toBe('');
            expect(store.getNode(NodeType.IDEA, 'idea_x')?.pattern_relevance).toEqual([]);
        });

        it('should keep unrecognized attributes in extra', () => {
            const store = GraphStore.fromSnapshot(snapshot([
                { id: 'pattern_x', type: 'Pattern', attributes: { name: 'X', writing_guide: 'Lead with the gap.' } },
            ]));
            expect(store.getNode(NodeType.PATTERN, 'pattern_x')?.extra).toEqual({ writing_guide: 'Lead with the gap.' });
        });

        it('should accept tuple and pattern_ids forms of pattern relevance', () => {
            const store = GraphStore.fromSnapshot(snapshot([
                pattern('pattern_1'),
                pattern('pattern_2'),
                { id: 'idea_t', type: 'Idea', attributes: { pattern_relevance: [['pattern_1', 0.3]] } },
                { id: 'idea_i', type: 'Idea', attributes: { pattern_ids: ['pattern_2'] } },
            ]));
            expect(store.getNode(NodeType.IDEA, 'idea_t')?.pattern_relevance).toEqual([
                { pattern_id: 'pattern_1', relevance: 0.3 },
            ]);
            expect(store.getNode(NodeType.IDEA, 'idea_i')?.pattern_relevance).toEqual([
                { pattern_id: 'pattern_2', relevance: 1.0 },
            ]);
        });

        it('should read paper_count as the pattern cluster size', () => {
            const store = GraphStore.fromSnapshot(snapshot([
                { id: 'pattern_x', type: 'Pattern', attributes: { name: 'X', paper_count: 7 } },
            ]));
            expect(store.getNode(NodeType.PATTERN, 'pattern_x')?.cluster_size).toBe(7);
            expect(store.getNode(NodeType.PATTERN, 'pattern_x')?.extra).toEqual({});
        });

        it('should allow the same id in different node types', () => {
            const store = GraphStore.fromSnapshot(snapshot([paper('shared', 'a'), pattern('shared')]));
            expect(store.getNode(NodeType.PAPER, 'shared')?.type).toBe(NodeType.PAPER);
            expect(store.getNode(NodeType.PATTERN, 'shared')?.type).toBe(NodeType.PATTERN);
        });

        it('should load an empty graph', () => {
            const store = GraphStore.fromSnapshot(snapshot([]));
            expect(store.nodesOfType(NodeType.IDEA)).toEqual([]);
            expect(store.getStats().edges[Relation.BELONGS_TO]).toBe(0);
        });

        it('should skip node types and relations it does not model', () => {
            const store = GraphStore.fromSnapshot(snapshot(
                [paper('paper_1', 'a'), pattern('pattern_1'), { id: 'review_1', type: 'Review', attributes: {} }],
                [
                    usesPattern('paper_1', 'pattern_1', 0.5),
                    { source: 'paper_1', target: 'review_1', relation: 'reviewed_by', attributes: {} },
                ]
            ));
            expect(store.getStats()).toEqual({
                nodes: { Paper: 1, Domain: 0, Idea: 0, Pattern: 1 },
                edges: { uses_pattern: 1, belongs_to: 0, works_well_in: 0 },
            });
        });

        it('should refuse a second load', () => {
            const store = GraphStore.fromSnapshot(sampleSnapshot());
            expect(() => store.load([], [])).toThrow('already loaded');
        });
    });

    describe('integrity', () => {
        it('should list every violation', () => {
            const violations = violationsOf(() => GraphStore.fromSnapshot(snapshot(
                [paper('paper_1', 'a'), pattern('pattern_1'), domain('domain_1', 'D')],
                [
                    usesPattern('paper_9', 'pattern_1', 0.5),
                    usesPattern('paper_1', 'pattern_1', 1.5),
                    worksWellIn('pattern_1', 'domain_9', 0.3, 0.5),
                ]
            )));
            expect(violations).toEqual([
                'edge paper_9 -[uses_pattern]-> pattern_1: unknown Paper paper_9',
                'edge paper_1 -[uses_pattern]-> pattern_1: quality 1.5 is outside [0, 1]',
                'edge pattern_1 -[works_well_in]-> domain_9: unknown Domain domain_9',
            ]);
        });

        it('should reject duplicate ids within a type', () => {
            const violations = violationsOf(() => GraphStore.fromSnapshot(snapshot([
                idea('idea_1', 'first'),
                idea('idea_1', 'second'),
            ])));
            expect(violations).toEqual(['duplicate Idea id idea_1']);
        });

        it('should reject ideas naming unknown patterns', () => {
            const violations = violationsOf(() => GraphStore.fromSnapshot(snapshot([
                pattern('pattern_1'),
                idea('idea_1', 'text', [['pattern_1', 0.5], ['pattern_9', 0.5]]),
            ])));
            expect(violations).toEqual(['Idea idea_1: pattern_relevance names unknown Pattern pattern_9']);
        });

        it('should reject out-of-range confidence and weight', () => {
            const violations = violationsOf(() => GraphStore.fromSnapshot(snapshot(
                [idea('idea_1', 'x'), domain('domain_1', 'D'), pattern('pattern_1')],
                [belongsTo('idea_1', 'domain_1', -0.1), worksWellIn('pattern_1', 'domain_1', 0.4, 2)]
            )));
            expect(violations).toHaveLength(2);
            expect(violations).toContain('edge idea_1 -[belongs_to]-> domain_1: weight -0.1 is outside [0, 1]');
            expect(violations).toContain('edge pattern_1 -[works_well_in]-> domain_1: confidence 2 is outside [0, 1]');
        });

        it('should reject unknown endpoints on relations it does not model', () => {
            const violations = violationsOf(() => GraphStore.fromSnapshot(snapshot(
                [pattern('pattern_1')],
                [{ source: 'ghost_a', target: 'ghost_b', relation: 'implements', attributes: {} }]
            )));
            expect(violations).toEqual([
                'edge ghost_a -[implements]-> ghost_b: unknown node ghost_a',
                'edge ghost_a -[implements]-> ghost_b: unknown node ghost_b',
            ]);
        });

        it('should reject pattern relevance outside [0, 1]', () => {
            const violations = violationsOf(() => GraphStore.fromSnapshot(snapshot([
                pattern('pattern_1'),
                pattern('pattern_2'),
                idea('idea_1', 'text', [['pattern_1', -0.5], ['pattern_2', 0.5]]),
            ])));
            expect(violations).toEqual(['Idea idea_1: relevance for pattern_1 -0.5 is outside [0, 1]']);
        });

        it('should leave the store unloaded after a failed load', () => {
            const store = new GraphStore();
            expect(() => store.load([paper('p', 'a')], [usesPattern('p', 'missing', 0.5)])).toThrow(GraphIntegrityError);
            expect(store.isLoaded).toBe(false);
        });
    });

    describe('adjacency', () => {
        const store = GraphStore.fromSnapshot(sampleSnapshot());

        it('should return successors with edge attributes in load order', () => {
            expect(store.successors('paper_1', Relation.USES_PATTERN)).toEqual([
                { id: 'pattern_1', attributes: { quality: 0.9 } },
                { id: 'pattern_2', attributes: { quality: 0.3 } },
            ]);
        });

        it('should return predecessors with edge attributes in load order', () => {
            expect(store.predecessors('pattern_1', Relation.USES_PATTERN)).toEqual([
                { id: 'paper_1', attributes: { quality: 0.9 } },
                { id: 'paper_2', attributes: { quality: 0.4 } },
            ]);
            expect(store.predecessors('domain_1', Relation.WORKS_WELL_IN)).toEqual([
                { id: 'pattern_2', attributes: { frequency: 10, effectiveness: 0.2, confidence: 0.5 } },
            ]);
        });

        it('should return no neighbors for unknown ids', () => {
            expect(store.successors('nope', Relation.BELONGS_TO)).toEqual([]);
            expect(store.predecessors('nope', Relation.BELONGS_TO)).toEqual([]);
        });

        it('should key neighbor lookups by the relation endpoint type', () => {
            // domain_1 is a target of belongs_to, not a source
            expect(store.successors('domain_1', Relation.BELONGS_TO)).toEqual([]);
            expect(store.predecessors('domain_1', Relation.BELONGS_TO)).toEqual([
                { id: 'idea_1', attributes: { weight: 0.7 } },
            ]);
        });

        it('should let a repeated edge replace attributes and keep its position', () => {
            const replaced = GraphStore.fromSnapshot(snapshot(
                [paper('paper_1', 'a'), pattern('pattern_1'), pattern('pattern_2')],
                [
                    usesPattern('paper_1', 'pattern_1', 0.2),
                    usesPattern('paper_1', 'pattern_2', 0.5),
                    usesPattern('paper_1', 'pattern_1', 0.9),
                ]
            ));
            expect(replaced.successors('paper_1', Relation.USES_PATTERN)).toEqual([
                { id: 'pattern_1', attributes: { quality: 0.9 } },
                { id: 'pattern_2', attributes: { quality: 0.5 } },
            ]);
            expect(replaced.edgesOf(Relation.USES_PATTERN)).toHaveLength(2);
        });

        it('should report counts per type and relation', () => {
            expect(store.getStats()).toEqual({
                nodes: { Paper: 2, Domain: 1, Idea: 1, Pattern: 2 },
                edges: { uses_pattern: 3, belongs_to: 1, works_well_in: 1 },
            });
        });
    });
});
