import { describe, it, expect } from 'vitest';
import { NODE_TYPES, NodeType, PATH_NAMES, RELATION_ENDPOINTS, RELATIONS, Relation } from '../types/index.js';

describe('Types', () => {
    describe('NodeType', () => {
        it('should have 4 node types', () => {
            expect(Object.values(NodeType)).toHaveLength(4);
            expect(NODE_TYPES).toEqual(['Paper', 'Domain', 'Idea', 'Pattern']);
        });
    });

    describe('Relation', () => {
        it('should list every relation', () => {
            expect(new Set(RELATIONS)).toEqual(new Set(Object.values(Relation)));
        });

        it('should connect the documented endpoint types', () => {
            expect(RELATION_ENDPOINTS[Relation.USES_PATTERN]).toEqual({ source: NodeType.PAPER, target: NodeType.PATTERN });
            expect(RELATION_ENDPOINTS[Relation.BELONGS_TO]).toEqual({ source: NodeType.IDEA, target: NodeType.DOMAIN });
            expect(RELATION_ENDPOINTS[Relation.WORKS_WELL_IN]).toEqual({ source: NodeType.PATTERN, target: NodeType.DOMAIN });
        });
    });

    describe('PATH_NAMES', () => {
        it('should list the three recall paths in report order', () => {
            expect(PATH_NAMES).toEqual(['idea', 'domain', 'paper']);
        });
    });
});
