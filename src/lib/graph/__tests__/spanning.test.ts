import { describe, it, expect } from 'vitest';
import { DetectionMethod, type Relationship } from '@/lib/relationships/types';
import { maximumSpanningForest } from '../spanning';
import { UnionFind } from '../UnionFind';

function edge(sourceId: string, targetId: string, confidence: number): Relationship {
    return {
        sourceId,
        targetId,
        relationshipType: 'related',
        confidence,
        evidence: [],
        detectionMethods: [DetectionMethod.SEMANTIC],
        confidenceByMethod: {}
    };
}

describe('UnionFind', () => {
    it('should merge sets and report whether anything changed', () => {
        const sets = new UnionFind(['a', 'b', 'c']);

        expect(sets.union('a', 'b')).toBe(true);
        expect(sets.union('b', 'a')).toBe(false);
        expect(sets.connected('a', 'b')).toBe(true);
        expect(sets.connected('a', 'c')).toBe(false);
        expect(sets.groups()).toEqual([['a', 'b'], ['c']]);
    });

    it('should refuse unknown items', () => {
        const sets = new UnionFind<string>();
        expect(() => sets.find('x')).toThrow('unknown item x');
    });
});

describe('maximumSpanningForest', () => {
    it('should keep the strongest edges that connect each component', () => {
        const forest = maximumSpanningForest(['a', 'b', 'c'], [
            edge('a', 'b', 0.9),
            edge('b', 'c', 0.7),
            edge('a', 'c', 0.8)
        ]);

        expect(forest.map(rel => `${rel.sourceId}-${rel.targetId}`)).toEqual(['a-b', 'a-c']);
    });

    it('should ignore edges leaving the given documents', () => {
        const forest = maximumSpanningForest(['a', 'b'], [edge('a', 'b', 0.6), edge('b', 'z', 0.99)]);

        expect(forest).toHaveLength(1);
        expect(forest[0].confidence).toBe(0.6);
    });

    it('should return nothing for isolated documents', () => {
        expect(maximumSpanningForest(['a'], [])).toEqual([]);
    });
});
