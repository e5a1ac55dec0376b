import { describe, it, expect } from 'vitest';
import { InvalidEvidenceError } from '@/lib/errors';
import { captureError } from '@/test/fixtures';
import { resolveConfig } from '../config';
import { RelationshipAggregator, noisyOr } from '../RelationshipAggregator';
import { DetectionMethod, type Evidence } from '../types';

function evidence(
    method: DetectionMethod,
    confidence: number,
    candidateType?: string,
    sourceId = 'a',
    targetId = 'b'
): Evidence {
    return {
        sourceId,
        targetId,
        method,
        confidence,
        detail: `${method} ${confidence}`,
        ...(candidateType !== undefined ? { candidateType } : {})
    };
}

describe('RelationshipAggregator', () => {
    const aggregator = new RelationshipAggregator(resolveConfig());

    describe('noisyOr', () => {
        it('should combine independent signals', () => {
            expect(noisyOr([0.9, 0.95])).toBeCloseTo(0.995);
            expect(noisyOr([0.5])).toBe(0.5);
            expect(noisyOr([])).toBe(0);
        });

        it('should never decrease as evidence is added and never exceed 1', () => {
            const signals = [0.3, 0.2, 0.9, 0.01, 1];
            let previous = 0;
            for (let i = 1; i <= signals.length; i++) {
                const combined = noisyOr(signals.slice(0, i));
                expect(combined).toBeGreaterThanOrEqual(previous);
                expect(combined).toBeLessThanOrEqual(1);
                previous = combined;
            }
        });
    });

    it('should fuse a pair into one typed relationship', () => {
        const outcome = aggregator.aggregatePair([
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po'),
            evidence(DetectionMethod.EXPLICIT_REFERENCE, 0.95, 'invoice_for_po')
        ]);

        expect(outcome.relationship).toMatchObject({
            sourceId: 'a',
            targetId: 'b',
            relationshipType: 'invoice_for_po',
            detectionMethods: [DetectionMethod.FILENAME_PATTERN, DetectionMethod.EXPLICIT_REFERENCE],
            confidenceByMethod: {
                [DetectionMethod.FILENAME_PATTERN]: 0.9,
                [DetectionMethod.EXPLICIT_REFERENCE]: 0.95
            }
        });
        expect(outcome.relationship?.confidence).toBeCloseTo(0.995);
    });

    it('should produce no edge for a single entity match at 0.3', () => {
        const outcome = aggregator.aggregatePair([evidence(DetectionMethod.ENTITY_MATCH, 0.3, 'shared_entities')]);

        expect(outcome.relationship).toBeNull();
        expect(outcome.combinedConfidence).toBeCloseTo(0.3);
    });

    it('should discard evidence at or below the floor', () => {
        const outcome = aggregator.aggregatePair([
            evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.05),
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po')
        ]);

        expect(outcome.discardedEvidence).toBe(1);
        expect(outcome.relationship?.evidence).toHaveLength(1);
        expect(outcome.relationship?.confidence).toBeCloseTo(0.9);
    });

    it('should store the same edge whatever the orientation or emission order', () => {
        const forward = aggregator.aggregatePair([
            evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.5, undefined, 'a', 'b'),
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po', 'a', 'b')
        ]);
        const reversed = aggregator.aggregatePair([
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po', 'b', 'a'),
            evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.5, undefined, 'b', 'a')
        ]);

        expect(reversed).toEqual(forward);
        expect(forward.relationship?.evidence.map(item => item.method)).toEqual([
            DetectionMethod.FILENAME_PATTERN,
            DetectionMethod.TEMPORAL_CORRELATION
        ]);
    });

    describe('type selection', () => {
        it('should fall back to related on a tie between types', () => {
            const outcome = aggregator.aggregatePair([
                evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po'),
                evidence(DetectionMethod.SEMANTIC, 0.9, 'versioned_copy')
            ]);

            expect(outcome.relationship?.relationshipType).toBe('related');
        });

        it('should ignore untyped evidence when choosing the type', () => {
            const outcome = aggregator.aggregatePair([
                evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.95),
                evidence(DetectionMethod.ENTITY_MATCH, 0.5, 'shared_entities')
            ]);

            expect(outcome.relationship?.relationshipType).toBe('shared_entities');
        });

        it('should use related when no evidence is typed', () => {
            const outcome = aggregator.aggregatePair([evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.8)]);

            expect(outcome.relationship?.relationshipType).toBe('related');
        });
    });

    it('should keep the strongest confidence per method', () => {
        const outcome = aggregator.aggregatePair([
            evidence(DetectionMethod.EXPLICIT_REFERENCE, 0.6, 'references'),
            evidence(DetectionMethod.EXPLICIT_REFERENCE, 0.95, 'invoice_for_po')
        ]);

        expect(outcome.relationship?.confidenceByMethod).toEqual({ [DetectionMethod.EXPLICIT_REFERENCE]: 0.95 });
        expect(outcome.relationship?.detectionMethods).toEqual([DetectionMethod.EXPLICIT_REFERENCE]);
    });

    it('should reject malformed evidence sets', () => {
        expect(captureError(() => aggregator.aggregatePair([]))).toBeInstanceOf(InvalidEvidenceError);
        expect(captureError(() => aggregator.aggregatePair([
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, undefined, 'a', 'b'),
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, undefined, 'a', 'c')
        ]))).toBeInstanceOf(InvalidEvidenceError);
        expect(captureError(() => aggregator.aggregatePair([
            evidence(DetectionMethod.SEMANTIC, 1.2)
        ]))).toBeInstanceOf(InvalidEvidenceError);
        expect(captureError(() => aggregator.aggregatePair([
            evidence(DetectionMethod.SEMANTIC, 0.7, undefined, 'a', 'a')
        ]))).toBeInstanceOf(InvalidEvidenceError);
    });

    it('should group mixed evidence by canonical pair', () => {
        const result = aggregator.aggregate([
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po', 'b', 'a'),
            evidence(DetectionMethod.ENTITY_MATCH, 0.3, 'shared_entities', 'c', 'd'),
            evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.5, undefined, 'a', 'b'),
            evidence(DetectionMethod.TEMPORAL_CORRELATION, 0.02, undefined, 'c', 'd')
        ]);

        expect(result.relationships).toHaveLength(1);
        expect(result.relationships[0].confidence).toBeCloseTo(0.95);
        expect(result.rejected.map(outcome => [outcome.sourceId, outcome.targetId])).toEqual([['c', 'd']]);
        expect(result.discardedEvidence).toBe(1);
    });

    it('should not merge pairs whose ids only differ in where a separator falls', () => {
        const result = aggregator.aggregate([
            evidence(DetectionMethod.FILENAME_PATTERN, 0.9, 'invoice_for_po', 'a::b', 'c'),
            evidence(DetectionMethod.EXPLICIT_REFERENCE, 0.95, 'invoice_for_po', 'a', 'b::c')
        ]);

        expect(result.relationships.map(rel => [rel.sourceId, rel.targetId])).toEqual([['a::b', 'c'], ['a', 'b::c']]);
    });
});
