import { describe, it, expect } from 'vitest';
import { DetectionMethod } from '../../types';
import { createDefaultExtractors, methodOrder, selectExtractors } from '../registry';

describe('extractor registry', () => {
    const scorer = { score: () => ({ confidence: 0.5, detail: 'stub' }) };

    it('should list the built-in detectors cheapest first', () => {
        expect(createDefaultExtractors().map(extractor => extractor.method)).toEqual([
            DetectionMethod.FILENAME_PATTERN,
            DetectionMethod.EXPLICIT_REFERENCE,
            DetectionMethod.ENTITY_MATCH,
            DetectionMethod.TEMPORAL_CORRELATION
        ]);
    });

    it('should add the semantic detector only with a scorer', () => {
        const methods = createDefaultExtractors({ scorer }).map(extractor => extractor.method);
        expect(methods).toHaveLength(5);
        expect(methods[4]).toBe(DetectionMethod.SEMANTIC);
    });

    it('should keep enabled detectors in their original order', () => {
        const selected = selectExtractors(createDefaultExtractors({ scorer }), [
            DetectionMethod.SEMANTIC,
            DetectionMethod.FILENAME_PATTERN
        ]);
        expect(selected.map(extractor => extractor.method)).toEqual([
            DetectionMethod.FILENAME_PATTERN,
            DetectionMethod.SEMANTIC
        ]);
    });

    it('should rank methods by first appearance', () => {
        const order = methodOrder(createDefaultExtractors());
        expect(order.get(DetectionMethod.FILENAME_PATTERN)).toBe(0);
        expect(order.get(DetectionMethod.TEMPORAL_CORRELATION)).toBe(3);
        expect(order.has(DetectionMethod.SEMANTIC)).toBe(false);
    });
});
