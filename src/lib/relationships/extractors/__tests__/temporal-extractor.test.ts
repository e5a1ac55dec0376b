import { describe, it, expect } from 'vitest';
import { makeContext, makeDocument } from '@/test/fixtures';
import { DetectionMethod } from '../../types';
import { TemporalCorrelationExtractor, temporalConfidence } from '../temporal-extractor';

describe('TemporalCorrelationExtractor', () => {
    const extractor = new TemporalCorrelationExtractor();
    const context = makeContext();

    it('should decay linearly across the window', () => {
        expect(temporalConfidence(0, 30)).toBe(1);
        expect(temporalConfidence(15, 30)).toBe(0.5);
        expect(temporalConfidence(30, 30)).toBe(0);
        expect(temporalConfidence(31, 30)).toBe(0);
    });

    it('should give 0.5 for documents 15 days apart', () => {
        const a = makeDocument('a', { fields: { issue_date: '2024-01-01' } });
        const b = makeDocument('b', { fields: { issue_date: '2024-01-16' } });

        expect(extractor.extract(b, a, context)).toEqual([{
            sourceId: 'a',
            targetId: 'b',
            method: DetectionMethod.TEMPORAL_CORRELATION,
            confidence: 0.5,
            detail: 'Dated 15 days apart (2024-01-01 / 2024-01-16)'
        }]);
    });

    it('should give nothing for documents 31 days apart', () => {
        const a = makeDocument('a', { fields: { issue_date: '2024-01-01' } });
        const b = makeDocument('b', { fields: { issue_date: '2024-02-01' } });

        expect(extractor.extract(a, b, context)).toEqual([]);
    });

    it('should use the first parseable date field of each document', () => {
        const invoice = makeDocument('a', { fields: { invoice_date: '01/10/2024' } });
        const order = makeDocument('b', { fields: { po_date: '2024-01-10', date: '2023-06-01' } });

        const [evidence] = extractor.extract(invoice, order, context);
        expect(evidence.confidence).toBe(1);
        expect(evidence.detail).toBe('Dated 0 days apart (2024-01-10 / 2024-01-10)');
    });

    it('should carry no candidate type', () => {
        const a = makeDocument('a', { fields: { date: '2024-05-01' } });
        const b = makeDocument('b', { fields: { date: '2024-05-02' } });

        const [evidence] = extractor.extract(a, b, context);
        expect(evidence.candidateType).toBeUndefined();
        expect(evidence.detail).toBe('Dated 1 day apart (2024-05-01 / 2024-05-02)');
    });

    it('should give nothing when a date is missing', () => {
        const a = makeDocument('a', { fields: { issue_date: '2024-01-01' } });
        const b = makeDocument('b', { fields: { issue_date: 'unknown' } });

        expect(extractor.extract(a, b, context)).toEqual([]);
    });

    it('should honour a configured window', () => {
        const wide = makeContext({ temporal: { windowDays: 60 } });
        const a = makeDocument('a', { fields: { issue_date: '2024-01-01' } });
        const b = makeDocument('b', { fields: { issue_date: '2024-02-01' } });

        const [evidence] = extractor.extract(a, b, wide);
        expect(evidence.confidence).toBeCloseTo(1 - 31 / 60);
    });
});
