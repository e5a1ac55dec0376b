import { describe, it, expect } from 'vitest';
import { makeContext, makeDocument } from '@/test/fixtures';
import { DetectionMethod } from '../../types';
import { ExplicitReferenceExtractor, referenceContext } from '../reference-extractor';

describe('ExplicitReferenceExtractor', () => {
    const extractor = new ExplicitReferenceExtractor();
    const context = makeContext();

    const invoice = makeDocument('inv-1', {
        text: 'Invoice for services.\nReference: PO-12345\nThank you.'
    });
    const order = makeDocument('po-1', {
        fields: { po_number: 'PO-12345' },
        text: 'Purchase order'
    });

    it('should find a quoted purchase order number at 0.95', () => {
        expect(extractor.extract(invoice, order, context)).toEqual([{
            sourceId: 'inv-1',
            targetId: 'po-1',
            method: DetectionMethod.EXPLICIT_REFERENCE,
            confidence: 0.95,
            candidateType: 'invoice_for_po',
            detail: 'inv-1 mentions po_number "PO-12345" of po-1: "Invoice for services. Reference: PO-12345 Thank you."'
        }]);
    });

    it('should give the same evidence for either argument order', () => {
        expect(extractor.extract(order, invoice, context)).toEqual(extractor.extract(invoice, order, context));
    });

    it('should match case-insensitively', () => {
        const lower = makeDocument('inv-2', { text: 'see po-12345 attached' });
        const [evidence] = extractor.extract(lower, order, context);

        expect(evidence.confidence).toBe(0.95);
        expect(evidence.detail).toBe('inv-2 mentions po_number "PO-12345" of po-1: "see po-12345 attached"');
    });

    it('should report each direction separately', () => {
        const inv = makeDocument('inv-3', {
            fields: { invoice_number: 'INV-777' },
            text: 'Billing against PO-12345'
        });
        const po = makeDocument('po-3', {
            fields: { po_number: 'PO-12345' },
            text: 'Settled by INV-777'
        });

        const evidence = extractor.extract(inv, po, context);
        expect(evidence.map(item => [item.candidateType, item.sourceId, item.targetId])).toEqual([
            ['invoice_for_po', 'inv-3', 'po-3'],
            ['references_invoice', 'inv-3', 'po-3']
        ]);
    });

    it('should skip identifiers shorter than the minimum length', () => {
        const short = makeDocument('po-4', { fields: { po_number: 'P1' } });
        const text = makeDocument('inv-4', { text: 'Order P1 delivered' });

        expect(extractor.extract(text, short, context)).toEqual([]);
    });

    it('should skip documents with no text or identifiers', () => {
        expect(extractor.extract(makeDocument('a'), makeDocument('b'), context)).toEqual([]);
    });

    describe('referenceContext', () => {
        it('should mark truncated context with ellipses', () => {
            expect(referenceContext('aaaa bbbb TOKEN cccc dddd', 10, 5, 5)).toBe('...bbbb TOKEN cccc...');
        });

        it('should collapse whitespace', () => {
            expect(referenceContext('ref:\n\n  X-1', 8, 3, 40)).toBe('ref: X-1');
        });
    });
});
