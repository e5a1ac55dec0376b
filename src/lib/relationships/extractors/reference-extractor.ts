/**
 * ExplicitReferenceExtractor - Document numbers quoted in the other document
 *
 * An invoice whose text says "Reference: PO-12345" points at the purchase
 * order whose extracted po_number is PO-12345. Each direction is checked
 * separately and contributes at most one evidence item.
 */

import { readField, type Document } from '@/lib/documents';
import type { IdentifierField } from '../config';
import { canonicalDocuments, canonicalPair } from '../canonical';
import { DetectionMethod, type Evidence } from '../types';
import type { EvidenceExtractor, ExtractionContext } from './types';

interface Identifier {
    token: string;
    field: IdentifierField;
}

interface ReferenceHit {
    identifier: Identifier;
    index: number;
}

function collectIdentifiers(
    doc: Document,
    fields: readonly IdentifierField[],
    minLength: number
): Identifier[] {
    const identifiers: Identifier[] = [];
    for (const field of fields) {
        const value = readField(doc, field.field);
        if (value === undefined || typeof value === 'boolean') continue;

        const token = String(value).trim();
        if (token.length >= minLength) {
            identifiers.push({ token, field });
        }
    }
    return identifiers;
}

function findFirstReference(text: string, identifiers: readonly Identifier[]): ReferenceHit | null {
    if (text.length === 0) return null;

    const haystack = text.toLowerCase();
    for (const identifier of identifiers) {
        const index = haystack.indexOf(identifier.token.toLowerCase());
        if (index !== -1) return { identifier, index };
    }
    return null;
}

/**
 * Text around a hit, whitespace collapsed, with ellipses where truncated
 */
export function referenceContext(text: string, index: number, length: number, radius: number): string {
    const start = Math.max(0, index - radius);
    const end = Math.min(text.length, index + length + radius);
    const snippet = text.slice(start, end).replace(/\s+/g, ' ').trim();
    return `${start > 0 ? '...' : ''}${snippet}${end < text.length ? '...' : ''}`;
}

export class ExplicitReferenceExtractor implements EvidenceExtractor {
    readonly method = DetectionMethod.EXPLICIT_REFERENCE;

    extract(a: Document, b: Document, { config }: ExtractionContext): Evidence[] {
        const { identifierFields, minIdentifierLength } = config.reference;

        // Scan in canonical order so either argument order yields the same list
        const [first, second] = canonicalDocuments(a, b);
        const identifiersFirst = collectIdentifiers(first, identifierFields, minIdentifierLength);
        const identifiersSecond = collectIdentifiers(second, identifierFields, minIdentifierLength);
        if (identifiersFirst.length === 0 && identifiersSecond.length === 0) return [];

        const evidence: Evidence[] = [];
        const fromFirst = this.scan(first, second, identifiersSecond, config.reference);
        if (fromFirst) evidence.push(fromFirst);
        const fromSecond = this.scan(second, first, identifiersFirst, config.reference);
        if (fromSecond) evidence.push(fromSecond);

        return evidence;
    }

    /**
     * Look for the referenced document's identifiers in the referencing text
     */
    private scan(
        referencing: Document,
        referenced: Document,
        identifiers: readonly Identifier[],
        settings: { confidence: number; contextChars: number }
    ): Evidence | null {
        const hit = findFirstReference(referencing.textContent, identifiers);
        if (!hit) return null;

        const { token, field } = hit.identifier;
        const [sourceId, targetId] = canonicalPair(referencing.id, referenced.id);
        const context = referenceContext(referencing.textContent, hit.index, token.length, settings.contextChars);

        return {
            sourceId,
            targetId,
            method: this.method,
            confidence: settings.confidence,
            candidateType: field.relationshipType,
            detail: `${referencing.id} mentions ${field.field} "${token}" of ${referenced.id}: "${context}"`
        };
    }
}
