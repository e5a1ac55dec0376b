/**
 * EntityMatchExtractor - Shared parties, tax IDs and amounts
 *
 * Specific entities (tax ID, exact amount) are strong signals; a shared
 * organisation name alone is weak and scales with token overlap. Signals
 * accumulate toward maxConfidence and never pass it.
 */

import {
    normalizeNameTokens,
    normalizeTaxId,
    readField,
    readNumber,
    toCents,
    tokenSetOverlap,
    type Document
} from '@/lib/documents';
import type { RelationshipConfig } from '../config';
import { canonicalDocuments } from '../canonical';
import { DetectionMethod, RelationshipTypes, type Evidence } from '../types';
import type { EvidenceExtractor, ExtractionContext } from './types';

type EntityConfig = RelationshipConfig['entity'];

export interface EntitySignal {
    kind: 'tax_id' | 'amount' | 'name';
    value: string;
    confidence: number;
}

interface NameEntry {
    raw: string;
    tokens: string[];
}

function stringValues(doc: Document, fields: readonly string[]): string[] {
    const values: string[] = [];
    for (const name of fields) {
        const value = readField(doc, name);
        if (typeof value === 'string' && value.trim() !== '') values.push(value.trim());
    }
    return values;
}

function taxIds(doc: Document, fields: readonly string[]): Set<string> {
    return new Set(
        stringValues(doc, fields)
            .map(normalizeTaxId)
            .filter(id => id.length > 0)
    );
}

function amounts(doc: Document, fields: readonly string[]): Set<number> {
    const cents = new Set<number>();
    for (const name of fields) {
        const amount = readNumber(doc, name);
        if (amount !== undefined && amount > 0) cents.add(toCents(amount));
    }
    return cents;
}

function names(doc: Document, fields: readonly string[]): NameEntry[] {
    return stringValues(doc, fields)
        .map(raw => ({ raw, tokens: normalizeNameTokens(raw) }))
        .filter(entry => entry.tokens.length > 0);
}

/**
 * Map a token overlap at or above the threshold onto [nameMin, nameMax]
 */
export function nameConfidence(overlap: number, config: EntityConfig): number {
    if (overlap < config.nameOverlapThreshold) return 0;
    const span = 1 - config.nameOverlapThreshold;
    const position = span > 0 ? (overlap - config.nameOverlapThreshold) / span : 1;
    return config.nameMinConfidence + (config.nameMaxConfidence - config.nameMinConfidence) * position;
}

/**
 * cap × (1 − Π(1 − sᵢ/cap)): one signal keeps its value, more approach the cap
 */
export function combineTowardCap(signals: readonly number[], cap: number): number {
    if (signals.length === 0 || cap <= 0) return 0;
    let remaining = 1;
    for (const signal of signals) {
        remaining *= 1 - Math.min(signal, cap) / cap;
    }
    return cap * (1 - remaining);
}

export function findSharedEntities(a: Document, b: Document, config: EntityConfig): EntitySignal[] {
    const signals: EntitySignal[] = [];

    const taxB = taxIds(b, config.taxIdFields);
    for (const id of taxIds(a, config.taxIdFields)) {
        if (taxB.has(id)) signals.push({ kind: 'tax_id', value: id, confidence: config.taxIdConfidence });
    }

    const amountsB = amounts(b, config.amountFields);
    for (const cents of amounts(a, config.amountFields)) {
        if (amountsB.has(cents)) {
            signals.push({ kind: 'amount', value: (cents / 100).toFixed(2), confidence: config.amountConfidence });
        }
    }

    const namesB = names(b, config.nameFields);
    const matchedNames = new Set<string>();
    for (const nameA of names(a, config.nameFields)) {
        let best = 0;
        for (const nameB of namesB) {
            best = Math.max(best, nameConfidence(tokenSetOverlap(nameA.tokens, nameB.tokens), config));
        }
        // The same party under two fields (vendor, vendor_name) counts once
        const key = nameA.tokens.join(' ');
        if (best > 0 && !matchedNames.has(key)) {
            matchedNames.add(key);
            signals.push({ kind: 'name', value: nameA.raw, confidence: best });
        }
    }

    return signals;
}

export class EntityMatchExtractor implements EvidenceExtractor {
    readonly method = DetectionMethod.ENTITY_MATCH;

    extract(a: Document, b: Document, { config }: ExtractionContext): Evidence[] {
        const [source, target] = canonicalDocuments(a, b);
        const signals = findSharedEntities(source, target, config.entity);
        if (signals.length === 0) return [];

        const sourceId = source.id;
        const targetId = target.id;
        const confidence = combineTowardCap(signals.map(s => s.confidence), config.entity.maxConfidence);

        return [{
            sourceId,
            targetId,
            method: this.method,
            confidence,
            candidateType: RelationshipTypes.SHARED_ENTITIES,
            detail: `Common entities: ${signals.map(s => `${s.kind} "${s.value}"`).join(', ')}`
        }];
    }
}
