import type { Evidence } from './types';

/**
 * Lexicographically smaller id first, so (A,B) and (B,A) share one key
 */
export function canonicalPair(a: string, b: string): [string, string] {
    return a <= b ? [a, b] : [b, a];
}

/**
 * Unambiguous key for an unordered pair; ids may contain any separator
 */
export function pairKey(a: string, b: string): string {
    return JSON.stringify(canonicalPair(a, b));
}

export function isCanonical(sourceId: string, targetId: string): boolean {
    return sourceId <= targetId;
}

export function canonicalizeEvidence(evidence: Evidence): Evidence {
    if (isCanonical(evidence.sourceId, evidence.targetId)) return evidence;
    return { ...evidence, sourceId: evidence.targetId, targetId: evidence.sourceId };
}

/**
 * Order two documents the way their ids are ordered
 */
export function canonicalDocuments<T extends { id: string }>(a: T, b: T): [T, T] {
    return a.id <= b.id ? [a, b] : [b, a];
}
