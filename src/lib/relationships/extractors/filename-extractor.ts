/**
 * FilenamePatternExtractor - Pairing by document naming conventions
 *
 * Two patterns:
 * 1. Paired prefixes sharing a document number (INV-001 / PO-001)
 * 2. Identical names differing only in a trailing version or part marker
 *    (contract_v1 / contract_v2, report_part1 / report_part2)
 */

import { isNumericToken, stripLeadingZeros, tokenizeFilename, type Document } from '@/lib/documents';
import type { PrefixPair } from '../config';
import { canonicalDocuments } from '../canonical';
import { DetectionMethod, RelationshipTypes, type Evidence } from '../types';
import type { EvidenceExtractor, ExtractionContext } from './types';

const VERSION_KEYWORDS = new Set(['v', 'ver', 'version', 'rev']);
const PART_KEYWORDS = new Set(['part', 'pt']);

type MarkerKind = 'version' | 'part';

interface TrailingMarker {
    kind: MarkerKind;
    number: string;
    base: string[];
}

export interface FilenameShape {
    tokens: string[];
    prefix: string;
    numbers: string[];
}

export function describeFilename(filename: string): FilenameShape {
    const tokens = tokenizeFilename(filename);
    const firstNumeric = tokens.findIndex(isNumericToken);
    const prefixTokens = firstNumeric === -1 ? tokens : tokens.slice(0, firstNumeric);

    return {
        tokens,
        prefix: prefixTokens.join('_'),
        numbers: tokens.filter(isNumericToken).map(stripLeadingZeros),
    };
}

function trailingMarker(tokens: readonly string[]): TrailingMarker | null {
    if (tokens.length < 3) return null;

    const keyword = tokens[tokens.length - 2];
    const number = tokens[tokens.length - 1];
    if (!isNumericToken(number)) return null;

    let kind: MarkerKind | null = null;
    if (VERSION_KEYWORDS.has(keyword)) kind = 'version';
    else if (PART_KEYWORDS.has(keyword)) kind = 'part';
    if (!kind) return null;

    return { kind, number: stripLeadingZeros(number), base: tokens.slice(0, -2) };
}

function findPrefixPair(pairs: readonly PrefixPair[], a: string, b: string): PrefixPair | undefined {
    return pairs.find(({ prefixes: [x, y] }) => (x === a && y === b) || (x === b && y === a));
}

function sameSequence(a: readonly string[], b: readonly string[]): boolean {
    return a.length === b.length && a.every((token, i) => token === b[i]);
}

export class FilenamePatternExtractor implements EvidenceExtractor {
    readonly method = DetectionMethod.FILENAME_PATTERN;

    extract(a: Document, b: Document, { config }: ExtractionContext): Evidence[] {
        const [source, target] = canonicalDocuments(a, b);
        const shapeA = describeFilename(source.filename);
        const shapeB = describeFilename(target.filename);
        if (shapeA.tokens.length === 0 || shapeB.tokens.length === 0) return [];

        const sourceId = source.id;
        const targetId = target.id;
        const confidence = config.filename.confidence;

        const markerA = trailingMarker(shapeA.tokens);
        const markerB = trailingMarker(shapeB.tokens);
        if (
            markerA && markerB &&
            markerA.kind === markerB.kind &&
            markerA.number !== markerB.number &&
            sameSequence(markerA.base, markerB.base)
        ) {
            const isVersion = markerA.kind === 'version';
            return [{
                sourceId,
                targetId,
                method: this.method,
                confidence,
                candidateType: isVersion ? RelationshipTypes.VERSIONED_COPY : RelationshipTypes.MULTI_PART,
                detail: `Filename ${markerA.kind} match: "${markerA.base.join('_')}" ` +
                    `${markerA.kind} ${markerA.number} / ${markerB.number}`
            }];
        }

        if (
            shapeA.numbers.length > 0 &&
            shapeA.prefix !== '' && shapeB.prefix !== '' &&
            shapeA.prefix !== shapeB.prefix &&
            sameSequence(shapeA.numbers, shapeB.numbers)
        ) {
            const pair = findPrefixPair(config.filename.prefixPairs, shapeA.prefix, shapeB.prefix);
            if (pair) {
                return [{
                    sourceId,
                    targetId,
                    method: this.method,
                    confidence,
                    candidateType: pair.relationshipType,
                    detail: `Filename pattern match: ${shapeA.prefix}/${shapeB.prefix} share number ` +
                        shapeA.numbers.join('-')
                }];
            }
        }

        return [];
    }
}
