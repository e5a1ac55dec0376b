/**
 * RelationshipAggregator - Evidence fusion per document pair
 *
 * - Canonical pair grouping (no duplicate reverse edges)
 * - Noise floor pruning before fusion
 * - Noisy-OR confidence: corroboration only ever raises the score
 * - Type taken from the strongest typed evidence, `related` on a tie
 * - Acceptance threshold on the fused score
 */

import { InvalidEvidenceError } from '@/lib/errors';
import type { RelationshipConfig } from './config';
import { canonicalizeEvidence, pairKey } from './canonical';
import {
    ALL_DETECTION_METHODS,
    RelationshipTypes,
    type DetectionMethod,
    type Evidence,
    type Relationship
} from './types';

const TIE_EPSILON = 1e-9;

export interface PairOutcome {
    sourceId: string;
    targetId: string;
    combinedConfidence: number;
    relationship: Relationship | null;
    discardedEvidence: number;
}

export interface AggregationResult {
    relationships: Relationship[];
    rejected: PairOutcome[];
    discardedEvidence: number;
}

/**
 * 1 − Π(1 − cᵢ)
 */
export function noisyOr(confidences: readonly number[]): number {
    let miss = 1;
    for (const confidence of confidences) {
        miss *= 1 - confidence;
    }
    return Math.min(1, 1 - miss);
}

export function assertValidEvidence(evidence: Evidence): void {
    if (!Number.isFinite(evidence.confidence) || evidence.confidence < 0 || evidence.confidence > 1) {
        throw new InvalidEvidenceError(
            `Evidence confidence ${evidence.confidence} outside [0, 1]`,
            { sourceId: evidence.sourceId, targetId: evidence.targetId, method: evidence.method }
        );
    }
    if (evidence.sourceId === evidence.targetId) {
        throw new InvalidEvidenceError(
            `Evidence relates document ${evidence.sourceId} to itself`,
            { sourceId: evidence.sourceId, method: evidence.method }
        );
    }
}

const DEFAULT_METHOD_RANK = new Map<DetectionMethod, number>(
    ALL_DETECTION_METHODS.map((method, index) => [method, index])
);

export class RelationshipAggregator {
    constructor(
        private config: RelationshipConfig,
        private methodRank: ReadonlyMap<DetectionMethod, number> = DEFAULT_METHOD_RANK
    ) {}

    /**
     * Fuse the evidence of a single pair. All items must name the same pair
     * (in either orientation).
     */
    aggregatePair(evidence: readonly Evidence[]): PairOutcome {
        if (evidence.length === 0) {
            throw new InvalidEvidenceError('Cannot aggregate an empty evidence set');
        }

        const canonical = evidence.map(item => {
            assertValidEvidence(item);
            return canonicalizeEvidence(item);
        });

        const { sourceId, targetId } = canonical[0];
        for (const item of canonical) {
            if (item.sourceId !== sourceId || item.targetId !== targetId) {
                throw new InvalidEvidenceError(
                    `Evidence for ${item.sourceId}/${item.targetId} mixed into pair ${sourceId}/${targetId}`,
                    { expected: pairKey(sourceId, targetId), actual: pairKey(item.sourceId, item.targetId) }
                );
            }
        }

        const surviving = this.orderEvidence(
            canonical.filter(item => item.confidence > this.config.evidenceFloor)
        );
        const discardedEvidence = canonical.length - surviving.length;

        if (surviving.length === 0) {
            return { sourceId, targetId, combinedConfidence: 0, relationship: null, discardedEvidence };
        }

        const combinedConfidence = noisyOr(surviving.map(item => item.confidence));
        if (combinedConfidence < this.config.acceptanceThreshold) {
            return { sourceId, targetId, combinedConfidence, relationship: null, discardedEvidence };
        }

        return {
            sourceId,
            targetId,
            combinedConfidence,
            discardedEvidence,
            relationship: {
                sourceId,
                targetId,
                relationshipType: this.selectType(surviving),
                confidence: combinedConfidence,
                evidence: surviving,
                detectionMethods: this.distinctMethods(surviving),
                confidenceByMethod: this.computeConfidenceByMethod(surviving)
            }
        };
    }

    /**
     * Group a mixed evidence list by canonical pair and fuse each group.
     * Relationships come back in the order their pairs first appeared.
     */
    aggregate(evidence: readonly Evidence[]): AggregationResult {
        const grouped = new Map<string, Evidence[]>();
        for (const item of evidence) {
            const key = pairKey(item.sourceId, item.targetId);
            let group = grouped.get(key);
            if (!group) {
                group = [];
                grouped.set(key, group);
            }
            group.push(item);
        }

        const result: AggregationResult = { relationships: [], rejected: [], discardedEvidence: 0 };
        for (const group of grouped.values()) {
            const outcome = this.aggregatePair(group);
            result.discardedEvidence += outcome.discardedEvidence;
            if (outcome.relationship) {
                result.relationships.push(outcome.relationship);
            } else {
                result.rejected.push(outcome);
            }
        }
        return result;
    }

    private rank(method: DetectionMethod): number {
        return this.methodRank.get(method) ?? Number.MAX_SAFE_INTEGER;
    }

    /**
     * Detector order, stable within a detector
     */
    private orderEvidence(evidence: Evidence[]): Evidence[] {
        return evidence
            .map((item, index) => ({ item, index }))
            .sort((a, b) => this.rank(a.item.method) - this.rank(b.item.method) || a.index - b.index)
            .map(({ item }) => item);
    }

    private selectType(evidence: readonly Evidence[]): string {
        let top = -1;
        let types = new Set<string>();

        for (const item of evidence) {
            if (!item.candidateType) continue;

            if (item.confidence > top + TIE_EPSILON) {
                top = item.confidence;
                types = new Set([item.candidateType]);
            } else if (Math.abs(item.confidence - top) <= TIE_EPSILON) {
                types.add(item.candidateType);
            }
        }

        if (types.size !== 1) return RelationshipTypes.RELATED;
        const [only] = types;
        return only;
    }

    private distinctMethods(evidence: readonly Evidence[]): DetectionMethod[] {
        return [...new Set(evidence.map(item => item.method))];
    }

    private computeConfidenceByMethod(evidence: readonly Evidence[]): Partial<Record<DetectionMethod, number>> {
        const result: Partial<Record<DetectionMethod, number>> = {};

        for (const item of evidence) {
            const existing = result[item.method];
            if (existing === undefined || item.confidence > existing) {
                result[item.method] = item.confidence;
            }
        }

        return result;
    }
}
