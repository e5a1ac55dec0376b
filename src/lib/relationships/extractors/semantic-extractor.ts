/**
 * SemanticExtractor - Delegates to an injected scorer
 *
 * The scorer is opaque (in production a language model call). It runs under
 * a timeout; a timeout or scorer error propagates to the mapper, which
 * records it and treats the pair as having no semantic evidence.
 */

import type { Document } from '@/lib/documents';
import { InvalidEvidenceError, SemanticScorerTimeoutError } from '@/lib/errors';
import { canonicalDocuments } from '../canonical';
import { DetectionMethod, type Evidence } from '../types';
import type { EvidenceExtractor, ExtractionContext } from './types';

export interface SemanticScore {
    confidence: number;
    detail: string;
    relationshipType?: string;
}

export interface SemanticScoreOptions {
    signal: AbortSignal;
}

export interface SemanticScorer {
    score(textA: string, textB: string, options: SemanticScoreOptions): SemanticScore | Promise<SemanticScore>;
}

/**
 * Resolve with the scorer's answer or reject once the signal fires
 */
function raceSignal<T>(work: Promise<T>, signal: AbortSignal, timeout: AbortSignal, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => {
            reject(timeout.aborted ? new SemanticScorerTimeoutError(timeoutMs) : signal.reason);
        };

        if (signal.aborted) {
            onAbort();
            return;
        }
        signal.addEventListener('abort', onAbort, { once: true });

        work.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export class SemanticExtractor implements EvidenceExtractor {
    readonly method = DetectionMethod.SEMANTIC;

    constructor(private scorer: SemanticScorer) {}

    async extract(a: Document, b: Document, { config, signal }: ExtractionContext): Promise<Evidence[]> {
        const [source, target] = canonicalDocuments(a, b);
        if (source.textContent.trim() === '' || target.textContent.trim() === '') return [];

        const { timeoutMs } = config.semantic;
        const timeout = AbortSignal.timeout(timeoutMs);
        const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

        const result = await raceSignal(
            Promise.resolve().then(() => this.scorer.score(source.textContent, target.textContent, { signal: combined })),
            combined,
            timeout,
            timeoutMs
        );

        if (!Number.isFinite(result.confidence) || result.confidence < 0 || result.confidence > 1) {
            throw new InvalidEvidenceError(
                `Semantic scorer returned confidence ${result.confidence} outside [0, 1]`,
                { sourceId: source.id, targetId: target.id }
            );
        }

        return [{
            sourceId: source.id,
            targetId: target.id,
            method: this.method,
            confidence: result.confidence,
            candidateType: result.relationshipType,
            detail: result.detail
        }];
    }
}
