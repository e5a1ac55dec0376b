import type { Document } from '@/lib/documents';
import type { RelationshipConfig } from '../config';
import type { DetectionMethod, Evidence } from '../types';

export interface ExtractionContext {
    config: RelationshipConfig;
    signal?: AbortSignal;
}

/**
 * A detector over one document pair.
 *
 * Implementations are stateless: the same pair and config always give the
 * same evidence (the semantic detector excepted), and they never modify
 * either document, so any number of calls may run concurrently.
 */
export interface EvidenceExtractor {
    readonly method: DetectionMethod;
    extract(a: Document, b: Document, context: ExtractionContext): Evidence[] | Promise<Evidence[]>;
}
