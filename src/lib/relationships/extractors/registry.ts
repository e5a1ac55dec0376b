/**
 * Extractor composition
 *
 * Detectors are listed explicitly; their order is the evidence order on every
 * relationship. Adding a detector means implementing EvidenceExtractor and
 * appending it here or passing it to the mapper.
 */

import type { DetectionMethod } from '../types';
import { EntityMatchExtractor } from './entity-extractor';
import { FilenamePatternExtractor } from './filename-extractor';
import { ExplicitReferenceExtractor } from './reference-extractor';
import { SemanticExtractor, type SemanticScorer } from './semantic-extractor';
import { TemporalCorrelationExtractor } from './temporal-extractor';
import type { EvidenceExtractor } from './types';

export interface DefaultExtractorOptions {
    scorer?: SemanticScorer;
}

/**
 * Built-in detectors, cheapest first. The semantic detector joins only when
 * a scorer is supplied.
 */
export function createDefaultExtractors(options: DefaultExtractorOptions = {}): EvidenceExtractor[] {
    const extractors: EvidenceExtractor[] = [
        new FilenamePatternExtractor(),
        new ExplicitReferenceExtractor(),
        new EntityMatchExtractor(),
        new TemporalCorrelationExtractor()
    ];

    if (options.scorer) {
        extractors.push(new SemanticExtractor(options.scorer));
    }

    return extractors;
}

/**
 * Keep the extractors whose method is enabled, preserving their order
 */
export function selectExtractors(
    extractors: readonly EvidenceExtractor[],
    enabled: readonly DetectionMethod[]
): EvidenceExtractor[] {
    const allowed = new Set(enabled);
    return extractors.filter(extractor => allowed.has(extractor.method));
}

/**
 * Rank of each method by its first extractor, used to order evidence
 */
export function methodOrder(extractors: readonly EvidenceExtractor[]): Map<DetectionMethod, number> {
    const order = new Map<DetectionMethod, number>();
    extractors.forEach((extractor, index) => {
        if (!order.has(extractor.method)) order.set(extractor.method, index);
    });
    return order;
}
