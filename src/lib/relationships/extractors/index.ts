export type { EvidenceExtractor, ExtractionContext } from './types';
export { FilenamePatternExtractor, describeFilename, type FilenameShape } from './filename-extractor';
export { ExplicitReferenceExtractor, referenceContext } from './reference-extractor';
export {
    EntityMatchExtractor,
    combineTowardCap,
    findSharedEntities,
    nameConfidence,
    type EntitySignal
} from './entity-extractor';
export { TemporalCorrelationExtractor, temporalConfidence } from './temporal-extractor';
export {
    SemanticExtractor,
    type SemanticScore,
    type SemanticScoreOptions,
    type SemanticScorer
} from './semantic-extractor';
export { createDefaultExtractors, selectExtractors, methodOrder, type DefaultExtractorOptions } from './registry';
