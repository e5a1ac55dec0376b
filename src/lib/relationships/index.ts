export * from './types';
export * from './canonical';
export * from './config';
export * from './extractors';
export {
    RelationshipAggregator,
    noisyOr,
    assertValidEvidence,
    type PairOutcome,
    type AggregationResult
} from './RelationshipAggregator';
export {
    RelationshipMapper,
    summarizeDocuments,
    type BatchReport,
    type BatchStats,
    type BatchSummary,
    type ExtractorFailure,
    type MapOptions,
    type RelationshipMapperEvents,
    type RelationshipMapperOptions
} from './RelationshipMapper';
