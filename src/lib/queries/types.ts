/**
 * Query result shapes. All plain, JSON-serialisable data.
 *
 * Every result names the documents it used and a confidence equal to the
 * weakest graph edge it relied on (1 when it relied on none).
 */

import type { QueryType } from './schemas';

interface QueryResultBase {
    sourceDocuments: string[];
    confidence: number;
}

export interface AggregationQueryResult extends QueryResultBase {
    type: 'aggregation';
    operation: 'sum' | 'count';
    groups: Record<string, number>;
    sources: Record<string, string[]>;
    skipped: string[];
}

export interface MatchedDocument {
    documentId: string;
    counterpartIds: string[];
    confidence: number;
}

export interface MatchingQueryResult extends QueryResultBase {
    type: 'matching';
    matched: MatchedDocument[];
    unmatched: string[];
}

export interface ValidationCheck {
    sourceId: string;
    targetId: string;
    relationshipType: string;
    edgeConfidence: number;
    leftValue: number;
    rightValue: number;
    passed: boolean;
}

export interface IncompleteCheck {
    sourceId: string;
    targetId: string;
    missing: string[];
}

export interface ValidationQueryResult extends QueryResultBase {
    type: 'validation';
    checks: ValidationCheck[];
    incomplete: IncompleteCheck[];
    passed: number;
    failed: number;
}

export interface TemporalMatch {
    documentId: string;
    date: string;
}

export interface TemporalQueryResult extends QueryResultBase {
    type: 'temporal';
    matches: TemporalMatch[];
    excluded: string[];
    undated: string[];
}

export interface QueryResultMap {
    aggregation: AggregationQueryResult;
    matching: MatchingQueryResult;
    validation: ValidationQueryResult;
    temporal: TemporalQueryResult;
}

export type QueryResult = QueryResultMap[QueryType];
