/**
 * Relationship Engine - Core Type Definitions
 *
 * Evidence from independent detectors is fused per document pair into a
 * single relationship with combined confidence and an evidence trail.
 */

export enum DetectionMethod {
    FILENAME_PATTERN = 'filename_pattern',
    EXPLICIT_REFERENCE = 'explicit_reference',
    ENTITY_MATCH = 'entity_match',
    TEMPORAL_CORRELATION = 'temporal_correlation',
    SEMANTIC = 'semantic'
}

export const ALL_DETECTION_METHODS: readonly DetectionMethod[] = [
    DetectionMethod.FILENAME_PATTERN,
    DetectionMethod.EXPLICIT_REFERENCE,
    DetectionMethod.ENTITY_MATCH,
    DetectionMethod.TEMPORAL_CORRELATION,
    DetectionMethod.SEMANTIC
];

/**
 * Well-known relationship labels. Detectors and scorers may emit others.
 */
export const RelationshipTypes = {
    INVOICE_FOR_PO: 'invoice_for_po',
    AGREEMENT_FOR_CONTRACT: 'agreement_for_contract',
    CREDIT_NOTE_FOR_INVOICE: 'credit_note_for_invoice',
    RECEIPT_FOR_INVOICE: 'receipt_for_invoice',
    VERSIONED_COPY: 'versioned_copy',
    MULTI_PART: 'multi_part',
    REFERENCES: 'references',
    REFERENCES_INVOICE: 'references_invoice',
    GOVERNED_BY_AGREEMENT: 'governed_by_agreement',
    SHARED_ENTITIES: 'shared_entities',
    RELATED: 'related'
} as const;

export interface Evidence {
    sourceId: string;
    targetId: string;
    method: DetectionMethod;
    confidence: number;
    detail: string;
    candidateType?: string;
}

export interface Relationship {
    sourceId: string;
    targetId: string;
    relationshipType: string;
    confidence: number;
    evidence: Evidence[];
    detectionMethods: DetectionMethod[];
    confidenceByMethod: Partial<Record<DetectionMethod, number>>;
}

export interface RelationshipStats {
    total: number;
    byType: Record<string, number>;
    byMethod: Partial<Record<DetectionMethod, number>>;
    averageConfidence: number;
}
