/**
 * Serialized graph shape handed to downstream consumers (reports, CLIs)
 */

import type { DetectionMethod } from '@/lib/relationships/types';

export interface SerializedDocumentNode {
    id: string;
    filename: string;
    mimeType: string;
    documentType?: string;
}

export interface SerializedEvidence {
    method: DetectionMethod;
    confidence: number;
    detail: string;
    candidateType?: string;
}

export interface SerializedRelationshipEdge {
    source: string;
    target: string;
    type: string;
    confidence: number;
    evidence: SerializedEvidence[];
    detectionMethods: DetectionMethod[];
}

export interface SerializedDocumentGraph {
    nodes: SerializedDocumentNode[];
    edges: SerializedRelationshipEdge[];
}
