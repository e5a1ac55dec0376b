/**
 * DocumentGraph - Documents as nodes, fused relationships as edges
 *
 * - Backed by an undirected graphology graph, one edge per canonical pair
 * - Stored relationships are frozen copies
 * - Replacing an edge never duplicates it
 * - Connected components via union-find
 * - Sealed once built: a sealed graph is read-only and queryable
 */

import Graph from 'graphology';
import type { Document } from '@/lib/documents';
import {
    DuplicateDocumentError,
    GraphStateError,
    InvalidRelationshipError,
    UnknownDocumentError
} from '@/lib/errors';
import { canonicalizeEvidence, canonicalPair, pairKey } from '@/lib/relationships/canonical';
import type { DetectionMethod, Relationship, RelationshipStats } from '@/lib/relationships/types';
import { UnionFind } from './UnionFind';
import type { SerializedDocumentGraph } from './types';

type DocumentNodeAttributes = {
    document: Document;
};

type RelationshipEdgeAttributes = {
    relationship: Relationship;
};

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function compareRelationships(a: Relationship, b: Relationship): number {
    if (b.confidence !== a.confidence) return b.confidence - a.confidence;
    const [sourceA, targetA] = canonicalPair(a.sourceId, a.targetId);
    const [sourceB, targetB] = canonicalPair(b.sourceId, b.targetId);
    return compareIds(sourceA, sourceB) || compareIds(targetA, targetB);
}

/**
 * Canonical copy of a relationship, frozen down to its evidence items
 */
function freezeRelationship(rel: Relationship, sourceId: string, targetId: string): Relationship {
    const evidence = rel.evidence.map(item => Object.freeze({ ...canonicalizeEvidence(item) }));
    const detectionMethods = [...rel.detectionMethods];
    const confidenceByMethod = { ...rel.confidenceByMethod };
    Object.freeze(evidence);
    Object.freeze(detectionMethods);
    Object.freeze(confidenceByMethod);

    return Object.freeze({
        sourceId,
        targetId,
        relationshipType: rel.relationshipType,
        confidence: rel.confidence,
        evidence,
        detectionMethods,
        confidenceByMethod
    });
}

export class DocumentGraph {
    private graph = new Graph<DocumentNodeAttributes, RelationshipEdgeAttributes>({
        type: 'undirected',
        multi: false,
        allowSelfLoops: false
    });
    private sealed = false;

    // ==================== MUTATION ====================

    addDocument(doc: Document): void {
        this.assertMutable();
        if (this.graph.hasNode(doc.id)) {
            throw new DuplicateDocumentError(doc.id);
        }
        this.graph.addNode(doc.id, { document: doc });
    }

    /**
     * Store a relationship, replacing any previous edge for the same pair.
     * The stored record is a frozen copy in canonical order.
     */
    addRelationship(rel: Relationship): Relationship {
        this.assertMutable();

        if (rel.sourceId === rel.targetId) {
            throw new InvalidRelationshipError(
                `Document ${rel.sourceId} cannot be related to itself`,
                { documentId: rel.sourceId }
            );
        }
        for (const id of [rel.sourceId, rel.targetId]) {
            if (!this.graph.hasNode(id)) throw new UnknownDocumentError(id);
        }

        const [sourceId, targetId] = canonicalPair(rel.sourceId, rel.targetId);
        const stored = freezeRelationship(rel, sourceId, targetId);

        const key = pairKey(sourceId, targetId);
        if (this.graph.hasEdge(key)) {
            this.graph.replaceEdgeAttributes(key, { relationship: stored });
        } else {
            this.graph.addUndirectedEdgeWithKey(key, sourceId, targetId, { relationship: stored });
        }
        return stored;
    }

    /**
     * Close the graph for writing. Idempotent.
     */
    seal(): void {
        this.sealed = true;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    // ==================== DOCUMENTS ====================

    get documentCount(): number {
        return this.graph.order;
    }

    get relationshipCount(): number {
        return this.graph.size;
    }

    hasDocument(id: string): boolean {
        return this.graph.hasNode(id);
    }

    getDocument(id: string): Document {
        if (!this.graph.hasNode(id)) throw new UnknownDocumentError(id);
        return this.graph.getNodeAttribute(id, 'document');
    }

    /**
     * All documents in insertion order
     */
    getDocuments(): Document[] {
        return this.graph.mapNodes((_id, attributes) => attributes.document);
    }

    /**
     * Documents sharing an edge with the given one, whichever way it is stored
     */
    neighbors(id: string): Document[] {
        if (!this.graph.hasNode(id)) throw new UnknownDocumentError(id);
        return this.graph.neighbors(id).map(neighbor => this.graph.getNodeAttribute(neighbor, 'document'));
    }

    // ==================== RELATIONSHIPS ====================

    getRelationship(a: string, b: string): Relationship | undefined {
        const key = pairKey(a, b);
        return this.graph.hasEdge(key) ? this.graph.getEdgeAttribute(key, 'relationship') : undefined;
    }

    /**
     * Every relationship, or those touching one document
     */
    getRelationships(documentId?: string): Relationship[] {
        if (documentId === undefined) {
            return this.graph.mapEdges((_key, attributes) => attributes.relationship);
        }
        if (!this.graph.hasNode(documentId)) throw new UnknownDocumentError(documentId);
        return this.graph.mapEdges(documentId, (_key, attributes) => attributes.relationship);
    }

    /**
     * Relationships at or above the threshold, strongest first, ties broken
     * by canonical pair key
     */
    *edgesAbove(threshold: number): Generator<Relationship> {
        const matching = this.getRelationships()
            .filter(rel => rel.confidence >= threshold)
            .sort(compareRelationships);

        yield* matching;
    }

    // ==================== ANALYSIS ====================

    /**
     * Connected components. Isolated documents form singleton clusters.
     */
    cluster(): string[][] {
        const sets = new UnionFind<string>(this.graph.nodes());
        this.graph.forEachEdge((_key, _attributes, source, target) => {
            sets.union(source, target);
        });
        return sets.groups();
    }

    /**
     * Members of the cluster containing the given document
     */
    clusterOf(id: string): string[] {
        if (!this.graph.hasNode(id)) throw new UnknownDocumentError(id);
        return this.cluster().find(members => members.includes(id)) ?? [id];
    }

    stats(): RelationshipStats {
        const byType: Record<string, number> = {};
        const byMethod: Partial<Record<DetectionMethod, number>> = {};
        let confidenceSum = 0;

        this.graph.forEachEdge((_key, { relationship }) => {
            byType[relationship.relationshipType] = (byType[relationship.relationshipType] ?? 0) + 1;
            for (const method of relationship.detectionMethods) {
                byMethod[method] = (byMethod[method] ?? 0) + 1;
            }
            confidenceSum += relationship.confidence;
        });

        const total = this.graph.size;
        return {
            total,
            byType,
            byMethod,
            averageConfidence: total > 0 ? confidenceSum / total : 0
        };
    }

    toJSON(): SerializedDocumentGraph {
        return {
            nodes: this.getDocuments().map(doc => ({
                id: doc.id,
                filename: doc.filename,
                mimeType: doc.mimeType,
                ...(doc.documentType !== undefined ? { documentType: doc.documentType } : {})
            })),
            edges: this.getRelationships().map(rel => ({
                source: rel.sourceId,
                target: rel.targetId,
                type: rel.relationshipType,
                confidence: rel.confidence,
                evidence: rel.evidence.map(item => ({
                    method: item.method,
                    confidence: item.confidence,
                    detail: item.detail,
                    ...(item.candidateType !== undefined ? { candidateType: item.candidateType } : {})
                })),
                detectionMethods: [...rel.detectionMethods]
            }))
        };
    }

    private assertMutable(): void {
        if (this.sealed) {
            throw new GraphStateError('Graph is sealed for querying and can no longer be modified', 'GRAPH_SEALED');
        }
    }
}
