/**
 * RelationshipMapper - Batch pipeline from documents to a sealed graph
 *
 * - Registers every document, duplicates are fatal
 * - Runs all enabled extractors over every unordered pair, `concurrency`
 *   pairs at a time and all extractors of a pair together
 * - Extractor failures are recorded per (pair, method) and never abort
 * - Each pair is fused locally; edges are committed by one writer loop
 * - Seals the graph and reports batch summary, stats and failures
 */

import { readField, type Document } from '@/lib/documents';
import { DocumentGraphError, InvalidEvidenceError, describeError } from '@/lib/errors';
import { DocumentGraph } from '@/lib/graph';
import { EventBus } from '@/lib/utils/event-bus';
import { generateId } from '@/lib/utils/ids';
import { canonicalDocuments } from './canonical';
import { resolveConfig, type RelationshipConfig, type RelationshipConfigInput } from './config';
import { assertValidEvidence, RelationshipAggregator, type PairOutcome } from './RelationshipAggregator';
import { createDefaultExtractors, methodOrder, selectExtractors } from './extractors/registry';
import type { SemanticScorer } from './extractors/semantic-extractor';
import type { EvidenceExtractor, ExtractionContext } from './extractors/types';
import type { DetectionMethod, Evidence, Relationship } from './types';

const UNKNOWN_DOCUMENT_TYPE = 'unknown';

export interface ExtractorFailure {
    method: DetectionMethod;
    sourceId: string;
    targetId: string;
    code: string;
    message: string;
}

export interface BatchSummary {
    totalDocuments: number;
    documentTypes: Record<string, number>;
}

export interface BatchStats {
    pairsEvaluated: number;
    evidenceCount: number;
    discardedEvidence: number;
    rejectedPairs: number;
    relationshipCount: number;
    elapsedMs: number;
}

export interface BatchReport {
    batchId: string;
    graph: DocumentGraph;
    relationships: Relationship[];
    clusters: string[][];
    failures: ExtractorFailure[];
    summary: BatchSummary;
    stats: BatchStats;
    /** True when the caller's signal stopped the batch before every pair ran */
    aborted: boolean;
}

export interface RelationshipMapperEvents {
    'extractor:failed': ExtractorFailure;
    'relationship:committed': Relationship;
    'batch:completed': { batchId: string; summary: BatchSummary; stats: BatchStats; aborted: boolean };
}

export interface RelationshipMapperOptions {
    /** Replaces the built-in detectors. Still filtered by `config.detectors`. */
    extractors?: EvidenceExtractor[];
    scorer?: SemanticScorer;
}

export interface MapOptions {
    signal?: AbortSignal;
}

interface ExtractorRun {
    evidence: Evidence[];
    failure?: ExtractorFailure;
}

interface PairEvaluation {
    evidenceCount: number;
    failures: ExtractorFailure[];
    outcome: PairOutcome | null;
}

export function summarizeDocuments(documents: readonly Document[]): BatchSummary {
    const documentTypes: Record<string, number> = {};
    for (const doc of documents) {
        const value = readField(doc, 'document_type');
        const type = typeof value === 'string' && value.trim() !== '' ? value.trim() : UNKNOWN_DOCUMENT_TYPE;
        documentTypes[type] = (documentTypes[type] ?? 0) + 1;
    }
    return { totalDocuments: documents.length, documentTypes };
}

export class RelationshipMapper {
    readonly config: RelationshipConfig;
    readonly events = new EventBus<RelationshipMapperEvents>();
    private extractors: EvidenceExtractor[];
    private aggregator: RelationshipAggregator;

    constructor(config: RelationshipConfigInput = {}, options: RelationshipMapperOptions = {}) {
        this.config = resolveConfig(config);
        const available = options.extractors ?? createDefaultExtractors({ scorer: options.scorer });
        this.extractors = selectExtractors(available, this.config.detectors);
        this.aggregator = new RelationshipAggregator(this.config, methodOrder(this.extractors));
    }

    get methods(): DetectionMethod[] {
        return this.extractors.map(extractor => extractor.method);
    }

    async map(documents: readonly Document[], options: MapOptions = {}): Promise<BatchReport> {
        const startTime = performance.now();
        const batchId = generateId();
        const { signal } = options;

        const graph = new DocumentGraph();
        for (const doc of documents) {
            graph.addDocument(doc);
        }

        const pairs = this.buildPairs(documents);
        console.log(
            `[RelationshipMapper] Batch ${batchId}: ${documents.length} documents, ` +
            `${pairs.length} pairs, detectors [${this.methods.join(', ')}]`
        );

        const failures: ExtractorFailure[] = [];
        let pairsEvaluated = 0;
        let evidenceCount = 0;
        let discardedEvidence = 0;
        let rejectedPairs = 0;
        let aborted = false;

        for (let i = 0; i < pairs.length; i += this.config.concurrency) {
            if (signal?.aborted) {
                aborted = true;
                console.warn(`[RelationshipMapper] Batch ${batchId} aborted after ${pairsEvaluated}/${pairs.length} pairs`);
                break;
            }

            const chunk = pairs.slice(i, i + this.config.concurrency);
            const evaluations = await Promise.all(
                chunk.map(([a, b]) => this.evaluatePair(a, b, signal))
            );

            // Single writer: only this loop touches the graph
            for (const evaluation of evaluations) {
                pairsEvaluated++;
                evidenceCount += evaluation.evidenceCount;

                for (const failure of evaluation.failures) {
                    failures.push(failure);
                    console.warn(
                        `[RelationshipMapper] ${failure.method} failed for ${failure.sourceId}/${failure.targetId}: ${failure.message}`
                    );
                    this.events.emit('extractor:failed', failure);
                }

                const outcome = evaluation.outcome;
                if (!outcome) continue;
                discardedEvidence += outcome.discardedEvidence;

                if (outcome.relationship) {
                    const stored = graph.addRelationship(outcome.relationship);
                    this.events.emit('relationship:committed', stored);
                } else {
                    rejectedPairs++;
                    console.debug(
                        `[RelationshipMapper] Rejected ${outcome.sourceId}/${outcome.targetId}: ` +
                        `combined ${outcome.combinedConfidence.toFixed(3)} < ${this.config.acceptanceThreshold}`
                    );
                }
            }
        }

        graph.seal();

        const summary = summarizeDocuments(documents);
        const stats: BatchStats = {
            pairsEvaluated,
            evidenceCount,
            discardedEvidence,
            rejectedPairs,
            relationshipCount: graph.relationshipCount,
            elapsedMs: performance.now() - startTime
        };

        console.log(
            `[RelationshipMapper] Batch ${batchId} complete: ${stats.relationshipCount} relationships, ` +
            `${failures.length} failures in ${stats.elapsedMs.toFixed(1)}ms`
        );
        this.events.emit('batch:completed', { batchId, summary, stats, aborted });

        return {
            batchId,
            graph,
            relationships: graph.getRelationships(),
            clusters: graph.cluster(),
            failures,
            summary,
            stats,
            aborted
        };
    }

    /**
     * Every unordered pair once, in document order
     */
    private buildPairs(documents: readonly Document[]): Array<[Document, Document]> {
        const pairs: Array<[Document, Document]> = [];
        for (let i = 0; i < documents.length; i++) {
            for (let j = i + 1; j < documents.length; j++) {
                pairs.push([documents[i], documents[j]]);
            }
        }
        return pairs;
    }

    private async evaluatePair(a: Document, b: Document, signal?: AbortSignal): Promise<PairEvaluation> {
        const [first, second] = canonicalDocuments(a, b);
        const context: ExtractionContext = { config: this.config, signal };

        const runs = await Promise.all(
            this.extractors.map(extractor => this.runExtractor(extractor, first, second, context))
        );

        const evidence = runs.flatMap(run => run.evidence);
        const failures = runs.flatMap(run => (run.failure ? [run.failure] : []));

        return {
            evidenceCount: evidence.length,
            failures,
            outcome: evidence.length > 0 ? this.aggregator.aggregatePair(evidence) : null
        };
    }

    private async runExtractor(
        extractor: EvidenceExtractor,
        a: Document,
        b: Document,
        context: ExtractionContext
    ): Promise<ExtractorRun> {
        try {
            const evidence = await extractor.extract(a, b, context);
            for (const item of evidence) {
                assertValidEvidence(item);
                this.assertSamePair(item, a, b);
            }
            return { evidence };
        } catch (error) {
            return {
                evidence: [],
                failure: {
                    method: extractor.method,
                    sourceId: a.id,
                    targetId: b.id,
                    code: error instanceof DocumentGraphError ? error.code : 'EXTRACTOR_ERROR',
                    message: describeError(error)
                }
            };
        }
    }

    private assertSamePair(item: Evidence, a: Document, b: Document): void {
        const matches =
            (item.sourceId === a.id && item.targetId === b.id) ||
            (item.sourceId === b.id && item.targetId === a.id);
        if (!matches) {
            throw new InvalidEvidenceError(
                `Evidence for ${item.sourceId}/${item.targetId} returned while evaluating ${a.id}/${b.id}`,
                { sourceId: item.sourceId, targetId: item.targetId, method: item.method }
            );
        }
    }
}
