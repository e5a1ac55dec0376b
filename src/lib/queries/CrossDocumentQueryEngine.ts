/**
 * CrossDocumentQueryEngine - Structured questions over a finished graph
 *
 * - Aggregation: sum or count a field grouped by another
 * - Matching: does each role document have an edge to a counterpart?
 * - Validation: a numeric rule across both endpoints of each edge
 * - Temporal: date-field filters
 *
 * Read-only. Accepts sealed graphs only. Confidence is conservative: the
 * weakest edge a result relied on, including the edges that define a
 * cluster scope.
 */

import { differenceInCalendarDays, formatISO } from 'date-fns';
import {
    comparableString,
    hasField,
    readDate,
    readField,
    readNumber,
    toDate,
    type Document
} from '@/lib/documents';
import { GraphStateError, QueryValidationError } from '@/lib/errors';
import { DocumentGraph, maximumSpanningForest } from '@/lib/graph';
import type { Relationship } from '@/lib/relationships/types';
import { matchesPredicate } from './predicates';
import {
    querySchema,
    type AggregationParameters,
    type MatchingParameters,
    type Predicate,
    type Query,
    type QueryInput,
    type QueryScope,
    type TemporalParameters,
    type ValidationParameters,
    type ValidationRule
} from './schemas';
import type {
    AggregationQueryResult,
    IncompleteCheck,
    MatchedDocument,
    MatchingQueryResult,
    QueryResult,
    QueryResultMap,
    TemporalMatch,
    TemporalQueryResult,
    ValidationCheck,
    ValidationQueryResult
} from './types';

interface ResolvedScope {
    documents: Document[];
    order: Map<string, number>;
    /** Weakest edge the scope itself depends on */
    confidence: number;
}

function minConfidence(base: number, confidences: Iterable<number>): number {
    let result = base;
    for (const confidence of confidences) {
        if (confidence < result) result = confidence;
    }
    return result;
}

function uniqueInOrder(ids: Iterable<string>): string[] {
    return [...new Set(ids)];
}

export function satisfiesRule(left: number, right: number, rule: ValidationRule): boolean {
    switch (rule.operator) {
        case 'lte':
            return left <= right + rule.tolerance;
        case 'gte':
            return left >= right - rule.tolerance;
        case 'eq':
            return Math.abs(left - right) <= rule.tolerance;
    }
}

export class CrossDocumentQueryEngine {
    constructor(private graph: DocumentGraph) {
        if (!graph.isSealed) {
            throw new GraphStateError('Graph must be sealed before it can be queried', 'GRAPH_NOT_SEALED');
        }
    }

    execute<Q extends QueryInput>(query: Q): QueryResultMap[Q['type']];
    execute(query: unknown): QueryResult;
    execute(query: unknown): QueryResult {
        const parsed = this.parse(query);
        const scope = this.resolveScope(parsed.scope);

        console.debug(
            `[CrossDocumentQueryEngine] ${parsed.type} query over ${scope.documents.length} documents`
        );

        switch (parsed.type) {
            case 'aggregation':
                return this.aggregate(scope, parsed.parameters);
            case 'matching':
                return this.match(scope, parsed.parameters);
            case 'validation':
                return this.validate(scope, parsed.parameters);
            case 'temporal':
                return this.filterByDate(scope, parsed.parameters);
        }
    }

    // ==================== PARSING & SCOPE ====================

    private parse(query: unknown): Query {
        const result = querySchema.safeParse(query);
        if (!result.success) {
            const issue = result.error.issues[0];
            const parameter = issue.path.join('.') || '(query)';
            throw new QueryValidationError(`Invalid query at "${parameter}": ${issue.message}`, parameter);
        }
        return result.data;
    }

    private resolveScope(scope: QueryScope): ResolvedScope {
        let documents: Document[];
        let confidence = 1;

        if (scope === 'all') {
            documents = this.graph.getDocuments();
        } else if (Array.isArray(scope)) {
            documents = uniqueInOrder(scope).map(id => this.graph.getDocument(id));
        } else {
            const members = this.graph.clusterOf(scope.clusterOf);
            const memberSet = new Set(members);
            documents = members.map(id => this.graph.getDocument(id));

            const internal = this.graph.getRelationships()
                .filter(rel => memberSet.has(rel.sourceId) && memberSet.has(rel.targetId));
            confidence = minConfidence(1, maximumSpanningForest(members, internal).map(rel => rel.confidence));
        }

        return {
            documents,
            order: new Map(documents.map((doc, index) => [doc.id, index])),
            confidence
        };
    }

    private assertFieldCarried(scope: ResolvedScope, field: string, parameter: string): void {
        if (!scope.documents.some(doc => hasField(doc, field))) {
            throw new QueryValidationError(`No document in scope carries field "${field}"`, parameter);
        }
    }

    private assertPredicateField(scope: ResolvedScope, predicate: Predicate | undefined, parameter: string): void {
        if (predicate) {
            this.assertFieldCarried(scope, predicate.field, `${parameter}.field`);
        }
    }

    /**
     * Edges with both endpoints in scope, strongest first
     */
    private scopedRelationships(scope: ResolvedScope, relationshipType?: string): Relationship[] {
        return [...this.graph.edgesAbove(0)].filter(rel =>
            scope.order.has(rel.sourceId) &&
            scope.order.has(rel.targetId) &&
            (relationshipType === undefined || rel.relationshipType === relationshipType)
        );
    }

    // ==================== AGGREGATION ====================

    private measure(doc: Document, params: AggregationParameters): number | undefined {
        if (params.operation === 'count') {
            return params.field === undefined || hasField(doc, params.field) ? 1 : undefined;
        }
        return params.field === undefined ? undefined : readNumber(doc, params.field);
    }

    private aggregate(scope: ResolvedScope, params: AggregationParameters): AggregationQueryResult {
        this.assertFieldCarried(scope, params.groupBy, 'parameters.groupBy');
        if (params.field !== undefined) {
            this.assertFieldCarried(scope, params.field, 'parameters.field');
        }

        // Keyed case-insensitively; the first spelling seen names the group
        const buckets = new Map<string, { label: string; total: number; ids: string[] }>();
        const skipped: string[] = [];
        const used: string[] = [];

        for (const doc of scope.documents) {
            const groupValue = readField(doc, params.groupBy);
            const key = comparableString(groupValue);
            const amount = this.measure(doc, params);

            if (groupValue === undefined || !key || amount === undefined) {
                skipped.push(doc.id);
                continue;
            }

            let bucket = buckets.get(key);
            if (!bucket) {
                bucket = { label: String(groupValue).trim(), total: 0, ids: [] };
                buckets.set(key, bucket);
            }

            bucket.total += amount;
            bucket.ids.push(doc.id);
            used.push(doc.id);
        }

        // fromEntries defines own keys, so labels such as "__proto__" stay ordinary groups
        const groups: Record<string, number> = Object.fromEntries(
            [...buckets.values()].map(bucket => [bucket.label, bucket.total])
        );
        const sources: Record<string, string[]> = Object.fromEntries(
            [...buckets.values()].map(bucket => [bucket.label, bucket.ids])
        );

        return {
            type: 'aggregation',
            operation: params.operation,
            groups,
            sources,
            skipped,
            sourceDocuments: used,
            confidence: scope.confidence
        };
    }

    // ==================== MATCHING ====================

    private match(scope: ResolvedScope, params: MatchingParameters): MatchingQueryResult {
        this.assertPredicateField(scope, params.role, 'parameters.role');
        this.assertPredicateField(scope, params.counterpart, 'parameters.counterpart');

        const matched: MatchedDocument[] = [];
        const unmatched: string[] = [];
        const used: string[] = [];

        for (const doc of scope.documents) {
            if (!matchesPredicate(doc, params.role)) continue;
            used.push(doc.id);

            const counterparts: Array<{ id: string; confidence: number }> = [];
            for (const rel of this.graph.getRelationships(doc.id)) {
                const otherId = rel.sourceId === doc.id ? rel.targetId : rel.sourceId;
                if (!scope.order.has(otherId)) continue;
                if (params.relationshipType !== undefined && rel.relationshipType !== params.relationshipType) continue;
                if (rel.confidence < params.minConfidence) continue;
                if (!matchesPredicate(this.graph.getDocument(otherId), params.counterpart)) continue;

                counterparts.push({ id: otherId, confidence: rel.confidence });
            }

            if (counterparts.length === 0) {
                unmatched.push(doc.id);
                continue;
            }

            counterparts.sort((a, b) => (scope.order.get(a.id) ?? 0) - (scope.order.get(b.id) ?? 0));
            const counterpartIds = counterparts.map(c => c.id);
            used.push(...counterpartIds);
            matched.push({
                documentId: doc.id,
                counterpartIds,
                confidence: Math.max(...counterparts.map(c => c.confidence))
            });
        }

        return {
            type: 'matching',
            matched,
            unmatched,
            sourceDocuments: uniqueInOrder(used),
            confidence: minConfidence(scope.confidence, matched.map(m => m.confidence))
        };
    }

    // ==================== VALIDATION ====================

    /**
     * Endpoints ordered so the source/target predicates hold, or null when
     * neither orientation fits. Canonical order when no predicate is given.
     */
    private orient(rel: Relationship, params: ValidationParameters): [Document, Document] | null {
        const a = this.graph.getDocument(rel.sourceId);
        const b = this.graph.getDocument(rel.targetId);
        const fits = (source: Document, target: Document): boolean =>
            (params.source === undefined || matchesPredicate(source, params.source)) &&
            (params.target === undefined || matchesPredicate(target, params.target));

        if (fits(a, b)) return [a, b];
        if (fits(b, a)) return [b, a];
        return null;
    }

    private validate(scope: ResolvedScope, params: ValidationParameters): ValidationQueryResult {
        const { rule } = params;
        this.assertFieldCarried(scope, rule.left, 'parameters.rule.left');
        this.assertFieldCarried(scope, rule.right, 'parameters.rule.right');
        this.assertPredicateField(scope, params.source, 'parameters.source');
        this.assertPredicateField(scope, params.target, 'parameters.target');

        const checks: ValidationCheck[] = [];
        const incomplete: IncompleteCheck[] = [];

        for (const rel of this.scopedRelationships(scope, params.relationshipType)) {
            const oriented = this.orient(rel, params);
            if (!oriented) continue;
            const [source, target] = oriented;

            const leftValue = readNumber(source, rule.left);
            const rightValue = readNumber(target, rule.right);
            if (leftValue === undefined || rightValue === undefined) {
                incomplete.push({
                    sourceId: source.id,
                    targetId: target.id,
                    missing: [
                        ...(leftValue === undefined ? [`${source.id}.${rule.left}`] : []),
                        ...(rightValue === undefined ? [`${target.id}.${rule.right}`] : [])
                    ]
                });
                continue;
            }

            checks.push({
                sourceId: source.id,
                targetId: target.id,
                relationshipType: rel.relationshipType,
                edgeConfidence: rel.confidence,
                leftValue,
                rightValue,
                passed: satisfiesRule(leftValue, rightValue, rule)
            });
        }

        const passed = checks.filter(check => check.passed).length;
        return {
            type: 'validation',
            checks,
            incomplete,
            passed,
            failed: checks.length - passed,
            sourceDocuments: uniqueInOrder(checks.flatMap(check => [check.sourceId, check.targetId])),
            confidence: minConfidence(scope.confidence, checks.map(check => check.edgeConfidence))
        };
    }

    // ==================== TEMPORAL ====================

    private parseBound(value: string, parameter: string): Date {
        const date = toDate(value);
        if (!date) {
            throw new QueryValidationError(`Unparseable date "${value}"`, parameter);
        }
        return date;
    }

    private filterByDate(scope: ResolvedScope, params: TemporalParameters): TemporalQueryResult {
        this.assertFieldCarried(scope, params.field, 'parameters.field');

        const within = params.within
            ? { days: params.within.days, of: this.parseBound(params.within.of, 'parameters.within.of') }
            : undefined;
        const before = params.before !== undefined ? this.parseBound(params.before, 'parameters.before') : undefined;
        const after = params.after !== undefined ? this.parseBound(params.after, 'parameters.after') : undefined;

        const matches: TemporalMatch[] = [];
        const excluded: string[] = [];
        const undated: string[] = [];

        for (const doc of scope.documents) {
            const date = readDate(doc, params.field);
            if (!date) {
                undated.push(doc.id);
                continue;
            }

            const ok =
                (!within || Math.abs(differenceInCalendarDays(date, within.of)) <= within.days) &&
                (!before || differenceInCalendarDays(date, before) < 0) &&
                (!after || differenceInCalendarDays(date, after) > 0);

            if (ok) {
                matches.push({ documentId: doc.id, date: formatISO(date, { representation: 'date' }) });
            } else {
                excluded.push(doc.id);
            }
        }

        return {
            type: 'temporal',
            matches,
            excluded,
            undated,
            sourceDocuments: matches.map(match => match.documentId),
            confidence: scope.confidence
        };
    }
}
