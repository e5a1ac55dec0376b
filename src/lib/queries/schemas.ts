/**
 * Cross-document query shapes
 *
 * Queries arrive as plain data and are validated here before anything runs.
 */

import { z } from 'zod';

// =============================================================================
// SHARED PIECES
// =============================================================================

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const predicateSchema = z.object({
    field: z.string().min(1),
    op: z.enum(['equals', 'not_equals', 'contains', 'one_of', 'exists']),
    value: z.union([scalarSchema, z.array(scalarSchema).min(1)]).optional(),
}).superRefine((predicate, ctx) => {
    if (predicate.op === 'exists') return;

    if (predicate.op === 'one_of') {
        if (!Array.isArray(predicate.value)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['value'],
                message: 'one_of requires a non-empty array value',
            });
        }
        return;
    }

    if (predicate.value === undefined || Array.isArray(predicate.value)) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['value'],
            message: `${predicate.op} requires a single value`,
        });
    }
});

export const scopeSchema = z.union([
    z.literal('all'),
    z.array(z.string().min(1)).min(1),
    z.object({ clusterOf: z.string().min(1) }),
]).default('all');

const dateStringSchema = z.string().min(1);

// =============================================================================
// PARAMETERS PER QUERY TYPE
// =============================================================================

export const aggregationParametersSchema = z.object({
    groupBy: z.string().min(1),
    field: z.string().min(1).optional(),
    operation: z.enum(['sum', 'count']).default('sum'),
}).superRefine((params, ctx) => {
    if (params.operation === 'sum' && params.field === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['field'],
            message: 'sum requires a field',
        });
    }
});

export const matchingParametersSchema = z.object({
    role: predicateSchema,
    counterpart: predicateSchema,
    relationshipType: z.string().min(1).optional(),
    minConfidence: z.number().min(0).max(1).default(0),
});

export const validationRuleSchema = z.object({
    left: z.string().min(1),
    right: z.string().min(1),
    operator: z.enum(['lte', 'gte', 'eq']),
    tolerance: z.number().nonnegative().default(0),
});

export const validationParametersSchema = z.object({
    rule: validationRuleSchema,
    relationshipType: z.string().min(1).optional(),
    source: predicateSchema.optional(),
    target: predicateSchema.optional(),
});

export const temporalParametersSchema = z.object({
    field: z.string().min(1),
    within: z.object({
        days: z.number().nonnegative(),
        of: dateStringSchema,
    }).optional(),
    before: dateStringSchema.optional(),
    after: dateStringSchema.optional(),
}).superRefine((params, ctx) => {
    if (!params.within && params.before === undefined && params.after === undefined) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [],
            message: 'temporal queries need at least one of within, before or after',
        });
    }
});

// =============================================================================
// QUERY
// =============================================================================

export const querySchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('aggregation'), scope: scopeSchema, parameters: aggregationParametersSchema }),
    z.object({ type: z.literal('matching'), scope: scopeSchema, parameters: matchingParametersSchema }),
    z.object({ type: z.literal('validation'), scope: scopeSchema, parameters: validationParametersSchema }),
    z.object({ type: z.literal('temporal'), scope: scopeSchema, parameters: temporalParametersSchema }),
]);

export type Predicate = z.infer<typeof predicateSchema>;
export type QueryScope = z.infer<typeof scopeSchema>;
export type AggregationParameters = z.infer<typeof aggregationParametersSchema>;
export type MatchingParameters = z.infer<typeof matchingParametersSchema>;
export type ValidationRule = z.infer<typeof validationRuleSchema>;
export type ValidationParameters = z.infer<typeof validationParametersSchema>;
export type TemporalParameters = z.infer<typeof temporalParametersSchema>;
export type Query = z.infer<typeof querySchema>;
export type QueryInput = z.input<typeof querySchema>;
export type QueryType = Query['type'];
