/**
 * Relationship detection configuration
 *
 * Thresholds, windows and lookup tables for one batch. Resolved once and
 * passed explicitly to the mapper, aggregator and extractors.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import { ALL_DETECTION_METHODS, DetectionMethod, RelationshipTypes } from './types';

const confidenceSchema = z.number().min(0).max(1);

// =============================================================================
// DETECTOR SECTIONS
// =============================================================================

export const prefixPairSchema = z.object({
    prefixes: z.tuple([z.string().min(1), z.string().min(1)]),
    relationshipType: z.string().min(1),
});

export type PrefixPair = z.infer<typeof prefixPairSchema>;

export const DEFAULT_PREFIX_PAIRS: PrefixPair[] = [
    { prefixes: ['inv', 'po'], relationshipType: RelationshipTypes.INVOICE_FOR_PO },
    { prefixes: ['invoice', 'po'], relationshipType: RelationshipTypes.INVOICE_FOR_PO },
    { prefixes: ['invoice', 'purchase_order'], relationshipType: RelationshipTypes.INVOICE_FOR_PO },
    { prefixes: ['inv', 'purchase_order'], relationshipType: RelationshipTypes.INVOICE_FOR_PO },
    { prefixes: ['agr', 'contract'], relationshipType: RelationshipTypes.AGREEMENT_FOR_CONTRACT },
    { prefixes: ['agreement', 'contract'], relationshipType: RelationshipTypes.AGREEMENT_FOR_CONTRACT },
    { prefixes: ['cn', 'inv'], relationshipType: RelationshipTypes.CREDIT_NOTE_FOR_INVOICE },
    { prefixes: ['credit_note', 'invoice'], relationshipType: RelationshipTypes.CREDIT_NOTE_FOR_INVOICE },
    { prefixes: ['receipt', 'invoice'], relationshipType: RelationshipTypes.RECEIPT_FOR_INVOICE },
    { prefixes: ['rcpt', 'inv'], relationshipType: RelationshipTypes.RECEIPT_FOR_INVOICE },
];

export const identifierFieldSchema = z.object({
    field: z.string().min(1),
    relationshipType: z.string().min(1),
});

export type IdentifierField = z.infer<typeof identifierFieldSchema>;

export const DEFAULT_IDENTIFIER_FIELDS: IdentifierField[] = [
    { field: 'invoice_number', relationshipType: RelationshipTypes.REFERENCES_INVOICE },
    { field: 'po_number', relationshipType: RelationshipTypes.INVOICE_FOR_PO },
    { field: 'agreement_id', relationshipType: RelationshipTypes.GOVERNED_BY_AGREEMENT },
    { field: 'contract_number', relationshipType: RelationshipTypes.GOVERNED_BY_AGREEMENT },
    { field: 'reference_number', relationshipType: RelationshipTypes.REFERENCES },
    { field: 'document_number', relationshipType: RelationshipTypes.REFERENCES },
];

const filenameConfigSchema = z.object({
    confidence: confidenceSchema.default(0.9),
    prefixPairs: z.array(prefixPairSchema).default(DEFAULT_PREFIX_PAIRS),
}).default({});

const referenceConfigSchema = z.object({
    confidence: confidenceSchema.default(0.95),
    contextChars: z.number().int().nonnegative().default(40),
    minIdentifierLength: z.number().int().positive().default(3),
    identifierFields: z.array(identifierFieldSchema).default(DEFAULT_IDENTIFIER_FIELDS),
}).default({});

const entityConfigSchema = z.object({
    maxConfidence: confidenceSchema.default(0.8),
    taxIdConfidence: confidenceSchema.default(0.8),
    amountConfidence: confidenceSchema.default(0.8),
    nameMinConfidence: confidenceSchema.default(0.3),
    nameMaxConfidence: confidenceSchema.default(0.5),
    nameOverlapThreshold: confidenceSchema.default(0.8),
    nameFields: z.array(z.string()).default([
        'vendor_name', 'vendor', 'supplier_name', 'customer_name', 'customer', 'buyer_name', 'party_name',
    ]),
    taxIdFields: z.array(z.string()).default([
        'tax_id', 'vat_id', 'vendor_tax_id', 'customer_tax_id',
    ]),
    amountFields: z.array(z.string()).default([
        'total_amount', 'amount', 'total', 'amount_due',
    ]),
}).default({});

const temporalConfigSchema = z.object({
    windowDays: z.number().positive().default(30),
    dateFields: z.array(z.string()).default([
        'issue_date', 'invoice_date', 'po_date', 'order_date', 'effective_date', 'document_date', 'date',
    ]),
}).default({});

const semanticConfigSchema = z.object({
    timeoutMs: z.number().int().positive().default(3000),
}).default({});

// =============================================================================
// ROOT SCHEMA
// =============================================================================

export const relationshipConfigSchema = z.object({
    evidenceFloor: confidenceSchema.default(0.05),
    acceptanceThreshold: confidenceSchema.default(0.6),
    concurrency: z.number().int().positive().default(8),
    detectors: z.array(z.nativeEnum(DetectionMethod)).default([...ALL_DETECTION_METHODS]),
    filename: filenameConfigSchema,
    reference: referenceConfigSchema,
    entity: entityConfigSchema,
    temporal: temporalConfigSchema,
    semantic: semanticConfigSchema,
});

export type RelationshipConfig = z.infer<typeof relationshipConfigSchema>;
export type RelationshipConfigInput = z.input<typeof relationshipConfigSchema>;

/**
 * Fill defaults and validate. Throws ConfigurationError naming the bad path.
 */
export function resolveConfig(input: RelationshipConfigInput = {}): RelationshipConfig {
    const result = relationshipConfigSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.join('.') || '(root)';
        throw new ConfigurationError(`Invalid relationship config at "${path}": ${issue.message}`, path);
    }

    const config = result.data;
    if (config.entity.nameMinConfidence > config.entity.nameMaxConfidence) {
        throw new ConfigurationError(
            'entity.nameMinConfidence must not exceed entity.nameMaxConfidence',
            'entity.nameMinConfidence'
        );
    }
    return config;
}
