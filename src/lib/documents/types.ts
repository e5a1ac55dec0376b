/**
 * Document Model - Core Type Definitions
 *
 * Documents arrive already extracted: structured fields with per-field
 * confidence plus the full text. Nothing in this library mutates them.
 */

import { z } from 'zod';

export type FieldValue = string | number | boolean | null;

export interface ExtractedField {
    value: FieldValue;
    confidence: number;
}

export interface Document {
    id: string;
    filename: string;
    mimeType: string;
    sizeBytes: number;
    documentType?: string;
    extractedFields: Readonly<Record<string, ExtractedField>>;
    textContent: string;
}

/**
 * Names resolved against the document itself rather than extractedFields
 */
export const PSEUDO_FIELDS = ['id', 'filename', 'mime_type', 'document_type'] as const;

export type PseudoField = typeof PSEUDO_FIELDS[number];

// =============================================================================
// INPUT SCHEMA
// =============================================================================

export const extractedFieldSchema = z.object({
    value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
    confidence: z.number().min(0).max(1),
});

export const documentSchema = z.object({
    id: z.string().min(1),
    filename: z.string(),
    mimeType: z.string().default('application/octet-stream'),
    sizeBytes: z.number().int().nonnegative().default(0),
    documentType: z.string().optional(),
    extractedFields: z.record(extractedFieldSchema).default({}),
    textContent: z.string().default(''),
});

export type DocumentInput = z.input<typeof documentSchema>;
