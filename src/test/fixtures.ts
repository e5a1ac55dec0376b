import type { Document, FieldValue } from '@/lib/documents';
import { resolveConfig, type RelationshipConfigInput } from '@/lib/relationships/config';
import type { ExtractionContext } from '@/lib/relationships/extractors/types';

export interface DocumentOverrides {
    filename?: string;
    documentType?: string;
    fields?: Record<string, FieldValue>;
    text?: string;
}

/**
 * Build a document with every field extracted at confidence 0.9
 */
export function makeDocument(id: string, overrides: DocumentOverrides = {}): Document {
    const extractedFields: Record<string, { value: FieldValue; confidence: number }> = {};
    for (const [name, value] of Object.entries(overrides.fields ?? {})) {
        extractedFields[name] = { value, confidence: 0.9 };
    }

    return {
        id,
        filename: overrides.filename ?? `${id}.pdf`,
        mimeType: 'application/pdf',
        sizeBytes: 1024,
        ...(overrides.documentType !== undefined ? { documentType: overrides.documentType } : {}),
        extractedFields,
        textContent: overrides.text ?? ''
    };
}

export function makeContext(config: RelationshipConfigInput = {}, signal?: AbortSignal): ExtractionContext {
    return { config: resolveConfig(config), signal };
}

/**
 * Run a function expected to throw and hand back what it threw
 */
export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('Expected function to throw');
}
