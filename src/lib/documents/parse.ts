import { InvalidDocumentError } from '@/lib/errors';
import { documentSchema, type Document, type DocumentInput } from './types';

/**
 * Validate raw input into a Document, filling defaults for the optional parts
 */
export function parseDocument(input: unknown): Document {
    const result = documentSchema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.join('.') || '(root)';
        throw new InvalidDocumentError(`Invalid document at "${path}": ${issue.message}`, path);
    }
    return result.data;
}

export function parseDocuments(inputs: readonly DocumentInput[]): Document[] {
    return inputs.map(parseDocument);
}
