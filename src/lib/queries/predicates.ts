import { comparableString, readField, toNumber, type Document, type FieldValue } from '@/lib/documents';
import type { Predicate } from './schemas';

type Scalar = string | number | boolean;

function scalarEquals(actual: FieldValue, expected: Scalar): boolean {
    if (typeof expected === 'number') {
        return toNumber(actual) === expected;
    }
    if (typeof expected === 'boolean') {
        return actual === expected;
    }
    return comparableString(actual) === comparableString(expected);
}

/**
 * Evaluate a predicate against one document. A field the document lacks
 * fails every operator.
 */
export function matchesPredicate(doc: Document, predicate: Predicate): boolean {
    const actual = readField(doc, predicate.field);
    if (actual === undefined || actual === null) return false;

    const { value } = predicate;
    switch (predicate.op) {
        case 'exists':
            return true;
        case 'one_of':
            return Array.isArray(value) && value.some(candidate => scalarEquals(actual, candidate));
        case 'equals':
            return value !== undefined && !Array.isArray(value) && scalarEquals(actual, value);
        case 'not_equals':
            return value !== undefined && !Array.isArray(value) && !scalarEquals(actual, value);
        case 'contains': {
            if (value === undefined || Array.isArray(value)) return false;
            const haystack = comparableString(actual) ?? '';
            const needle = comparableString(value) ?? '';
            return haystack.includes(needle);
        }
    }
}
