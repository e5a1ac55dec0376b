/**
 * Field access helpers
 *
 * Reads values out of a document's extracted fields (or its pseudo-fields)
 * and coerces them to numbers and dates.
 */

import { isValid, parse, parseISO } from 'date-fns';
import { PSEUDO_FIELDS, type Document, type FieldValue, type PseudoField } from './types';

const DATE_FORMATS = ['MM/dd/yyyy', 'dd.MM.yyyy', 'MMMM d, yyyy', 'd MMMM yyyy'];

// Fixed reference so format-based parsing never depends on the clock
const PARSE_REFERENCE_DATE = new Date(2000, 0, 1);

const PSEUDO_FIELD_NAMES: ReadonlySet<string> = new Set(PSEUDO_FIELDS);

function isPseudoField(name: string): name is PseudoField {
    return PSEUDO_FIELD_NAMES.has(name);
}

/**
 * Resolve a field by name. Missing fields and null values both yield undefined.
 */
export function readField(doc: Document, name: string): FieldValue | undefined {
    if (isPseudoField(name)) {
        switch (name) {
            case 'id':
                return doc.id;
            case 'filename':
                return doc.filename;
            case 'mime_type':
                return doc.mimeType;
            case 'document_type':
                return doc.documentType ?? doc.extractedFields['document_type']?.value ?? undefined;
        }
    }

    const field = doc.extractedFields[name];
    if (!field || field.value === null) return undefined;
    return field.value;
}

export function hasField(doc: Document, name: string): boolean {
    return readField(doc, name) !== undefined;
}

// One number, optionally signed and grouped by thousands, with a currency
// symbol or ISO code before or after it: "$1,234.50", "-EUR 99", "99 EUR"
const AMOUNT_PATTERN = /^(-)?\s*(?:[$€£¥]|[A-Z]{3})?\s*(-)?(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?|\.\d+)\s*(?:[$€£¥]|[A-Z]{3})?$/;

/**
 * Parse a monetary or plain numeric value.
 * Strings holding anything else ("Net 30: 1,000", "1.234,56", "PO-123")
 * yield undefined rather than a guess.
 */
export function toNumber(value: FieldValue | undefined): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value !== 'string') return undefined;

    const match = AMOUNT_PATTERN.exec(value.trim());
    if (!match) return undefined;

    const [, leadingSign, innerSign, digits] = match;
    if (leadingSign && innerSign) return undefined;

    const magnitude = Number(digits.replace(/,/g, ''));
    return leadingSign || innerSign ? -magnitude : magnitude;
}

export function toDate(value: FieldValue | undefined): Date | undefined {
    if (typeof value !== 'string') return undefined;

    const trimmed = value.trim();
    if (trimmed === '') return undefined;

    const iso = parseISO(trimmed);
    if (isValid(iso)) return iso;

    for (const format of DATE_FORMATS) {
        const parsed = parse(trimmed, format, PARSE_REFERENCE_DATE);
        if (isValid(parsed)) return parsed;
    }

    return undefined;
}

export function readNumber(doc: Document, name: string): number | undefined {
    return toNumber(readField(doc, name));
}

export function readDate(doc: Document, name: string): Date | undefined {
    return toDate(readField(doc, name));
}

/**
 * First parseable date among the candidate fields, in order
 */
export function primaryDate(doc: Document, dateFields: readonly string[]): Date | undefined {
    for (const name of dateFields) {
        const date = readDate(doc, name);
        if (date) return date;
    }
    return undefined;
}

/**
 * Normalised string form used for case-insensitive comparisons
 */
export function comparableString(value: FieldValue | undefined): string | undefined {
    if (value === undefined || value === null) return undefined;
    return String(value).trim().toLowerCase();
}
