/**
 * Error types
 *
 * Every error carries a stable `code` and optional structured context so
 * callers can branch without parsing messages.
 */

export class DocumentGraphError extends Error {
    constructor(
        message: string,
        public code: string,
        public context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'DocumentGraphError';
    }
}

export class DuplicateDocumentError extends DocumentGraphError {
    constructor(public documentId: string) {
        super(`Document already registered: ${documentId}`, 'DUPLICATE_DOCUMENT', { documentId });
        this.name = 'DuplicateDocumentError';
    }
}

export class InvalidDocumentError extends DocumentGraphError {
    constructor(message: string, public path: string) {
        super(message, 'INVALID_DOCUMENT', { path });
        this.name = 'InvalidDocumentError';
    }
}

export class UnknownDocumentError extends DocumentGraphError {
    constructor(public documentId: string) {
        super(`Unknown document: ${documentId}`, 'UNKNOWN_DOCUMENT', { documentId });
        this.name = 'UnknownDocumentError';
    }
}

export class InvalidRelationshipError extends DocumentGraphError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_RELATIONSHIP', context);
        this.name = 'InvalidRelationshipError';
    }
}

export class GraphStateError extends DocumentGraphError {
    constructor(message: string, code: 'GRAPH_SEALED' | 'GRAPH_NOT_SEALED') {
        super(message, code);
        this.name = 'GraphStateError';
    }
}

export class InvalidEvidenceError extends DocumentGraphError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_EVIDENCE', context);
        this.name = 'InvalidEvidenceError';
    }
}

export class SemanticScorerTimeoutError extends DocumentGraphError {
    constructor(public timeoutMs: number) {
        super(`Semantic scorer timed out after ${timeoutMs}ms`, 'SCORER_TIMEOUT', { timeoutMs });
        this.name = 'SemanticScorerTimeoutError';
    }
}

export class ConfigurationError extends DocumentGraphError {
    constructor(message: string, public path: string) {
        super(message, 'INVALID_CONFIG', { path });
        this.name = 'ConfigurationError';
    }
}

export class QueryValidationError extends DocumentGraphError {
    constructor(message: string, public parameter: string) {
        super(message, 'INVALID_QUERY', { parameter });
        this.name = 'QueryValidationError';
    }
}

/**
 * Readable message for anything thrown
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
