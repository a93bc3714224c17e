import type { CitationId } from "./types";

export type EnrichmentErrorCode = "INVALID_CONFIG" | "NOT_FOUND" | "INVALID_CONTENT";

export class EnrichmentError extends Error {
    constructor(
        message: string,
        public code: EnrichmentErrorCode,
    ) {
        super(message);
        this.name = "EnrichmentError";
    }
}

/**
 * Rejected options: non-positive maxTokens, negative overlap, duplicate
 * citation ids, empty context and the like.
 */
export class ConfigurationError extends EnrichmentError {
    constructor(
        message: string,
        public issues: string[] = [],
    ) {
        super(message, "INVALID_CONFIG");
        this.name = "ConfigurationError";
    }
}

export class NotFoundError extends EnrichmentError {
    constructor(public citationId: CitationId) {
        super(`No citation record with id "${String(citationId)}"`, "NOT_FOUND");
        this.name = "NotFoundError";
    }
}

export class InvalidContentError extends EnrichmentError {
    constructor(
        message: string,
        public issues: string[] = [],
    ) {
        super(message, "INVALID_CONTENT");
        this.name = "InvalidContentError";
    }
}
