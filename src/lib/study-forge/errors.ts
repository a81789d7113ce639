/**
 * Study Forge — Error Types
 *
 * Document-level failures derive from `AcquisitionError`; kind-level failures
 * (`GenerationError`, `ParseError`) never abort sibling kinds.
 */

import type { ArtifactKind, FormatTag } from "./types";

const MAX_REPLY_PREVIEW = 500;

export class StudyForgeError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "StudyForgeError";
    }
}

export class AcquisitionError extends StudyForgeError {
    readonly uri: string;
    constructor(message: string, uri: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "AcquisitionError";
        this.uri = uri;
    }
}

export class FetchError extends AcquisitionError {
    readonly statusCode?: number;
    constructor(message: string, uri: string, statusCode?: number, options?: ErrorOptions) {
        super(message, uri, options);
        this.name = "FetchError";
        this.statusCode = statusCode;
    }
}

export class DocumentTooLargeError extends AcquisitionError {
    readonly size: number;
    readonly maxSize: number;
    constructor(uri: string, size: number, maxSize: number) {
        super(`Document size ${size} bytes exceeds maximum ${maxSize} bytes`, uri);
        this.name = "DocumentTooLargeError";
        this.size = size;
        this.maxSize = maxSize;
    }
}

export class ExtractionError extends AcquisitionError {
    readonly format: FormatTag;
    readonly detail: string;
    constructor(format: FormatTag, detail: string, options?: ErrorOptions & { uri?: string }) {
        super(`[${format}] ${detail}`, options?.uri ?? "", options);
        this.name = "ExtractionError";
        this.format = format;
        this.detail = detail;
    }

    /** Same failure, attributed to the document it came from */
    withUri(uri: string): ExtractionError {
        return new ExtractionError(this.format, this.detail, { uri, cause: this.cause });
    }
}

export class InsufficientContentError extends StudyForgeError {
    readonly length: number;
    readonly minimum: number;
    constructor(length: number, minimum: number) {
        super(`Insufficient text extracted: ${length} characters, need at least ${minimum}`);
        this.name = "InsufficientContentError";
        this.length = length;
        this.minimum = minimum;
    }
}

export class GenerationError extends StudyForgeError {
    readonly kind: ArtifactKind;
    readonly timedOut: boolean;
    constructor(kind: ArtifactKind, message: string, options?: ErrorOptions & { timedOut?: boolean }) {
        super(message, options);
        this.name = "GenerationError";
        this.kind = kind;
        this.timedOut = options?.timedOut ?? false;
    }
}

export class ParseError extends StudyForgeError {
    readonly kind?: ArtifactKind;
    /** Start of the offending reply, for diagnostics */
    readonly reply: string;
    constructor(message: string, reply: string, kind?: ArtifactKind, options?: ErrorOptions) {
        super(message, options);
        this.name = "ParseError";
        this.kind = kind;
        this.reply = reply.length > MAX_REPLY_PREVIEW ? `${reply.slice(0, MAX_REPLY_PREVIEW)}…` : reply;
    }
}

export class ConfigError extends StudyForgeError {
    readonly issues: string[];
    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === "string" ? error : "Unknown error";
}
