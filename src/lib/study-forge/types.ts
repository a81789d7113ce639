/**
 * Study Forge — Type Definitions
 *
 * Shared types for the ingestion pipeline (fetch → detect → extract → normalize)
 * and the generation side (request → reply → parsed artifact).
 */

// ---------------------------------------------------------------------------
// Formats
// ---------------------------------------------------------------------------

export const FORMAT_TAGS = [
    "pdf",
    "word-document",
    "presentation",
    "spreadsheet-modern",
    "spreadsheet-legacy",
    "plain-text",
    "markdown",
    "html",
    "ebook",
    "rich-text",
    "unknown",
] as const;

/** Canonical document classification; selects exactly one extraction strategy */
export type FormatTag = (typeof FORMAT_TAGS)[number];

/** Where the detector's decision came from */
export type DetectionSource = "signature" | "extension" | "default";

export interface DetectionResult {
    format: FormatTag;
    source: DetectionSource;
    /**
     * True when a shared container signature had to be resolved by the
     * documented default rather than by an informative extension.
     */
    ambiguous: boolean;
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** Bytes exactly as fetched. Frozen once created. */
export interface RawDocument {
    readonly bytes: Buffer;
    readonly declaredName: string;
    readonly origin: string;
}

export interface ExtractedText {
    raw: string;
    format: FormatTag;
}

/** Output of the acquisition coordinator */
export interface AcquiredDocument {
    bytes: Buffer;
    declaredName: string;
    origin: string;
    format: FormatTag;
    /** Short MD5 prefix of the bytes, stable across fetches of the same content */
    contentId: string;
    size: number;
    /** Normalized text */
    text: string;
}

// ---------------------------------------------------------------------------
// Extractor Interface
// ---------------------------------------------------------------------------

/**
 * Contract every format-specific extractor implements.
 *
 * Implementors return raw text and should NOT normalize; the coordinator does.
 * Structural failures are reported by throwing; the router wraps them in an
 * `ExtractionError` carrying the format tag.
 */
export interface Extractor {
    /** Human-readable name of the extractor (for logging / debugging) */
    readonly name: string;

    extract(bytes: Buffer): Promise<string>;
}

// ---------------------------------------------------------------------------
// Fetching
// ---------------------------------------------------------------------------

export interface FetchResponse {
    status: number;
    headers: Headers;
    bytes: Buffer;
}

/** Network capability consumed by the acquisition coordinator */
export type DocumentFetcher = (
    uri: string,
    init: { signal: AbortSignal }
) => Promise<FetchResponse>;

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export const ARTIFACT_KINDS = ["summary", "notes", "flashcards", "quiz", "conceptMap"] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export const DIFFICULTIES = ["easy", "medium", "hard", "mixed"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

export interface ArtifactRequest {
    kind: ArtifactKind;
    /** Source excerpt, already cut to the kind's character budget */
    sourceText: string;
    documentName: string;
    countHint?: number;
    difficultyHint?: Difficulty;
}

export interface ArtifactReply {
    kind: ArtifactKind;
    rawText: string;
}

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
export interface JsonObject {
    [key: string]: JsonValue;
}
export type JsonArray = JsonValue[];

/** Top-level container a kind's reply must resolve to */
export type ExpectedShape = "object" | "array";

export type ParsedArtifact = JsonObject | JsonArray;

export type ArtifactMap = Record<ArtifactKind, ParsedArtifact>;

/** Request to the external generation capability */
export interface CompletionRequest {
    system: string;
    prompt: string;
    maxOutputTokens: number;
    signal?: AbortSignal;
}

export interface GenerationBackend {
    readonly name: string;
    complete(request: CompletionRequest): Promise<string>;
}

/** Result of one isolated kind unit: either an artifact or the reason there is none */
export type KindResult =
    | { ok: true; kind: ArtifactKind; artifact: ParsedArtifact }
    | { ok: false; kind: ArtifactKind; error: Error };

export interface KindFailure {
    kind: ArtifactKind;
    error: string;
}

export interface GenerationOutcome {
    artifacts: Partial<ArtifactMap>;
    failures: KindFailure[];
}

// ---------------------------------------------------------------------------
// Caller-facing records
// ---------------------------------------------------------------------------

export type RecordStatus = "success" | "failed" | "skipped";

export interface DocumentStatistics {
    textLength: number;
    wordCount: number;
    estimatedReadTime: string;
    generatedKinds: ArtifactKind[];
    flashcardCount: number;
    quizQuestionCount: number;
}

export interface SummaryRecord {
    runId: string;
    sourceUri: string;
    contentId?: string;
    declaredName?: string;
    formatTag?: FormatTag;
    parsedArtifacts: Partial<ArtifactMap>;
    failures: KindFailure[];
    statistics?: DocumentStatistics;
    processedAt: string;
    status: RecordStatus;
    error?: string;
}

export interface SourceMetadata {
    filename: string;
    sourceUri: string;
    processedAt: string;
}

/** Downstream export collaborator (rendering lives outside this package) */
export interface ArtifactSink {
    deliver(artifacts: Partial<ArtifactMap>, metadata: SourceMetadata): Promise<void>;
}
