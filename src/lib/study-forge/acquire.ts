/**
 * Study Forge — Acquisition Coordinator
 *
 * Single entry point for turning a URI into normalized text:
 * fetch → fingerprint → detect → extract → normalize. Any failure is fatal for
 * the document and surfaces as an `AcquisitionError`; nothing is retried here.
 */

import { createHash } from "node:crypto";
import { FormatDetector } from "./detect";
import { AcquisitionError, DocumentTooLargeError, ExtractionError, FetchError, describeError } from "./errors";
import { createHttpFetcher, resolveDeclaredName } from "./fetcher";
import { createSilentLogger, type StudyForgeLogger } from "./logger";
import { normalizeText } from "./normalize";
import { ExtractorRouter } from "./router";
import type { AcquiredDocument, DocumentFetcher, ExtractedText, FetchResponse, RawDocument } from "./types";

const CONTENT_ID_LENGTH = 12;

export interface AcquisitionOptions {
    timeoutMs: number;
    maxDocumentBytes: number;
    fetcher?: DocumentFetcher;
    detector?: FormatDetector;
    router?: ExtractorRouter;
    logger?: StudyForgeLogger;
}

/** Short, stable identifier for a byte sequence. Not a security digest. */
export function computeContentId(bytes: Buffer): string {
    return createHash("md5").update(bytes).digest("hex").slice(0, CONTENT_ID_LENGTH);
}

export class AcquisitionCoordinator {
    private readonly fetcher: DocumentFetcher;
    private readonly detector: FormatDetector;
    private readonly router: ExtractorRouter;
    private readonly logger: StudyForgeLogger;

    constructor(private readonly options: AcquisitionOptions) {
        this.fetcher = options.fetcher ?? createHttpFetcher();
        this.detector = options.detector ?? new FormatDetector();
        this.router = options.router ?? new ExtractorRouter();
        this.logger = (options.logger ?? createSilentLogger()).child({ module: "acquisition" });
    }

    /**
     * @throws AcquisitionError (including `FetchError`, `DocumentTooLargeError`
     *   and `ExtractionError`) when the document cannot be turned into text
     */
    async acquire(uri: string): Promise<AcquiredDocument> {
        const raw = await this.fetchDocument(uri);
        const contentId = computeContentId(raw.bytes);

        const detection = this.detector.detectWithEvidence(raw.declaredName, raw.bytes);
        if (detection.ambiguous) {
            this.logger.warn("Shared container signature resolved by default", {
                uri,
                declaredName: raw.declaredName,
                format: detection.format,
            });
        }
        this.logger.debug("Format detected", { uri, contentId, ...detection });

        let extracted: ExtractedText;
        try {
            extracted = await this.router.extract(raw.bytes, detection.format);
        } catch (error) {
            this.logger.error("Extraction failed", error instanceof Error ? error : { error });
            if (error instanceof ExtractionError) {
                throw error.withUri(uri);
            }
            throw new AcquisitionError(describeError(error), uri, { cause: error });
        }

        const text = normalizeText(extracted.raw);
        this.logger.info("Document acquired", {
            uri,
            contentId,
            format: extracted.format,
            size: raw.bytes.length,
            rawLength: extracted.raw.length,
            textLength: text.length,
        });

        return {
            bytes: raw.bytes,
            declaredName: raw.declaredName,
            origin: raw.origin,
            format: extracted.format,
            contentId,
            size: raw.bytes.length,
            text,
        };
    }

    private async fetchDocument(uri: string): Promise<RawDocument> {
        const { timeoutMs, maxDocumentBytes } = this.options;

        let response: FetchResponse;
        try {
            response = await this.fetcher(uri, { signal: AbortSignal.timeout(timeoutMs) });
        } catch (error) {
            const timedOut = error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
            const message = timedOut ? `Request timeout after ${timeoutMs}ms` : describeError(error);
            this.logger.warn("Fetch failed", { uri, message });
            throw new FetchError(message, uri, undefined, { cause: error });
        }

        if (response.status < 200 || response.status >= 300) {
            this.logger.warn("Fetch returned non-success status", { uri, status: response.status });
            throw new FetchError(`HTTP ${response.status}`, uri, response.status);
        }

        const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
        if (declaredLength > maxDocumentBytes) {
            throw new DocumentTooLargeError(uri, declaredLength, maxDocumentBytes);
        }
        if (response.bytes.length > maxDocumentBytes) {
            throw new DocumentTooLargeError(uri, response.bytes.length, maxDocumentBytes);
        }

        return Object.freeze({
            bytes: response.bytes,
            declaredName: resolveDeclaredName(uri, response.headers),
            origin: uri,
        });
    }
}
