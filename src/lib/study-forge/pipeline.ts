/**
 * Study Forge — Pipeline
 *
 * acquire → content gate → generate → record. One record per document; a
 * document that cannot be acquired is reported as `failed`, one with too little
 * text as `skipped`, and anything past the gate as `success` even when some
 * kinds failed.
 */

import { v4 as uuidv4 } from "uuid";
import { AcquisitionCoordinator } from "./acquire";
import type { StudyForgeConfig } from "./config";
import { InsufficientContentError, describeError } from "./errors";
import { OpenAIChatBackend } from "./generation/backend";
import { GenerationOrchestrator, type GenerateOptions } from "./generation/orchestrator";
import { createLogger, createSilentLogger, type StudyForgeLogger } from "./logger";
import { countWords } from "./normalize";
import {
    ARTIFACT_KINDS,
    type AcquiredDocument,
    type ArtifactKind,
    type ArtifactMap,
    type ArtifactSink,
    type DocumentFetcher,
    type DocumentStatistics,
    type GenerationBackend,
    type SummaryRecord,
} from "./types";

const WORDS_PER_MINUTE = 200;

export interface StudyPipelineOptions {
    acquisition: AcquisitionCoordinator;
    generation: GenerationOrchestrator;
    /** Normalized texts shorter than this are skipped */
    minTextLength: number;
    sink?: ArtifactSink;
    logger?: StudyForgeLogger;
}

export interface ProcessRequest extends Omit<GenerateOptions, "documentName"> {
    kinds: readonly ArtifactKind[];
}

export function estimateReadTime(wordCount: number): string {
    return `${Math.floor(wordCount / WORDS_PER_MINUTE)}m`;
}

function countEntries(artifact: ArtifactMap[ArtifactKind] | undefined, key?: string): number {
    if (artifact === undefined) {
        return 0;
    }
    if (Array.isArray(artifact)) {
        return artifact.length;
    }
    const entries = key === undefined ? undefined : artifact[key];
    return Array.isArray(entries) ? entries.length : 0;
}

export function buildStatistics(text: string, artifacts: Partial<ArtifactMap>): DocumentStatistics {
    const wordCount = countWords(text);
    return {
        textLength: text.length,
        wordCount,
        estimatedReadTime: estimateReadTime(wordCount),
        generatedKinds: ARTIFACT_KINDS.filter((kind) => artifacts[kind] !== undefined),
        flashcardCount: countEntries(artifacts.flashcards),
        quizQuestionCount: countEntries(artifacts.quiz, "questions"),
    };
}

export class StudyPipeline {
    private readonly logger: StudyForgeLogger;

    constructor(private readonly options: StudyPipelineOptions) {
        this.logger = (options.logger ?? createSilentLogger()).child({ module: "pipeline" });
    }

    /** Always resolves with a record; errors are reported in it */
    async processDocument(uri: string, request: ProcessRequest): Promise<SummaryRecord> {
        const runId = uuidv4();
        const log = this.logger.child({ runId, uri });
        log.info("Processing document", { kinds: request.kinds });

        let acquired: AcquiredDocument;
        try {
            acquired = await this.options.acquisition.acquire(uri);
        } catch (error) {
            log.error("Acquisition failed", error instanceof Error ? error : { error });
            return {
                runId,
                sourceUri: uri,
                parsedArtifacts: {},
                failures: [],
                processedAt: new Date().toISOString(),
                status: "failed",
                error: describeError(error),
            };
        }

        const base = {
            runId,
            sourceUri: uri,
            contentId: acquired.contentId,
            declaredName: acquired.declaredName,
            formatTag: acquired.format,
        };

        if (acquired.text.length < this.options.minTextLength) {
            const gate = new InsufficientContentError(acquired.text.length, this.options.minTextLength);
            log.warn("Skipping document", { reason: gate.message });
            return {
                ...base,
                parsedArtifacts: {},
                failures: [],
                statistics: buildStatistics(acquired.text, {}),
                processedAt: new Date().toISOString(),
                status: "skipped",
                error: gate.message,
            };
        }

        const { kinds, ...hints } = request;
        const outcome = await this.options.generation.generate(acquired.text, kinds, {
            ...hints,
            documentName: acquired.declaredName,
        });

        const processedAt = new Date().toISOString();
        await this.deliver(outcome.artifacts, acquired.declaredName, uri, processedAt, log);

        log.info("Document processed", {
            contentId: acquired.contentId,
            generated: Object.keys(outcome.artifacts).length,
            failed: outcome.failures.length,
        });

        return {
            ...base,
            parsedArtifacts: outcome.artifacts,
            failures: outcome.failures,
            statistics: buildStatistics(acquired.text, outcome.artifacts),
            processedAt,
            status: "success",
        };
    }

    /** Documents run concurrently; records come back in input order */
    processDocuments(uris: readonly string[], request: ProcessRequest): Promise<SummaryRecord[]> {
        return Promise.all(uris.map((uri) => this.processDocument(uri, request)));
    }

    private async deliver(
        artifacts: Partial<ArtifactMap>,
        filename: string,
        sourceUri: string,
        processedAt: string,
        log: StudyForgeLogger
    ): Promise<void> {
        const { sink } = this.options;
        if (!sink || Object.keys(artifacts).length === 0) {
            return;
        }
        try {
            await sink.deliver(artifacts, { filename, sourceUri, processedAt });
        } catch (error) {
            log.error("Artifact sink failed", error instanceof Error ? error : { error });
        }
    }
}

export interface PipelineOverrides {
    backend?: GenerationBackend;
    fetcher?: DocumentFetcher;
    sink?: ArtifactSink;
    logger?: StudyForgeLogger;
}

/** Wire a pipeline from validated configuration; overrides replace the network-facing parts */
export function createStudyPipeline(config: StudyForgeConfig, overrides: PipelineOverrides = {}): StudyPipeline {
    const logger = overrides.logger ?? createLogger(config.logging);
    const backend = overrides.backend ?? new OpenAIChatBackend(config.openai);

    return new StudyPipeline({
        acquisition: new AcquisitionCoordinator({
            timeoutMs: config.fetch.timeoutMs,
            maxDocumentBytes: config.fetch.maxDocumentBytes,
            fetcher: overrides.fetcher,
            logger,
        }),
        generation: new GenerationOrchestrator({ backend, timeoutMs: config.generation.timeoutMs, logger }),
        minTextLength: config.minTextLength,
        sink: overrides.sink,
        logger,
    });
}
