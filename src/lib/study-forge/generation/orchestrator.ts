/**
 * Study Forge — Generation Orchestrator
 *
 * Fans one normalized text out to the requested artifact kinds. Every kind is
 * an isolated unit (request in, `KindResult` out) with its own abort signal, so
 * a slow, failing or unparseable kind only removes itself from the output.
 */

import { GenerationError, ParseError, describeError } from "../errors";
import { createSilentLogger, type StudyForgeLogger } from "../logger";
import type {
    ArtifactKind,
    ArtifactMap,
    ArtifactReply,
    ArtifactRequest,
    Difficulty,
    GenerationBackend,
    GenerationOutcome,
    KindFailure,
    KindResult,
} from "../types";
import { ARTIFACT_DEFINITIONS, buildArtifactRequest, inspectArtifact } from "./artifacts";
import { parseStructuredResponse } from "./response-parser";

export const DEFAULT_FLASHCARD_COUNT = 30;
export const DEFAULT_QUIZ_QUESTION_COUNT = 20;

export interface GenerationOrchestratorOptions {
    backend: GenerationBackend;
    /** Upper bound for one kind's backend call */
    timeoutMs: number;
    logger?: StudyForgeLogger;
}

export interface GenerateOptions {
    documentName: string;
    flashcardCount?: number;
    quizQuestionCount?: number;
    difficulty?: Difficulty;
    /** Aborts every kind still in flight; finished kinds are kept */
    signal?: AbortSignal;
}

export class GenerationOrchestrator {
    private readonly backend: GenerationBackend;
    private readonly timeoutMs: number;
    private readonly logger: StudyForgeLogger;

    constructor(options: GenerationOrchestratorOptions) {
        this.backend = options.backend;
        this.timeoutMs = options.timeoutMs;
        this.logger = (options.logger ?? createSilentLogger()).child({ module: "generation" });
    }

    /** Never rejects: kind-level errors are reported in `failures` */
    async generate(text: string, kinds: readonly ArtifactKind[], options: GenerateOptions): Promise<GenerationOutcome> {
        const unique = [...new Set(kinds)];
        const results = await Promise.all(unique.map((kind) => this.runKind(this.requestFor(kind, text, options), options.signal)));

        const artifacts: Partial<ArtifactMap> = {};
        const failures: KindFailure[] = [];
        for (const result of results) {
            if (result.ok) {
                artifacts[result.kind] = result.artifact;
            } else {
                failures.push({ kind: result.kind, error: result.error.message });
            }
        }

        this.logger.info("Generation finished", {
            documentName: options.documentName,
            generated: Object.keys(artifacts),
            failed: failures.map((failure) => failure.kind),
        });
        return { artifacts, failures };
    }

    private requestFor(kind: ArtifactKind, text: string, options: GenerateOptions): ArtifactRequest {
        switch (kind) {
            case "flashcards":
                return buildArtifactRequest(kind, text, options.documentName, {
                    countHint: options.flashcardCount ?? DEFAULT_FLASHCARD_COUNT,
                    difficultyHint: options.difficulty ?? "mixed",
                });
            case "quiz":
                return buildArtifactRequest(kind, text, options.documentName, {
                    countHint: options.quizQuestionCount ?? DEFAULT_QUIZ_QUESTION_COUNT,
                    difficultyHint: options.difficulty ?? "mixed",
                });
            default:
                return buildArtifactRequest(kind, text, options.documentName);
        }
    }

    private async runKind(request: ArtifactRequest, callerSignal?: AbortSignal): Promise<KindResult> {
        const { kind } = request;
        const definition = ARTIFACT_DEFINITIONS[kind];
        const log = this.logger.child({ kind });

        const timeout = AbortSignal.timeout(this.timeoutMs);
        const signal = callerSignal ? AbortSignal.any([timeout, callerSignal]) : timeout;
        const startedAt = Date.now();

        try {
            signal.throwIfAborted();
            log.debug("Requesting artifact", {
                backend: this.backend.name,
                sourceChars: request.sourceText.length,
                maxOutputTokens: definition.maxOutputTokens,
            });

            const reply = await this.submit(request, signal);

            const artifact = parseStructuredResponse(reply.rawText, definition.shape, kind);
            const missing = inspectArtifact(kind, artifact);
            if (missing.length > 0) {
                log.warn("Artifact is missing expected fields", { missing });
            }

            log.info("Artifact generated", { durationMs: Date.now() - startedAt, replyChars: reply.rawText.length });
            return { ok: true, kind, artifact };
        } catch (error) {
            const failure = this.toKindError(kind, error, timeout);
            log.error("Artifact generation failed", failure);
            return { ok: false, kind, error: failure };
        }
    }

    private async submit(request: ArtifactRequest, signal: AbortSignal): Promise<ArtifactReply> {
        const definition = ARTIFACT_DEFINITIONS[request.kind];
        const rawText = await untilAborted(
            this.backend.complete({
                system: definition.system,
                prompt: definition.buildPrompt(request),
                maxOutputTokens: definition.maxOutputTokens,
                signal,
            }),
            signal
        );
        return { kind: request.kind, rawText };
    }

    private toKindError(kind: ArtifactKind, error: unknown, timeout: AbortSignal): Error {
        if (error instanceof ParseError) {
            return error;
        }
        if (timeout.aborted) {
            return new GenerationError(kind, `Generation timed out after ${this.timeoutMs}ms`, {
                cause: error,
                timedOut: true,
            });
        }
        if (error instanceof Error && error.name === "AbortError") {
            return new GenerationError(kind, "Generation cancelled", { cause: error });
        }
        return new GenerationError(kind, `${this.backend.name} failed: ${describeError(error)}`, { cause: error });
    }
}

/** Settle with `work`, or reject as soon as `signal` aborts, whichever comes first */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        void work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
    });
}
