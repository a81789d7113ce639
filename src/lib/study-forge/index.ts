/**
 * Study Forge — Public API
 *
 * Barrel export for the package entry point.
 */

export { AcquisitionCoordinator, computeContentId } from "./acquire";
export type { AcquisitionOptions } from "./acquire";
export { loadConfig, loadConfigFromEnvironment } from "./config";
export type { StudyForgeConfig } from "./config";
export { FormatDetector } from "./detect";
export { decodeText } from "./encoding";
export {
    AcquisitionError,
    ConfigError,
    DocumentTooLargeError,
    ExtractionError,
    FetchError,
    GenerationError,
    InsufficientContentError,
    ParseError,
    StudyForgeError,
    describeError,
} from "./errors";
export { createHttpFetcher, resolveDeclaredName } from "./fetcher";
export { ARTIFACT_DEFINITIONS, inspectArtifact } from "./generation/artifacts";
export type { ConceptMap, Flashcard, Notes, Quiz, Summary } from "./generation/artifacts";
export { OpenAIChatBackend } from "./generation/backend";
export { GenerationOrchestrator } from "./generation/orchestrator";
export type { GenerateOptions, GenerationOrchestratorOptions } from "./generation/orchestrator";
export { parseStructuredResponse, stripCodeFences } from "./generation/response-parser";
export { createLogger, createSilentLogger } from "./logger";
export type { LogLevel, LoggerConfig, StudyForgeLogger } from "./logger";
export { countWords, normalizeText } from "./normalize";
export { StudyPipeline, buildStatistics, createStudyPipeline, estimateReadTime } from "./pipeline";
export type { PipelineOverrides, ProcessRequest, StudyPipelineOptions } from "./pipeline";
export { ExtractorRouter } from "./router";
export { ARTIFACT_KINDS, DIFFICULTIES, FORMAT_TAGS } from "./types";
export type {
    AcquiredDocument,
    ArtifactKind,
    ArtifactMap,
    ArtifactReply,
    ArtifactSink,
    CompletionRequest,
    DetectionResult,
    Difficulty,
    DocumentFetcher,
    DocumentStatistics,
    Extractor,
    FetchResponse,
    FormatTag,
    GenerationBackend,
    GenerationOutcome,
    KindFailure,
    ParsedArtifact,
    SourceMetadata,
    SummaryRecord,
} from "./types";
