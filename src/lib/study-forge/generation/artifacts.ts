/**
 * Study Forge — Artifact Definitions
 *
 * Per-kind contract: the shape the reply must resolve to, how much source text
 * the prompt may carry, the output budget, the instruction pair, and a zod
 * schema describing the fields callers expect.
 *
 * The schemas are used for inspection only. A parsed artifact that misses
 * fields is still returned; `inspectArtifact` reports what is missing.
 */

import { z } from "zod";
import type { ArtifactKind, ArtifactRequest, Difficulty, ExpectedShape, ParsedArtifact } from "../types";

export const DIFFICULTY_GUIDANCE: Record<Difficulty, string> = {
    easy: "Focus on basic facts and definitions",
    medium: "Balance facts with conceptual understanding",
    hard: "Focus on complex concepts and applications",
    mixed: "Mix of easy, medium, and hard questions",
};

const levelSchema = z.enum(["easy", "medium", "hard"]);

export const SummarySchema = z.object({
    overview: z.string(),
    keyPoints: z.array(z.object({ point: z.string(), details: z.string().optional() })),
    conclusion: z.string(),
});

export const NotesSchema = z.object({
    cues: z.array(z.string()),
    notes: z.array(z.string()),
    summary: z.string(),
});

export const FlashcardSchema = z.object({
    front: z.string(),
    back: z.string(),
    difficulty: levelSchema.optional(),
    tags: z.array(z.string()).optional(),
});

export const FlashcardsSchema = z.array(FlashcardSchema);

export const QuizQuestionSchema = z.object({
    type: z.string().optional(),
    question: z.string(),
    options: z.array(z.string()),
    correctAnswer: z.string(),
    explanation: z.string().optional(),
    difficulty: levelSchema.optional(),
});

export const QuizSchema = z.object({
    questions: z.array(QuizQuestionSchema),
});

export const ConceptMapSchema = z.object({
    central: z.string(),
    branches: z.array(
        z.object({
            label: z.string(),
            children: z.array(z.string()),
        })
    ),
});

export type Summary = z.infer<typeof SummarySchema>;
export type Notes = z.infer<typeof NotesSchema>;
export type Flashcard = z.infer<typeof FlashcardSchema>;
export type Quiz = z.infer<typeof QuizSchema>;
export type ConceptMap = z.infer<typeof ConceptMapSchema>;

export interface ArtifactDefinition {
    shape: ExpectedShape;
    /** Characters of normalized source text included in the prompt */
    sourceBudget: number;
    maxOutputTokens: number;
    schema: z.ZodTypeAny;
    system: string;
    buildPrompt(request: ArtifactRequest): string;
}

const JSON_ONLY_OBJECT = "Respond with ONLY a JSON object (no markdown, no backticks) with this structure:";
const JSON_ONLY_ARRAY = "Respond with ONLY a JSON array (no markdown, no backticks) with this structure:";

function header(title: string, request: ArtifactRequest): string {
    return `${title}\n\nDocument: ${request.documentName}`;
}

function difficultyLine(request: ArtifactRequest): string {
    const difficulty = request.difficultyHint ?? "mixed";
    return `Difficulty: ${difficulty} - ${DIFFICULTY_GUIDANCE[difficulty]}`;
}

export const ARTIFACT_DEFINITIONS: Record<ArtifactKind, ArtifactDefinition> = {
    summary: {
        shape: "object",
        sourceBudget: 15_000,
        maxOutputTokens: 2_000,
        schema: SummarySchema,
        system:
            "You are an expert at creating concise, informative summaries of academic and professional documents. " +
            "Generate summaries that capture the essence and main ideas.",
        buildPrompt: (request) =>
            [
                header("Create a comprehensive summary of this document in JSON format.", request),
                `Text:\n${request.sourceText}`,
                `${JSON_ONLY_OBJECT}
{
    "overview": "2-3 sentence overview of the entire document",
    "keyPoints": [
        {"point": "Main idea 1", "details": "Brief explanation"},
        {"point": "Main idea 2", "details": "Brief explanation"}
    ],
    "conclusion": "Final takeaway or conclusion"
}`,
            ].join("\n\n"),
    },

    notes: {
        shape: "object",
        sourceBudget: 15_000,
        maxOutputTokens: 3_000,
        schema: NotesSchema,
        system:
            "You are an expert at creating Cornell Notes - a proven note-taking method with cues, notes, and summary sections.",
        buildPrompt: (request) =>
            [
                header("Create Cornell Notes from this document in JSON format.", request),
                `Text:\n${request.sourceText}`,
                `${JSON_ONLY_OBJECT}
{
    "cues": ["Question 1?", "Key term 2", "Question 3?"],
    "notes": ["Detailed explanation 1", "Detailed explanation 2", "Detailed explanation 3"],
    "summary": "Overall summary in 2-3 sentences"
}`,
                "The n-th note answers the n-th cue. Generate 10-15 cue-note pairs that cover the main concepts.",
            ].join("\n\n"),
    },

    flashcards: {
        shape: "array",
        sourceBudget: 15_000,
        maxOutputTokens: 4_000,
        schema: FlashcardsSchema,
        system:
            "You are an expert at creating effective flashcards for spaced repetition learning (like Anki). " +
            "Your flashcards should be clear, concise, and test understanding.",
        buildPrompt: (request) =>
            [
                `${header(`Create ${request.countHint ?? 30} flashcards from this document in JSON format.`, request)}\n${difficultyLine(request)}`,
                `Text:\n${request.sourceText}`,
                `${JSON_ONLY_ARRAY}
[
    {
        "front": "Clear, specific question",
        "back": "Concise answer (1-3 sentences)",
        "difficulty": "easy|medium|hard",
        "tags": ["topic1", "concept2"]
    }
]`,
                "Make flashcards that test real understanding, not just memorization.",
            ].join("\n\n"),
    },

    quiz: {
        shape: "object",
        sourceBudget: 15_000,
        maxOutputTokens: 4_000,
        schema: QuizSchema,
        system: "You are an expert at creating effective multiple-choice questions that test understanding.",
        buildPrompt: (request) =>
            [
                `${header(`Create a ${request.countHint ?? 20}-question multiple-choice quiz from this document in JSON format.`, request)}\n${difficultyLine(request)}`,
                `Text:\n${request.sourceText}`,
                `${JSON_ONLY_OBJECT}
{
    "questions": [
        {
            "type": "multiple_choice",
            "question": "Clear question text",
            "options": ["A) First option", "B) Second option", "C) Third option", "D) Fourth option"],
            "correctAnswer": "A",
            "explanation": "Why this answer is correct",
            "difficulty": "easy|medium|hard"
        }
    ]
}`,
                "Create questions that test understanding, not just recall.",
            ].join("\n\n"),
    },

    conceptMap: {
        shape: "object",
        sourceBudget: 10_000,
        maxOutputTokens: 1_500,
        schema: ConceptMapSchema,
        system: "You are an expert at creating clear concept maps that visualize how the ideas in a document relate.",
        buildPrompt: (request) =>
            [
                header("Create a concept map from this document in JSON format.", request),
                `Text:\n${request.sourceText}`,
                `${JSON_ONLY_OBJECT}
{
    "central": "Main topic",
    "branches": [
        {"label": "Subtopic 1", "children": ["Detail A", "Detail B"]},
        {"label": "Subtopic 2", "children": ["Detail C", "Detail D"]}
    ]
}`,
                "Keep it clear and organized with 3-5 main branches.",
            ].join("\n\n"),
    },
};

/** Build the self-contained request for one kind */
export function buildArtifactRequest(
    kind: ArtifactKind,
    text: string,
    documentName: string,
    hints: { countHint?: number; difficultyHint?: Difficulty } = {}
): ArtifactRequest {
    return {
        kind,
        sourceText: text.slice(0, ARTIFACT_DEFINITIONS[kind].sourceBudget),
        documentName,
        ...hints,
    };
}

/** Expected fields that are missing or ill-typed, as `path: message` strings */
export function inspectArtifact(kind: ArtifactKind, artifact: ParsedArtifact): string[] {
    const result = ARTIFACT_DEFINITIONS[kind].schema.safeParse(artifact);
    if (result.success) {
        return [];
    }
    return result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
