/**
 * Study Forge — Structured Response Parser
 *
 * Recovers a JSON object or array from a model reply that may be wrapped in
 * code fences or surrounded by prose. Validation is shape-only: missing keys
 * are the caller's concern. Element and key order is kept as received.
 */

import { ParseError } from "../errors";
import type { ArtifactKind, ExpectedShape, JsonArray, JsonObject, JsonValue, ParsedArtifact } from "../types";

const LEADING_FENCE = /^```[\w+-]*[ \t]*\r?\n?/;
const TRAILING_FENCE = /\r?\n?```\s*$/;

export function stripCodeFences(reply: string): string {
    return reply.trim().replace(LEADING_FENCE, "").replace(TRAILING_FENCE, "").trim();
}

/**
 * Parse `rawText` into the expected top-level container.
 * @throws ParseError when no structure of that shape can be recovered
 */
export function parseStructuredResponse(
    rawText: string,
    expected: ExpectedShape,
    kind?: ArtifactKind
): ParsedArtifact {
    const body = stripCodeFences(rawText);

    const direct = tryParse(body);
    if (direct !== undefined) {
        const shaped = coerceShape(direct, expected);
        if (shaped) {
            return shaped;
        }
    }

    let start = nextOpener(body, 0);
    while (start !== -1) {
        let resumeAt = start + 1;
        for (const candidate of bracketCandidates(body, start)) {
            const parsed = tryParse(candidate);
            if (parsed === undefined) {
                continue;
            }
            const shaped = coerceShape(parsed, expected);
            if (shaped) {
                return shaped;
            }
            // Well-formed but the wrong container: nothing nested inside it is the payload
            resumeAt = Math.max(resumeAt, start + candidate.length);
        }
        start = nextOpener(body, resumeAt);
    }

    throw new ParseError(`Could not recover a JSON ${expected} from the reply`, rawText, kind);
}

function tryParse(text: string): JsonValue | undefined {
    if (text.length === 0) {
        return undefined;
    }
    try {
        return toJsonValue(JSON.parse(text));
    } catch {
        return undefined;
    }
}

/** Narrow the output of JSON.parse, which is typed `any`, without casting */
function toJsonValue(value: unknown): JsonValue {
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map(toJsonValue);
    }
    if (typeof value === "object") {
        const object: JsonObject = {};
        for (const [key, entry] of Object.entries(value)) {
            // Plain assignment of "__proto__" would replace the prototype
            Object.defineProperty(object, key, {
                value: toJsonValue(entry),
                enumerable: true,
                writable: true,
                configurable: true,
            });
        }
        return object;
    }
    return null;
}

function isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function coerceShape(value: JsonValue, expected: ExpectedShape): ParsedArtifact | null {
    if (expected === "object") {
        return isJsonObject(value) ? value : null;
    }

    if (Array.isArray(value)) {
        return value;
    }

    // `{"flashcards": [...]}` when a bare array was asked for
    if (isJsonObject(value)) {
        const arrays = Object.values(value).filter((entry): entry is JsonArray => Array.isArray(entry));
        if (arrays.length === 1 && Object.keys(value).length === 1) {
            return arrays[0];
        }
    }
    return null;
}

/**
 * Substrings worth a second parse attempt for the opener at `start`: the
 * balanced region starting there, then the greedy region from there to the
 * last matching closer.
 */
export function bracketCandidates(text: string, start: number): string[] {
    const candidates: string[] = [];
    const balancedEnd = findBalancedEnd(text, start);
    if (balancedEnd !== -1) {
        candidates.push(text.slice(start, balancedEnd + 1));
    }

    const closer = text[start] === "{" ? "}" : "]";
    const greedyEnd = text.lastIndexOf(closer);
    if (greedyEnd > start && greedyEnd !== balancedEnd) {
        candidates.push(text.slice(start, greedyEnd + 1));
    }

    return candidates;
}

/** Index of the first `{` or `[` at or after `from`; -1 if there is none */
export function nextOpener(text: string, from: number): number {
    const offset = text.slice(from).search(/[[{]/);
    return offset === -1 ? -1 : from + offset;
}

/** Index of the bracket closing the one at `start`, honouring JSON strings; -1 if unbalanced */
function findBalancedEnd(text: string, start: number): number {
    const stack: string[] = [];
    let inString = false;

    for (let i = start; i < text.length; i++) {
        const char = text[i];

        if (inString) {
            if (char === "\\") {
                i += 1;
            } else if (char === '"') {
                inString = false;
            }
            continue;
        }

        if (char === '"') {
            inString = true;
        } else if (char === "{" || char === "[") {
            stack.push(char === "{" ? "}" : "]");
        } else if (char === "}" || char === "]") {
            if (stack.pop() !== char) {
                return -1;
            }
            if (stack.length === 0) {
                return i;
            }
        }
    }

    return -1;
}
