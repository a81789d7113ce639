/**
 * Study Forge — Normalization
 *
 * Canonicalizes extracted text so that downstream prompts see the same shape
 * regardless of source format:
 * 1. Line endings become `\n` (CRLF and lone CR)
 * 2. Runs of blank lines collapse to one blank line
 * 3. Horizontal whitespace runs collapse to a single space
 * 4. Lines holding only a bare integer (page numbers) are removed, the rest trimmed
 * 5. Leading / trailing whitespace is trimmed
 *
 * The result is a fixed point: normalizing it again changes nothing.
 */

const PAGE_NUMBER_LINE = /^\s*\d+\s*$/;

export function normalizeText(raw: string): string {
    const text = raw
        // Remove null bytes and zero-width characters
        .replace(/[\x00\u200B\u200C\u200D\uFEFF]/g, "")
        .replace(/\r\n?/g, "\n")
        .replace(/\n\s*\n/g, "\n\n")
        // Any whitespace except the newline (tabs, form-feeds, NBSP, …)
        .replace(/[^\S\n]+/g, " ");

    return dropPageNumberLines(text).trim();
}

function dropPageNumberLines(text: string): string {
    return text
        .split("\n")
        .filter((line) => !PAGE_NUMBER_LINE.test(line))
        .map((line) => line.trim())
        .join("\n")
        .replace(/\n{3,}/g, "\n\n");
}

export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}
