import { describe, expect, it } from "vitest";
import { countWords, normalizeText } from "./normalize";

const SAMPLES = [
    "",
    "   ",
    "Page 1\n\n   42   \n\nPage 2",
    "a\r\nb\rc\n\n\n\nd",
    "  lead\t\ttabs  and   spaces  ",
    "x\n \t \n \n y",
    "1\n2\n3",
    "Title\n\n\n7\n\n\nBody text\fhere",
    "zero\u200Bwidth\u0000null\uFEFF",
    "trailing \n\n12\n",
    "\r\n\r\n\r\nonly\r\n\r\n\r\n",
];

describe("normalizeText", () => {
    it("drops page-number lines between paragraphs", () => {
        expect(normalizeText("Page 1\n\n   42   \n\nPage 2")).toBe("Page 1\n\nPage 2");
    });

    it("canonicalises line endings before collapsing blank lines", () => {
        expect(normalizeText("a\r\nb\rc\n\n\n\nd")).toBe("a\nb\nc\n\nd");
    });

    it("collapses horizontal whitespace and trims lines", () => {
        expect(normalizeText("  lead\t\ttabs  and   spaces  ")).toBe("lead tabs and spaces");
        expect(normalizeText("one  two\fthree")).toBe("one two three");
    });

    it("removes NUL and zero-width characters", () => {
        expect(normalizeText("zero\u200Bwidth\u0000null\uFEFF")).toBe("zerowidthnull");
    });

    it("returns an empty string for whitespace and numbers only", () => {
        expect(normalizeText("   ")).toBe("");
        expect(normalizeText("1\n2\n3")).toBe("");
    });

    it("holds its post-conditions for every sample", () => {
        for (const sample of SAMPLES) {
            const normalized = normalizeText(sample);
            expect(normalized).not.toMatch(/\n{3,}/);
            expect(normalized).not.toMatch(/[^\S\n]{2,}/);
            expect(normalized).not.toContain("\r");
            expect(normalized).toBe(normalized.trim());
        }
    });

    it("is idempotent", () => {
        for (const sample of SAMPLES) {
            const once = normalizeText(sample);
            expect(normalizeText(once)).toBe(once);
        }
    });
});

describe("countWords", () => {
    it("counts whitespace-separated tokens", () => {
        expect(countWords("")).toBe(0);
        expect(countWords("  one two\nthree\t four ")).toBe(4);
    });
});
