import { describe, expect, it } from "vitest";
import { FormatDetector } from "./detect";

const detector = new FormatDetector();

const OLE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1, 0, 0, 0, 0]);

function zipWith(innerPath: string): Buffer {
    return Buffer.concat([Buffer.from([0x50, 0x4b, 0x03, 0x04]), Buffer.alloc(26), Buffer.from(innerPath, "latin1")]);
}

describe("FormatDetector", () => {
    it("detects a PDF from its signature whatever the extension", () => {
        expect(detector.detect("report.unknown", Buffer.from("%PDF-1.4 rest of file"))).toBe("pdf");
    });

    it("reads the inner path of a ZIP envelope", () => {
        expect(detector.detect("archive.zip", zipWith("word/document.xml"))).toBe("word-document");
        expect(detector.detect("", zipWith("ppt/slides/slide1.xml"))).toBe("presentation");
        expect(detector.detect("data.bin", zipWith("xl/workbook.xml"))).toBe("spreadsheet-modern");
        expect(detector.detect("book", zipWith("mimetypeapplication/epub+zip"))).toBe("ebook");
    });

    it("corrects a lying extension from the signature", () => {
        const result = detector.detectWithEvidence("slides.pptx", zipWith("word/document.xml"));
        expect(result).toEqual({ format: "word-document", source: "signature", ambiguous: false });
    });

    it("falls back to a ZIP-family extension when the inner layout is unknown", () => {
        expect(detector.detectWithEvidence("deck.pptx", zipWith("content.bin"))).toEqual({
            format: "presentation",
            source: "extension",
            ambiguous: false,
        });
        expect(detector.detect("notes.txt", zipWith("content.bin"))).toBe("plain-text");
        expect(detector.detect("archive.zip", zipWith("content.bin"))).toBe("plain-text");
    });

    it("tie-breaks the compound document signature by extension", () => {
        expect(detector.detect("old.doc", OLE)).toBe("word-document");
        expect(detector.detect("old.ppt", OLE)).toBe("presentation");
        expect(detector.detect("old.xls", OLE)).toBe("spreadsheet-legacy");
        expect(detector.detect("misnamed.xlsx", OLE)).toBe("spreadsheet-legacy");
    });

    it("flags the compound document default as ambiguous", () => {
        expect(detector.detectWithEvidence("download", OLE)).toEqual({
            format: "spreadsheet-legacy",
            source: "signature",
            ambiguous: true,
        });
    });

    it("detects RTF and HTML markers", () => {
        expect(detector.detect("letter", Buffer.from("{\\rtf1\\ansi hello}"))).toBe("rich-text");
        expect(detector.detect("page.txt", Buffer.from("<!DOCTYPE html><html><body>x</body></html>"))).toBe("html");
        expect(detector.detect("page", Buffer.from("  <HTML lang=\"en\">"))).toBe("html");
    });

    it("keeps markdown that embeds HTML", () => {
        expect(detector.detect("README.md", Buffer.from("# Title\n<html>inline</html>"))).toBe("markdown");
    });

    it("uses the extension table, case-insensitively", () => {
        expect(detector.detect("NOTES.MARKDOWN", Buffer.from("plain"))).toBe("markdown");
        expect(detector.detect("index.htm", Buffer.from("no markers"))).toBe("html");
        expect(detector.detect("book.epub", Buffer.from("x"))).toBe("ebook");
        expect(detector.detect("letter.rtf", Buffer.from("x"))).toBe("rich-text");
    });

    it("defaults to plain text and never throws", () => {
        expect(detector.detectWithEvidence("", Buffer.alloc(0))).toEqual({
            format: "plain-text",
            source: "default",
            ambiguous: false,
        });
        expect(detector.detect("weird.name.", Buffer.from([0xff, 0x00, 0x50]))).toBe("plain-text");
        expect(detector.detect("x.constructor", Buffer.from("hi"))).toBe("plain-text");
    });

    it("lists the supported extensions", () => {
        expect(detector.getSupportedExtensions()).toContain(".xlsx");
        expect(detector.getSupportedExtensions()).toHaveLength(15);
    });
});
