/**
 * Study Forge — Format Detector
 *
 * Classifies a document from its declared name and leading bytes. Content
 * signatures win over the extension; the extension breaks ties between formats
 * sharing one container signature. Never throws.
 */

import type { DetectionResult, FormatTag } from "./types";

const EXTENSION_MAP: Record<string, FormatTag> = {
    ".pdf": "pdf",
    ".docx": "word-document",
    ".doc": "word-document",
    ".pptx": "presentation",
    ".ppt": "presentation",
    ".xlsx": "spreadsheet-modern",
    ".xls": "spreadsheet-legacy",
    ".txt": "plain-text",
    ".text": "plain-text",
    ".md": "markdown",
    ".markdown": "markdown",
    ".html": "html",
    ".htm": "html",
    ".epub": "ebook",
    ".rtf": "rich-text",
};

/** Bytes inspected for inner ZIP paths and HTML markers */
const SNIFF_WINDOW = 1000;

const PDF_MAGIC = Buffer.from("%PDF", "latin1");
const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);
const RTF_MAGIC = Buffer.from("{\\rtf", "latin1");

/** Inner path fragments of ZIP-based formats, checked in order */
const ZIP_MARKERS: Array<[fragment: string, format: FormatTag]> = [
    ["word/", "word-document"],
    ["ppt/", "presentation"],
    ["xl/", "spreadsheet-modern"],
    ["application/epub+zip", "ebook"],
];

const ZIP_FAMILY: ReadonlySet<FormatTag> = new Set<FormatTag>([
    "word-document",
    "presentation",
    "spreadsheet-modern",
    "ebook",
]);

const HTML_MARKERS = ["<html", "<!doctype html"];

export class FormatDetector {
    detect(declaredName: string, bytes: Buffer): FormatTag {
        return this.detectWithEvidence(declaredName, bytes).format;
    }

    detectWithEvidence(declaredName: string, bytes: Buffer): DetectionResult {
        const byExtension = EXTENSION_MAP[this.getExtension(declaredName)];

        const sniffed = this.sniff(bytes, byExtension);
        if (sniffed) {
            return sniffed;
        }

        if (byExtension) {
            return { format: byExtension, source: "extension", ambiguous: false };
        }

        return { format: "plain-text", source: "default", ambiguous: false };
    }

    /** All extensions with a table entry */
    getSupportedExtensions(): string[] {
        return Object.keys(EXTENSION_MAP);
    }

    private sniff(bytes: Buffer, byExtension: FormatTag | undefined): DetectionResult | null {
        if (startsWith(bytes, PDF_MAGIC)) {
            return signature("pdf");
        }

        if (startsWith(bytes, ZIP_MAGIC)) {
            const window = bytes.subarray(0, SNIFF_WINDOW).toString("latin1");
            for (const [fragment, format] of ZIP_MARKERS) {
                if (window.includes(fragment)) {
                    return signature(format);
                }
            }
            // Envelope recognised, inner layout not: only a ZIP-family extension can say more
            if (byExtension && ZIP_FAMILY.has(byExtension)) {
                return { format: byExtension, source: "extension", ambiguous: false };
            }
            return null;
        }

        if (startsWith(bytes, OLE_MAGIC)) {
            return this.resolveCompoundDocument(byExtension);
        }

        if (startsWith(bytes, RTF_MAGIC)) {
            return signature("rich-text");
        }

        const head = bytes.subarray(0, SNIFF_WINDOW).toString("latin1").toLowerCase();
        if (HTML_MARKERS.some((marker) => head.includes(marker)) && byExtension !== "markdown") {
            return signature("html");
        }

        return null;
    }

    /**
     * The compound-document signature is shared by legacy Word, PowerPoint and
     * Excel files. The extension decides; anything else defaults to the legacy
     * spreadsheet and is flagged as ambiguous.
     */
    private resolveCompoundDocument(byExtension: FormatTag | undefined): DetectionResult {
        switch (byExtension) {
            case "word-document":
            case "presentation":
            case "spreadsheet-legacy":
                return { format: byExtension, source: "signature", ambiguous: false };
            case "spreadsheet-modern":
                return { format: "spreadsheet-legacy", source: "signature", ambiguous: false };
            default:
                return { format: "spreadsheet-legacy", source: "signature", ambiguous: true };
        }
    }

    private getExtension(filename: string): string {
        const match = filename.trim().match(/\.[^./\\]+$/);
        return match ? match[0].toLowerCase() : "";
    }
}

function signature(format: FormatTag): DetectionResult {
    return { format, source: "signature", ambiguous: false };
}

function startsWith(bytes: Buffer, magic: Buffer): boolean {
    return bytes.length >= magic.length && bytes.subarray(0, magic.length).equals(magic);
}
