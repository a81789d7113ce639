/**
 * Study Forge — Extractor Router
 *
 * Maps every format tag to its extractor through an exhaustive switch, so a
 * new tag without an extractor is a compile error rather than a runtime gap.
 * Extractor failures come back as `ExtractionError`s carrying the tag; no
 * other extractor is tried.
 */

import { ExtractionError, describeError } from "./errors";
import { DocxExtractor } from "./extractors/docx";
import { EpubExtractor } from "./extractors/epub";
import { PdfExtractor } from "./extractors/pdf";
import { PptxExtractor } from "./extractors/pptx";
import { RtfExtractor } from "./extractors/rtf";
import { ExcelExtractor, LegacyExcelExtractor } from "./extractors/spreadsheet";
import { HtmlExtractor, TextExtractor } from "./extractors/text";
import type { ExtractedText, Extractor, FormatTag } from "./types";

export class ExtractorRouter {
    private readonly pdf = new PdfExtractor();
    private readonly docx = new DocxExtractor();
    private readonly pptx = new PptxExtractor();
    private readonly excel = new ExcelExtractor();
    private readonly legacyExcel = new LegacyExcelExtractor();
    private readonly text = new TextExtractor();
    private readonly html = new HtmlExtractor();
    private readonly epub = new EpubExtractor();
    private readonly rtf = new RtfExtractor();

    route(format: FormatTag): Extractor {
        switch (format) {
            case "pdf":
                return this.pdf;
            case "word-document":
                return this.docx;
            case "presentation":
                return this.pptx;
            case "spreadsheet-modern":
                return this.excel;
            case "spreadsheet-legacy":
                return this.legacyExcel;
            case "plain-text":
            case "markdown":
            case "unknown":
                return this.text;
            case "html":
                return this.html;
            case "ebook":
                return this.epub;
            case "rich-text":
                return this.rtf;
            default:
                return assertNever(format);
        }
    }

    /**
     * Run the extractor for `format` over the bytes.
     * @throws ExtractionError when the content is structurally unreadable
     */
    async extract(bytes: Buffer, format: FormatTag): Promise<ExtractedText> {
        const extractor = this.route(format);
        try {
            const raw = await extractor.extract(bytes);
            return { raw, format };
        } catch (error) {
            throw new ExtractionError(format, `${extractor.name} failed: ${describeError(error)}`, {
                cause: error,
            });
        }
    }
}

function assertNever(format: never): never {
    throw new Error(`No extractor for format: ${String(format)}`);
}
