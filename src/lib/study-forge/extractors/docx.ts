/**
 * Study Forge — DOCX Extractor
 *
 * Uses `mammoth` to convert DOCX files into semantic HTML, then strips the
 * markup so headings, paragraphs, list items and table rows end up on their
 * own lines.
 */

import mammoth from "mammoth";
import type { Extractor } from "../types";
import { markupToText } from "./markup";

const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0]);

export class DocxExtractor implements Extractor {
    readonly name = "DocxExtractor";

    async extract(bytes: Buffer): Promise<string> {
        if (bytes.subarray(0, OLE_MAGIC.length).equals(OLE_MAGIC)) {
            throw new Error("Legacy binary Word (.doc) documents are not supported");
        }

        const htmlResult = await mammoth.convertToHtml({ buffer: bytes });
        const text = markupToText(htmlResult.value);
        if (text.trim().length > 0) {
            return text;
        }

        // Fallback: documents whose body mammoth cannot map to HTML
        const textResult = await mammoth.extractRawText({ buffer: bytes });
        return textResult.value;
    }
}
