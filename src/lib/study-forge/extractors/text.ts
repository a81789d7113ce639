/**
 * Study Forge — Plain Text / Markdown / HTML Extractors
 *
 * Text families decode through the encoding chain and never fail on encoding
 * alone. HTML is decoded the same way before its markup is stripped.
 */

import { decodeText } from "../encoding";
import type { Extractor } from "../types";
import { markupToText } from "./markup";

export class TextExtractor implements Extractor {
    readonly name = "TextExtractor";

    async extract(bytes: Buffer): Promise<string> {
        return decodeText(bytes).text;
    }
}

export class HtmlExtractor implements Extractor {
    readonly name = "HtmlExtractor";

    async extract(bytes: Buffer): Promise<string> {
        return markupToText(decodeText(bytes).text);
    }
}
