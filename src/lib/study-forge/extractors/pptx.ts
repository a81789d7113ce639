/**
 * Study Forge — PPTX Extractor
 *
 * Uses `jszip` to open .pptx archives and read each slide's XML. Every slide
 * is preceded by a `--- Slide N ---` marker; text paragraphs within a slide
 * go on separate lines.
 */

import JSZip from "jszip";
import type { Extractor } from "../types";
import { decodeXmlEntities } from "./markup";

const SLIDE_ENTRY = /^ppt\/slides\/slide(\d+)\.xml$/i;

export class PptxExtractor implements Extractor {
    readonly name = "PptxExtractor";

    async extract(bytes: Buffer): Promise<string> {
        const zip = await JSZip.loadAsync(bytes);

        // slide1.xml, slide2.xml, … sorted numerically rather than lexically
        const slideEntries = Object.keys(zip.files)
            .filter((name) => SLIDE_ENTRY.test(name))
            .sort((a, b) => slideNumber(a) - slideNumber(b));

        if (slideEntries.length === 0) {
            throw new Error("Archive contains no slides");
        }

        const slides: string[] = [];
        for (let i = 0; i < slideEntries.length; i++) {
            const xml = await zip.files[slideEntries[i]].async("text");
            const paragraphs = this.readParagraphs(xml);
            slides.push([`--- Slide ${i + 1} ---`, ...paragraphs].join("\n"));
        }

        return slides.join("\n\n");
    }

    /** Text runs (<a:t>) joined per paragraph (<a:p>) */
    private readParagraphs(xml: string): string[] {
        const paragraphs: string[] = [];
        const paragraphPattern = /<a:p[\s>][\s\S]*?<\/a:p>/g;
        const runPattern = /<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>/g;

        for (const paragraph of xml.match(paragraphPattern) ?? []) {
            const runs = Array.from(paragraph.matchAll(runPattern), (match) => decodeXmlEntities(match[1]));
            const text = runs.join("").trim();
            if (text.length > 0) {
                paragraphs.push(text);
            }
        }

        return paragraphs;
    }
}

function slideNumber(entry: string): number {
    return Number.parseInt(entry.match(SLIDE_ENTRY)?.[1] ?? "0", 10);
}
