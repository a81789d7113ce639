/**
 * Study Forge — PDF Extractor
 *
 * Uses `pdf-parse` with a per-page renderer so that page boundaries survive
 * as blank lines between page texts. Within a page, a change in the baseline
 * (`transform[5]`) starts a new line.
 */

import pdfParse from "pdf-parse/lib/pdf-parse.js";
import type { Extractor } from "../types";

type PdfJsTextItem = { str: string; transform: number[] };

interface PdfJsPage {
    getTextContent(): Promise<{ items: PdfJsTextItem[] }>;
}

function isPdfJsPage(value: unknown): value is PdfJsPage {
    return (
        typeof value === "object" &&
        value !== null &&
        typeof Reflect.get(value, "getTextContent") === "function"
    );
}

export function joinTextItems(items: readonly PdfJsTextItem[]): string {
    let text = "";
    let lastY: number | undefined;

    for (const item of items) {
        const y = item.transform[5];
        if (lastY !== undefined && y !== lastY) {
            text += "\n";
        }
        text += item.str;
        lastY = y;
    }

    return text.replace(/ *\n */g, "\n").trim();
}

export class PdfExtractor implements Extractor {
    readonly name = "PdfExtractor";

    async extract(bytes: Buffer): Promise<string> {
        const pageTexts: string[] = [];

        await pdfParse(bytes, {
            pagerender: async (pageData: unknown) => {
                if (!isPdfJsPage(pageData)) {
                    pageTexts.push("");
                    return "";
                }

                const textContent = await pageData.getTextContent();
                const text = joinTextItems(textContent.items);

                pageTexts.push(text);
                return text;
            },
            max: 0,
        });

        return pageTexts.filter((text) => text.length > 0).join("\n\n");
    }
}
