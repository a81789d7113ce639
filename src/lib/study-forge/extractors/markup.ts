/**
 * Shared markup-to-text conversion for HTML, DOCX (via mammoth's HTML) and
 * EPUB chapters. Block elements become line breaks; scripts, styles, images
 * and link targets are dropped.
 */

import { convert, type HtmlToTextOptions } from "html-to-text";

const HEADING_SELECTORS = ["h1", "h2", "h3", "h4", "h5", "h6"].map((selector) => ({
    selector,
    options: { uppercase: false },
}));

const MARKUP_OPTIONS: HtmlToTextOptions = {
    wordwrap: false,
    selectors: [
        { selector: "script", format: "skip" },
        { selector: "style", format: "skip" },
        { selector: "noscript", format: "skip" },
        { selector: "svg", format: "skip" },
        { selector: "img", format: "skip" },
        { selector: "a", options: { ignoreHref: true } },
        ...HEADING_SELECTORS,
    ],
};

export function markupToText(html: string): string {
    return convert(html, MARKUP_OPTIONS);
}

const XML_ENTITIES: Record<string, string> = {
    amp: "&",
    lt: "<",
    gt: ">",
    quot: '"',
    apos: "'",
};

/** Decode the predefined XML entities and numeric character references */
export function decodeXmlEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
        if (!body.startsWith("#")) {
            return XML_ENTITIES[body.toLowerCase()] ?? entity;
        }
        const hex = body[1] === "x" || body[1] === "X";
        const codePoint = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10);
        return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
    });
}
