import { describe, expect, it } from "vitest";
import { RtfExtractor, rtfToText } from "./rtf";

describe("rtfToText", () => {
    it("drops destination groups and maps paragraph controls", () => {
        const rtf = String.raw`{\rtf1\ansi{\fonttbl\f0\fswiss Helvetica;}\f0\pard Hello {\b world}\par Caf\'e9 ok\par}`;
        expect(rtfToText(rtf)).toBe("Hello world\nCafé ok\n");
    });

    it("skips starred destinations and unicode fallbacks", () => {
        const rtf = String.raw`{\rtf1{\*\generator Writer;}\uc1 snow\u9731?man\tab end}`;
        expect(rtfToText(rtf)).toBe("snow☃man\tend");
    });

    it("keeps escaped braces and backslashes", () => {
        expect(rtfToText(String.raw`{\rtf1 a\{b\}c\\d}`)).toBe("a{b}c\\d");
    });
});

describe("RtfExtractor", () => {
    it("decodes bytes before walking the tokens", async () => {
        const bytes = Buffer.from(String.raw`{\rtf1\ansi Line one\line Line two}`, "latin1");
        expect(await new RtfExtractor().extract(bytes)).toBe("Line one\nLine two");
    });
});
