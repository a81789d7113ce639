import { describe, expect, it } from "vitest";
import { decodeXmlEntities } from "./markup";
import { HtmlExtractor, TextExtractor } from "./text";

describe("TextExtractor", () => {
    it("returns decoded text untouched", async () => {
        const text = await new TextExtractor().extract(Buffer.from("# Notes\r\n\r\n- item", "utf8"));
        expect(text).toBe("# Notes\r\n\r\n- item");
    });
});

describe("HtmlExtractor", () => {
    it("strips markup, scripts and link targets", async () => {
        const html = [
            "<html><head><title>Ignored</title><style>p { color: red; }</style></head>",
            "<body><script>track()</script><h1>Heading</h1>",
            '<p>Para <a href="https://example.com">link</a></p></body></html>',
        ].join("");

        expect(await new HtmlExtractor().extract(Buffer.from(html))).toBe("Heading\n\nPara link");
    });
});

describe("decodeXmlEntities", () => {
    it("decodes named and numeric references", () => {
        expect(decodeXmlEntities("a &amp; b &lt;c&gt; &#233;&#x41; &quot;q&apos;")).toBe("a & b <c> éA \"q'");
    });

    it("leaves unknown or out-of-range references alone", () => {
        expect(decodeXmlEntities("&nbsp; &#x110000;")).toBe("&nbsp; &#x110000;");
    });
});
