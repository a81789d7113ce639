import { describe, expect, it } from "vitest";
import { AcquisitionCoordinator, computeContentId } from "./acquire";
import { AcquisitionError, DocumentTooLargeError, ExtractionError, FetchError } from "./errors";
import type { DocumentFetcher, FetchResponse } from "./types";

function respond(body: string | Buffer, init: { status?: number; headers?: Record<string, string> } = {}): DocumentFetcher {
    return async () => ({
        status: init.status ?? 200,
        headers: new Headers(init.headers),
        bytes: typeof body === "string" ? Buffer.from(body, "utf8") : body,
    });
}

function coordinator(fetcher: DocumentFetcher, maxDocumentBytes = 1024): AcquisitionCoordinator {
    return new AcquisitionCoordinator({ timeoutMs: 1000, maxDocumentBytes, fetcher });
}

describe("computeContentId", () => {
    it("is the first twelve hex characters of the MD5 digest", () => {
        expect(computeContentId(Buffer.from("hello"))).toBe("5d41402abc4b");
        expect(computeContentId(Buffer.alloc(0))).toBe("d41d8cd98f00");
    });
});

describe("AcquisitionCoordinator", () => {
    it("fetches, detects, extracts and normalizes a document", async () => {
        const fetcher = respond("Line one\r\n\r\n\r\n  7  \r\nLine   two", {
            headers: { "content-disposition": 'attachment; filename="lecture.txt"' },
        });

        const document = await coordinator(fetcher).acquire("https://example.com/download");

        expect(document).toMatchObject({
            declaredName: "lecture.txt",
            origin: "https://example.com/download",
            format: "plain-text",
            size: 31,
            text: "Line one\n\nLine two",
        });
        expect(document.contentId).toHaveLength(12);
        expect(document.contentId).toBe(computeContentId(document.bytes));
    });

    it("trusts the signature over the name", async () => {
        const html = "<!doctype html><html><body><p>Hello there</p></body></html>";
        const document = await coordinator(respond(html)).acquire("https://example.com/page.txt");

        expect(document.format).toBe("html");
        expect(document.text).toBe("Hello there");
    });

    it("fails on a non-success status", async () => {
        const failure = coordinator(respond("gone", { status: 404 })).acquire("https://example.com/missing.pdf");

        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toMatchObject({ statusCode: 404, uri: "https://example.com/missing.pdf", message: "HTTP 404" });
    });

    it("wraps transport failures", async () => {
        const fetcher: DocumentFetcher = async () => {
            throw new Error("socket hang up");
        };
        await expect(coordinator(fetcher).acquire("https://example.com/a.pdf")).rejects.toMatchObject({
            name: "FetchError",
            message: "socket hang up",
        });
    });

    it("reports a timeout when the fetch is aborted", async () => {
        const fetcher: DocumentFetcher = (_uri, { signal }) =>
            new Promise<FetchResponse>((_resolve, reject) => {
                signal.addEventListener("abort", () => reject(signal.reason));
            });
        const slow = new AcquisitionCoordinator({ timeoutMs: 20, maxDocumentBytes: 1024, fetcher });

        await expect(slow.acquire("https://example.com/slow.pdf")).rejects.toThrow("Request timeout after 20ms");
    });

    it("enforces the size limit from the header and from the body", async () => {
        const declared = respond("small", { headers: { "content-length": "5000" } });
        await expect(coordinator(declared).acquire("https://example.com/a.txt")).rejects.toBeInstanceOf(
            DocumentTooLargeError
        );

        const oversized = respond(Buffer.alloc(2048, 0x61));
        await expect(coordinator(oversized).acquire("https://example.com/b.txt")).rejects.toMatchObject({
            size: 2048,
            maxSize: 1024,
        });
    });

    it("attributes extraction failures to the document", async () => {
        const failure = coordinator(respond("%PDF-1.7 broken")).acquire("https://example.com/broken.pdf");

        await expect(failure).rejects.toBeInstanceOf(ExtractionError);
        await expect(failure).rejects.toBeInstanceOf(AcquisitionError);
        await expect(failure).rejects.toMatchObject({ format: "pdf", uri: "https://example.com/broken.pdf" });
    });
});
