/**
 * Study Forge — EPUB Extractor
 *
 * Resolves the package document through META-INF/container.xml, then reads
 * every XHTML/HTML item: spine order first, remaining document items in
 * manifest order. Images, stylesheets and fonts are skipped.
 */

import { XMLParser } from "fast-xml-parser";
import JSZip from "jszip";
import type { Extractor } from "../types";
import { markupToText } from "./markup";

const DOCUMENT_MEDIA_TYPES = new Set(["application/xhtml+xml", "text/html"]);

interface ManifestItem {
    id: string;
    href: string;
    mediaType: string;
}

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "",
    removeNSPrefix: true,
});

export class EpubExtractor implements Extractor {
    readonly name = "EpubExtractor";

    async extract(bytes: Buffer): Promise<string> {
        const zip = await JSZip.loadAsync(bytes);

        const containerFile = zip.file("META-INF/container.xml");
        if (!containerFile) {
            throw new Error("Invalid EPUB: missing META-INF/container.xml");
        }
        const container: unknown = parser.parse(await containerFile.async("string"));
        const rootPath = readString(first(dig(container, ["container", "rootfiles", "rootfile"])), "full-path");
        const packageFile = rootPath ? zip.file(rootPath) : null;
        if (!rootPath || !packageFile) {
            throw new Error("Invalid EPUB: missing package document");
        }

        const opf: unknown = parser.parse(await packageFile.async("string"));
        const manifest = toArray(dig(opf, ["package", "manifest", "item"]))
            .map(toManifestItem)
            .filter((item): item is ManifestItem => item !== null);
        const spine = toArray(dig(opf, ["package", "spine", "itemref"]))
            .map((ref) => readString(ref, "idref"))
            .filter((idref): idref is string => idref !== undefined);

        const documents = manifest.filter((item) => DOCUMENT_MEDIA_TYPES.has(item.mediaType));
        const byId = new Map(documents.map((item) => [item.id, item]));
        const ordered: ManifestItem[] = [];
        for (const idref of spine) {
            const item = byId.get(idref);
            if (item) {
                ordered.push(item);
                byId.delete(idref);
            }
        }
        ordered.push(...byId.values());

        const baseDir = rootPath.includes("/") ? rootPath.slice(0, rootPath.lastIndexOf("/") + 1) : "";
        const texts: string[] = [];
        for (const item of ordered) {
            const file = zip.file(resolveHref(baseDir, item.href));
            if (!file) {
                continue;
            }
            const text = markupToText(await file.async("string")).trim();
            if (text.length > 0) {
                texts.push(text);
            }
        }

        return texts.join("\n\n");
    }
}

function resolveHref(baseDir: string, href: string): string {
    const segments: string[] = [];
    for (const segment of `${baseDir}${safeDecode(href.split("#")[0])}`.split("/")) {
        if (segment === "..") {
            segments.pop();
        } else if (segment !== "." && segment !== "") {
            segments.push(segment);
        }
    }
    return segments.join("/");
}

function safeDecode(href: string): string {
    try {
        return decodeURIComponent(href);
    } catch {
        return href;
    }
}

function toManifestItem(value: unknown): ManifestItem | null {
    const id = readString(value, "id");
    const href = readString(value, "href");
    const mediaType = readString(value, "media-type");
    return id && href && mediaType ? { id, href, mediaType } : null;
}

function dig(value: unknown, path: string[]): unknown {
    let current = value;
    for (const key of path) {
        if (typeof current !== "object" || current === null) {
            return undefined;
        }
        current = Reflect.get(current, key);
    }
    return current;
}

function toArray(value: unknown): unknown[] {
    if (Array.isArray(value)) {
        return value;
    }
    return value === undefined || value === null ? [] : [value];
}

function first(value: unknown): unknown {
    return toArray(value)[0];
}

function readString(value: unknown, key: string): string | undefined {
    if (typeof value !== "object" || value === null) {
        return undefined;
    }
    const field: unknown = Reflect.get(value, key);
    return typeof field === "string" ? field : undefined;
}
