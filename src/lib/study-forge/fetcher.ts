/**
 * URL Fetcher - downloads document bytes for acquisition
 */

import type { DocumentFetcher } from "./types";

const DEFAULT_USER_AGENT = "Mozilla/5.0 StudyForge/1.0";

/** Default fetcher on the global `fetch`; redirects are followed */
export function createHttpFetcher(userAgent = DEFAULT_USER_AGENT): DocumentFetcher {
    return async (uri, { signal }) => {
        const response = await fetch(uri, {
            signal,
            headers: { "User-Agent": userAgent },
            redirect: "follow",
        });

        if (!response.ok) {
            // Release the connection; the coordinator only needs the status
            await response.body?.cancel();
            return { status: response.status, headers: response.headers, bytes: Buffer.alloc(0) };
        }

        return { status: response.status, headers: response.headers, bytes: Buffer.from(await response.arrayBuffer()) };
    };
}

/**
 * Resolve the document's name: content-disposition `filename*` then
 * `filename`, else the last URL path segment (percent-decoded), else `fallback`.
 */
export function resolveDeclaredName(uri: string, headers: Headers, fallback = "document"): string {
    const disposition = headers.get("content-disposition");
    if (disposition) {
        const extended = disposition.match(/filename\*\s*=\s*(?:[\w-]+)?'[^']*'([^;]+)/i);
        if (extended?.[1]) {
            const decoded = safeDecode(extended[1].trim().replace(/^"|"$/g, ""));
            if (decoded) {
                return decoded;
            }
        }

        const plain = disposition.match(/filename\s*=\s*("([^"]*)"|[^;]+)/i);
        const name = (plain?.[2] ?? plain?.[1])?.trim().replace(/^['"]|['"]$/g, "");
        if (name) {
            return name;
        }
    }

    try {
        const segments = new URL(uri).pathname.split("/").filter(Boolean);
        const last = segments[segments.length - 1];
        if (last) {
            return safeDecode(last) || fallback;
        }
    } catch {
        // Not a parseable URL: use the fallback
    }

    return fallback;
}

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}
