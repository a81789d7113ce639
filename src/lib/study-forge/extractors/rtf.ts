/**
 * Study Forge — RTF Extractor
 *
 * Decodes the bytes through the encoding chain, then walks the RTF token
 * stream: destination groups (tables, metadata, pictures) are dropped,
 * paragraph and tab controls become whitespace, and escaped characters are
 * resolved.
 */

import { decodeText } from "../encoding";
import type { Extractor } from "../types";

const SKIPPED_DESTINATIONS = new Set([
    "fonttbl",
    "colortbl",
    "stylesheet",
    "listtable",
    "listoverridetable",
    "revtbl",
    "rsidtbl",
    "filetbl",
    "info",
    "pict",
    "object",
    "fldinst",
    "header",
    "headerl",
    "headerr",
    "headerf",
    "footer",
    "footerl",
    "footerr",
    "footerf",
    "generator",
    "xmlnstbl",
    "themedata",
    "colorschememapping",
    "datastore",
    "latentstyles",
    "pgdsctbl",
]);

const CONTROL_TEXT = new Map<string, string>(Object.entries({
    par: "\n",
    line: "\n",
    sect: "\n\n",
    page: "\n\n",
    row: "\n",
    tab: "\t",
    cell: "\t",
    emdash: "—",
    endash: "–",
    bullet: "•",
    lquote: "‘",
    rquote: "’",
    ldblquote: "“",
    rdblquote: "”",
}));

interface GroupState {
    skip: boolean;
    /** Fallback characters following a \uN escape */
    uc: number;
}

const cp1252 = new TextDecoder("windows-1252");

export function rtfToText(rtf: string): string {
    const out: string[] = [];
    const stack: GroupState[] = [];
    let state: GroupState = { skip: false, uc: 1 };
    let pendingSkip = 0;
    let i = 0;

    const emit = (text: string) => {
        if (pendingSkip > 0) {
            pendingSkip -= 1;
            return;
        }
        if (!state.skip) {
            out.push(text);
        }
    };

    while (i < rtf.length) {
        const char = rtf[i];

        if (char === "{") {
            stack.push(state);
            state = { ...state };
            pendingSkip = 0;
            i += 1;
            continue;
        }

        if (char === "}") {
            state = stack.pop() ?? { skip: false, uc: 1 };
            pendingSkip = 0;
            i += 1;
            continue;
        }

        if (char === "\r" || char === "\n") {
            i += 1;
            continue;
        }

        if (char !== "\\") {
            emit(char);
            i += 1;
            continue;
        }

        const next = rtf[i + 1];
        if (next === undefined) {
            break;
        }

        if (next === "\\" || next === "{" || next === "}") {
            emit(next);
            i += 2;
            continue;
        }

        if (next === "'") {
            const hex = rtf.slice(i + 2, i + 4);
            const byte = Number.parseInt(hex, 16);
            if (!Number.isNaN(byte)) {
                emit(cp1252.decode(Uint8Array.of(byte)));
            }
            i += 4;
            continue;
        }

        if (next === "*") {
            state.skip = true;
            i += 2;
            continue;
        }

        if (next === "~") {
            emit(" ");
            i += 2;
            continue;
        }

        if (next === "_") {
            emit("-");
            i += 2;
            continue;
        }

        if (next === "\r" || next === "\n") {
            emit("\n");
            i += 2;
            continue;
        }

        const control = /^([a-zA-Z]+)(-?\d+)? ?/.exec(rtf.slice(i + 1, i + 48));
        if (!control) {
            // Other control symbols (\-, \|, \:) carry no text
            i += 2;
            continue;
        }

        i += 1 + control[0].length;
        const word = control[1];
        const param = control[2] === undefined ? undefined : Number.parseInt(control[2], 10);

        if (SKIPPED_DESTINATIONS.has(word)) {
            state.skip = true;
        } else if (word === "uc" && param !== undefined) {
            state.uc = param;
        } else if (word === "u" && param !== undefined) {
            emit(String.fromCharCode(param < 0 ? param + 65536 : param));
            pendingSkip = state.uc;
        } else {
            const mapped = CONTROL_TEXT.get(word);
            if (mapped !== undefined) {
                emit(mapped);
            }
        }
    }

    return out.join("");
}

export class RtfExtractor implements Extractor {
    readonly name = "RtfExtractor";

    async extract(bytes: Buffer): Promise<string> {
        return rtfToText(decodeText(bytes).text);
    }
}
