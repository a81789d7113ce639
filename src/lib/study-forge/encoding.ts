/**
 * Study Forge — Text Decoding
 *
 * Ordered decoder chain for byte streams of unknown encoding. The first
 * decoder that accepts the bytes wins; when none does, a lossy UTF-8 decode
 * that drops invalid sequences is used instead of failing.
 */

export interface CandidateDecoder {
    readonly encoding: string;
    /** Decoded text, or `null` when the bytes are not valid in this encoding */
    decode(bytes: Buffer): string | null;
}

export interface DecodedText {
    text: string;
    encoding: string;
    lossy: boolean;
}

/** Bytes with no mapping in Windows-1252 */
const CP1252_UNDEFINED = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

export const utf16Decoder: CandidateDecoder = {
    encoding: "utf-16",
    decode(bytes) {
        if (bytes.length < 2) {
            return null;
        }
        const label = bytes[0] === 0xff && bytes[1] === 0xfe
            ? "utf-16le"
            : bytes[0] === 0xfe && bytes[1] === 0xff
                ? "utf-16be"
                : null;
        if (!label) {
            return null;
        }
        try {
            return new TextDecoder(label, { fatal: true }).decode(bytes.subarray(2));
        } catch {
            return null;
        }
    },
};

export const utf8Decoder: CandidateDecoder = {
    encoding: "utf-8",
    decode(bytes) {
        try {
            // ignoreBOM: false strips a leading UTF-8 byte-order mark
            return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(bytes);
        } catch {
            return null;
        }
    },
};

export const windows1252Decoder: CandidateDecoder = {
    encoding: "windows-1252",
    decode(bytes) {
        for (const byte of bytes) {
            if (CP1252_UNDEFINED.has(byte)) {
                return null;
            }
        }
        return new TextDecoder("windows-1252").decode(bytes);
    },
};

export const DEFAULT_DECODERS: readonly CandidateDecoder[] = [
    utf16Decoder,
    utf8Decoder,
    windows1252Decoder,
];

export function decodeText(
    bytes: Buffer,
    decoders: readonly CandidateDecoder[] = DEFAULT_DECODERS
): DecodedText {
    for (const decoder of decoders) {
        const text = decoder.decode(bytes);
        if (text !== null) {
            return { text, encoding: decoder.encoding, lossy: false };
        }
    }

    const lossy = new TextDecoder("utf-8").decode(bytes).replace(/\uFFFD/g, "");
    return { text: lossy, encoding: "utf-8", lossy: true };
}
