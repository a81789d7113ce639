import { describe, expect, it } from "vitest";
import { decodeText, type CandidateDecoder } from "./encoding";

describe("decodeText", () => {
    it("decodes UTF-8 and drops its byte-order mark", () => {
        const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("Café", "utf8")]);
        expect(decodeText(bytes)).toEqual({ text: "Café", encoding: "utf-8", lossy: false });
    });

    it("decodes UTF-16 only when a byte-order mark is present", () => {
        const le = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from("hi", "utf16le")]);
        expect(decodeText(le)).toEqual({ text: "hi", encoding: "utf-16", lossy: false });

        const be = Buffer.from([0xfe, 0xff, 0x00, 0x68, 0x00, 0x69]);
        expect(decodeText(be).text).toBe("hi");
    });

    it("falls back to Windows-1252 for legacy single-byte text", () => {
        const bytes = Buffer.from([0x43, 0x61, 0x66, 0xe9, 0x20, 0x93, 0x71, 0x94]);
        expect(decodeText(bytes)).toEqual({ text: "Café “q”", encoding: "windows-1252", lossy: false });
    });

    it("drops undecodable sequences as a last resort", () => {
        const bytes = Buffer.from([0x48, 0x69, 0x81, 0xff]);
        expect(decodeText(bytes)).toEqual({ text: "Hi", encoding: "utf-8", lossy: true });
    });

    it("tries candidates in order and stops at the first success", () => {
        const calls: string[] = [];
        const reject: CandidateDecoder = {
            encoding: "never",
            decode: () => {
                calls.push("never");
                return null;
            },
        };
        const accept: CandidateDecoder = {
            encoding: "always",
            decode: () => {
                calls.push("always");
                return "decoded";
            },
        };
        const unused: CandidateDecoder = {
            encoding: "unused",
            decode: () => {
                calls.push("unused");
                return "other";
            },
        };

        expect(decodeText(Buffer.from("x"), [reject, accept, unused]).encoding).toBe("always");
        expect(calls).toEqual(["never", "always"]);
    });
});
