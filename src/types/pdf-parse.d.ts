// pdf-parse ships no types. Its index runs a debug self-test when it is not
// required by another CommonJS module, so the code loads the implementation file.
declare module "pdf-parse/lib/pdf-parse.js" {
    export interface PDFParseOptions {
        pagerender?: (pageData: unknown) => Promise<string> | string;
        max?: number;
    }

    export interface PDFParseResult {
        numpages: number;
        numrender: number;
        info: Record<string, unknown>;
        metadata: unknown;
        text: string;
        version: string;
    }

    export default function pdfParse(
        dataBuffer: Buffer | Uint8Array,
        options?: PDFParseOptions
    ): Promise<PDFParseResult>;
}
