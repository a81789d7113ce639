/**
 * Study Forge — Spreadsheet Extractors
 *
 * Both workbook flavours produce the same layout: a `=== Sheet: <name> ===`
 * line per worksheet, then one tab-joined line per row. Rows that are blank
 * once joined are skipped and missing cells become empty strings.
 *
 * - `.xlsx` is read with `exceljs`
 * - legacy `.xls` (BIFF) is read with SheetJS (`xlsx`)
 */

import ExcelJS from "exceljs";
import * as XLSX from "xlsx";
import type { Extractor } from "../types";

export function formatSheet(name: string, rows: string[][]): string[] {
    const lines = [`=== Sheet: ${name} ===`];
    for (const row of rows) {
        const line = row.join("\t");
        if (line.trim().length > 0) {
            lines.push(line);
        }
    }
    return lines;
}

export class ExcelExtractor implements Extractor {
    readonly name = "ExcelExtractor";

    async extract(bytes: Buffer): Promise<string> {
        const workbook = new ExcelJS.Workbook();
        // ExcelJS wants an ArrayBuffer; copy out the Buffer's slice of its pool
        const arrayBuffer = new ArrayBuffer(bytes.byteLength);
        new Uint8Array(arrayBuffer).set(bytes);
        await workbook.xlsx.load(arrayBuffer);

        const lines: string[] = [];
        workbook.eachSheet((worksheet, sheetId) => {
            const rows: string[][] = [];
            worksheet.eachRow({ includeEmpty: true }, (row) => {
                const cells: string[] = [];
                for (let column = 1; column <= row.cellCount; column++) {
                    cells.push(cellToText(row.getCell(column).value));
                }
                rows.push(cells);
            });
            lines.push(...formatSheet(worksheet.name || `Sheet ${sheetId}`, rows));
        });

        return lines.join("\n");
    }
}

/** Convert an ExcelJS cell value to text, handling formula, rich text and hyperlink cells */
export function cellToText(value: ExcelJS.CellValue): string {
    if (value === null || value === undefined) {
        return "";
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (typeof value !== "object") {
        return String(value);
    }
    if ("richText" in value) {
        return value.richText.map((run) => run.text).join("");
    }
    if ("formula" in value || "sharedFormula" in value) {
        return cellToText(value.result);
    }
    if ("hyperlink" in value) {
        return value.text;
    }
    if ("error" in value) {
        return value.error;
    }
    return "";
}

export class LegacyExcelExtractor implements Extractor {
    readonly name = "LegacyExcelExtractor";

    async extract(bytes: Buffer): Promise<string> {
        const workbook = XLSX.read(bytes, { type: "buffer" });

        const lines: string[] = [];
        for (const sheetName of workbook.SheetNames) {
            const sheet = workbook.Sheets[sheetName];
            const rows = XLSX.utils
                .sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", blankrows: true, raw: false })
                .map((row) => row.map((cell) => (cell === null || cell === undefined ? "" : String(cell))));
            lines.push(...formatSheet(sheetName, rows));
        }

        return lines.join("\n");
    }
}
