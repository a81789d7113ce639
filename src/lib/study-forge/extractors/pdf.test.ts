import { describe, expect, it } from "vitest";
import { normalizeText } from "../normalize";
import { PdfExtractor, joinTextItems } from "./pdf";

/** Assemble a minimal PDF with one Helvetica content stream per page */
function buildPdf(pageStreams: string[]): Buffer {
    const fontId = 3 + pageStreams.length * 2;
    const pageIds = pageStreams.map((_, index) => 3 + index * 2);

    const objects: string[] = [
        "<< /Type /Catalog /Pages 2 0 R >>",
        `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pageIds.length} >>`,
    ];
    for (const [index, stream] of pageStreams.entries()) {
        const pageId = 3 + index * 2;
        objects.push(
            `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${pageId + 1} 0 R >>`
        );
        objects.push(`<< /Length ${Buffer.byteLength(stream)} >>\nstream\n${stream}\nendstream`);
    }
    objects.push("<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>");

    let pdf = "%PDF-1.4\n";
    const offsets: number[] = [];
    objects.forEach((body, index) => {
        offsets.push(Buffer.byteLength(pdf));
        pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
    });

    const xrefOffset = Buffer.byteLength(pdf);
    pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
    for (const offset of offsets) {
        pdf += `${String(offset).padStart(10, "0")} 00000 n \n`;
    }
    pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
    return Buffer.from(pdf, "latin1");
}

describe("joinTextItems", () => {
    it("starts a new line whenever the baseline moves", () => {
        const text = joinTextItems([
            { str: "Cell ", transform: [12, 0, 0, 12, 72, 720] },
            { str: "biology", transform: [12, 0, 0, 12, 100, 720] },
            { str: "Membranes", transform: [12, 0, 0, 12, 72, 704] },
            { str: "3", transform: [10, 0, 0, 10, 300, 40] },
        ]);

        expect(text).toBe("Cell biology\nMembranes\n3");
    });

    it("returns an empty string for a page without text", () => {
        expect(joinTextItems([])).toBe("");
    });
});

describe("PdfExtractor", () => {
    const pdf = buildPdf([
        "BT /F1 12 Tf 72 720 Td (Photosynthesis basics) Tj 0 -16 Td (Light reactions) Tj ET\nBT /F1 10 Tf 300 40 Td (1) Tj ET",
        "BT /F1 12 Tf 72 720 Td (Calvin cycle) Tj ET\nBT /F1 10 Tf 300 40 Td (2) Tj ET",
    ]);

    it("keeps lines within a page and separates pages with a blank line", async () => {
        const text = await new PdfExtractor().extract(pdf);

        expect(text).toBe("Photosynthesis basics\nLight reactions\n1\n\nCalvin cycle\n2");
    });

    it("leaves page-number footers on their own lines for the normalizer", async () => {
        const text = normalizeText(await new PdfExtractor().extract(pdf));

        expect(text).toBe("Photosynthesis basics\nLight reactions\n\nCalvin cycle");
    });
});
