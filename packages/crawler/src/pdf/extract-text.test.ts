import { describe, it, expect } from "vitest";
import { extractText } from "./extract-text.js";

/**
 * Smallest PDF pdfjs accepts: one page per entry, each showing its text in
 * Helvetica. Offsets in the xref table are byte offsets, so text stays ASCII.
 */
function buildPdf(pages: string[]): Uint8Array {
  const pageIds = pages.map((_, i) => 3 + i * 2);
  const fontId = 3 + pages.length * 2;
  const objects = new Map<number, string>([
    [1, "<< /Type /Catalog /Pages 2 0 R >>"],
    [2, `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(" ")}] /Count ${pages.length} >>`],
    [fontId, "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>"],
  ]);
  pages.forEach((text, i) => {
    const content = `BT /F1 12 Tf 72 720 Td (${text}) Tj ET`;
    objects.set(
      pageIds[i],
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents ${pageIds[i] + 1} 0 R /Resources << /Font << /F1 ${fontId} 0 R >> >> >>`
    );
    objects.set(pageIds[i] + 1, `<< /Length ${content.length} >>\nstream\n${content}\nendstream`);
  });

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  for (let id = 1; id <= fontId; id++) {
    offsets.push(pdf.length);
    pdf += `${id} 0 obj\n${objects.get(id) ?? ""}\nendobj\n`;
  }
  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${fontId + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  pdf += `trailer\n<< /Size ${fontId + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return new TextEncoder().encode(pdf);
}

function tokens(text: string): string[] {
  return text.split(/\s+/).filter((token) => token.length > 0);
}

describe("extractText", () => {
  it("should return the text of a page as a token stream", async () => {
    const text = await extractText(buildPdf(["Period 3 Manader 20251031 2,61"]));
    expect(tokens(text)).toEqual(["Period", "3", "Manader", "20251031", "2,61"]);
  });

  it("should put each page on its own line", async () => {
    const text = await extractText(buildPdf(["Bindningstid 3 man", "oktober 2025 2,61"]));
    expect(text.split("\n").map((line) => tokens(line))).toEqual([
      ["Bindningstid", "3", "man"],
      ["oktober", "2025", "2,61"],
    ]);
  });

  it("should reject bytes that are not a PDF", async () => {
    await expect(extractText(new TextEncoder().encode("not a pdf"))).rejects.toThrow();
  });
});
