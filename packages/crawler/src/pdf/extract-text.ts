/**
 * Extracts the text stream of a PDF with pdfjs-dist.
 *
 * Items of a page are joined with spaces and pages with newlines. Layout is
 * not reconstructed; the rate parser works on the token stream.
 */
export async function extractText(pdfBytes: Uint8Array): Promise<string> {
  // legacy build: the modern one needs runtime features newer than Node 20
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const pdf = await pdfjs.getDocument({ data: pdfBytes, isEvalSupported: false }).promise;

  try {
    const pages: string[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const text = content.items.map((item) => ("str" in item ? item.str : "")).join(" ");
      pages.push(text);
    }
    return pages.join("\n");
  } finally {
    await pdf.destroy();
  }
}
