import type { DocumentSource, PlainTextReader } from "./types";

// Text-only fallback reader: no geometry, one string per page.
export async function createPdfParseTextReader(): Promise<PlainTextReader> {
  const { PDFParse } = await import("pdf-parse");

  return {
    name: "pdf-parse",
    async readPages(doc: DocumentSource): Promise<Array<string | null>> {
      const parser = new PDFParse({ data: new Uint8Array(doc.data) });
      try {
        const result = await parser.getText();
        const byNumber = new Map<number, string>();
        for (const page of result.pages) byNumber.set(page.num, page.text);
        const total = Math.max(result.total, result.pages.length);
        const pages: Array<string | null> = [];
        for (let num = 1; num <= total; num++) {
          pages.push(byNumber.get(num) ?? null);
        }
        return pages;
      } finally {
        await parser.destroy();
      }
    },
  };
}
