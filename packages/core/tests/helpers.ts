import type { BBox, KnownEntityTable, PageRecord, TierName, Token } from "../src/types";
import type { DocumentSource, LayoutPage, LayoutTextReader } from "../src/ingest/types";

export const INVOICE_TEXT = [
  "Acme Corporation",
  "Invoice Number: INV-2024-001",
  "Invoice Date: 03/14/2024",
  "Total: $1,250.00",
].join("\n");

export function tok(text: string, bbox: BBox = [0, 0, 10, 10]): Token {
  return { text, bbox };
}

// One token per whitespace-separated word, all sharing a dummy box.
export function wordsOf(text: string): Token[] {
  return text.split(/\s+/).filter(Boolean).map((w) => tok(w));
}

export function page(index: number, text: string, opts: { confidence?: number; tier?: TierName; tokens?: Token[] } = {}): PageRecord {
  return {
    index,
    text,
    tokens: opts.tokens ?? [],
    confidence: opts.confidence ?? 0.9,
    tier: opts.tier ?? "direct",
  };
}

export function pdfDoc(path = "invoice.pdf"): DocumentSource {
  return { path, data: new Uint8Array([0x25, 0x50, 0x44, 0x46]), mimeType: "application/pdf" };
}

export function layoutReader(pages: LayoutPage[]): LayoutTextReader {
  return { name: "fake-layout", readPages: async () => pages };
}

export function acmeTable(): KnownEntityTable {
  return new Map([
    [
      "acme-001",
      {
        name: "Acme Corporation",
        confidence: 0.95,
        metadata: { address: "123 Industry Way, Springfield", code: "ACM" },
      },
    ],
  ]);
}
