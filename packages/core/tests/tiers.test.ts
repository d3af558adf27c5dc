import { describe, it, expect, vi } from "vitest";
import { DirectTier, GenericTier, OcrTier } from "../src/ingest/tiers";
import type { PageImage, PlainTextReader, Rasterizer, TextRecognizer } from "../src/ingest/types";
import { layoutReader, pdfDoc, tok } from "./helpers";

function image(pageIndex: number): PageImage {
  return { pageIndex, png: new Uint8Array([0x89, 0x50]), width: 10, height: 10 };
}

function rasterizer(count: number): Rasterizer {
  return { name: "fake-raster", rasterize: async () => Array.from({ length: count }, (_, i) => image(i)) };
}

describe("DirectTier", () => {
  it("scores each page with the confidence estimator", async () => {
    const tier = new DirectTier(layoutReader([{ text: "Invoice Total", tokens: [tok("Invoice"), tok("Total")] }]));
    const pages = await tier.extract(pdfDoc());
    expect(pages).toEqual([
      { index: 0, text: "Invoice Total", tokens: [tok("Invoice"), tok("Total")], confidence: 0.8, tier: "direct" },
    ]);
  });

  it("assigns contiguous indices in reader order", async () => {
    const tier = new DirectTier(layoutReader([{ text: "one", tokens: [] }, { text: "two", tokens: [] }]));
    const pages = await tier.extract(pdfDoc());
    expect(pages.map((p) => [p.index, p.text])).toEqual([[0, "one"], [1, "two"]]);
  });

  it("returns nothing without a reader", async () => {
    expect(await new DirectTier().extract(pdfDoc())).toEqual([]);
  });

  it("turns a reader failure into an empty result", async () => {
    const tier = new DirectTier({ name: "broken", readPages: async () => { throw new Error("corrupt xref"); } });
    await expect(tier.extract(pdfDoc())).resolves.toEqual([]);
  });

  it("skips documents that are not PDFs", async () => {
    const readPages = vi.fn(async () => [{ text: "x", tokens: [] }]);
    const tier = new DirectTier({ name: "spy", readPages });
    const pages = await tier.extract({ path: "scan.png", data: new Uint8Array(), mimeType: "image/png" });
    expect(pages).toEqual([]);
    expect(readPages).not.toHaveBeenCalled();
  });
});

describe("GenericTier", () => {
  it("gives every page a flat 0.5 and no tokens", async () => {
    const reader: PlainTextReader = { name: "fake-text", readPages: async () => ["Total: 10.00", null, "end"] };
    const pages = await new GenericTier(reader).extract(pdfDoc());
    expect(pages).toEqual([
      { index: 0, text: "Total: 10.00", tokens: [], confidence: 0.5, tier: "generic" },
      { index: 1, text: "", tokens: [], confidence: 0.5, tier: "generic" },
      { index: 2, text: "end", tokens: [], confidence: 0.5, tier: "generic" },
    ]);
  });

  it("returns nothing without a reader", async () => {
    expect(await new GenericTier().extract(pdfDoc())).toEqual([]);
  });
});

describe("OcrTier", () => {
  it("needs both a rasterizer and a recognizer", async () => {
    const tier = new OcrTier(rasterizer(1));
    expect(tier.available).toBe(false);
    expect(await tier.extract(pdfDoc())).toEqual([]);
  });

  it("recognizes each rendered page and degrades a failed page to empty text", async () => {
    const recognizer: TextRecognizer = {
      name: "fake-ocr",
      recognize: async (img) => {
        if (img.pageIndex === 1) throw new Error("engine crashed");
        return { text: "Invoice Total", words: [{ text: "Invoice", bbox: [1, 2, 3, 4] }, { text: "Total", bbox: [5, 6, 7, 8] }] };
      },
    };
    const tier = new OcrTier(rasterizer(2), recognizer);
    expect(tier.available).toBe(true);

    const pages = await tier.extract(pdfDoc());
    expect(pages).toEqual([
      {
        index: 0,
        text: "Invoice Total",
        tokens: [{ text: "Invoice", bbox: [1, 2, 3, 4] }, { text: "Total", bbox: [5, 6, 7, 8] }],
        confidence: 0.8,
        tier: "ocr",
      },
      { index: 1, text: "", tokens: [], confidence: 0, tier: "ocr" },
    ]);
  });

  it("turns a rasterizer failure into an empty result", async () => {
    const broken: Rasterizer = { name: "broken", rasterize: async () => { throw new Error("cannot open"); } };
    const recognizer: TextRecognizer = { name: "unused", recognize: async () => ({ text: "", words: [] }) };
    await expect(new OcrTier(broken, recognizer).extract(pdfDoc())).resolves.toEqual([]);
  });
});
