import { describe, it, expect, vi } from "vitest";
import { AcquisitionSelector } from "../src/ingest/index";
import type { PageRecord, TierName } from "../src/types";
import { page, pdfDoc } from "./helpers";

function fakeTier(name: TierName, pages: PageRecord[]) {
  return { name, extract: vi.fn(async () => pages) };
}

function setup(direct: PageRecord[], generic: PageRecord[], ocr: PageRecord[]) {
  const tiers = {
    direct: fakeTier("direct", direct),
    generic: fakeTier("generic", generic),
    ocr: fakeTier("ocr", ocr),
  };
  return tiers;
}

const ocrPages = [page(0, "scanned text", { confidence: 0.7, tier: "ocr" })];

describe("AcquisitionSelector", () => {
  it("keeps confident direct pages and never runs OCR", async () => {
    const direct = [page(0, "Invoice", { confidence: 0.8 }), page(1, "Total", { confidence: 0.6 })];
    const tiers = setup(direct, [], ocrPages);
    const out = await new AcquisitionSelector(tiers).acquire(pdfDoc());

    expect(out.pages).toBe(direct);
    expect(out.ocrUsed).toBe(false);
    expect(out.states).toEqual(["init", "direct_attempted", "done"]);
    expect(tiers.generic.extract).not.toHaveBeenCalled();
    expect(tiers.ocr.extract).not.toHaveBeenCalled();
  });

  it("falls through to OCR when the direct mean is below the threshold", async () => {
    const tiers = setup([page(0, "x", { confidence: 0.2 })], [], ocrPages);
    const out = await new AcquisitionSelector(tiers).acquire(pdfDoc());

    expect(out.pages).toBe(ocrPages);
    expect(out.ocrUsed).toBe(true);
    expect(out.states).toEqual(["init", "direct_attempted", "ocr_attempted", "done"]);
  });

  it("accepts a mean exactly at the threshold", async () => {
    const direct = [page(0, "x", { confidence: 0.35 })];
    const tiers = setup(direct, [], ocrPages);
    const out = await new AcquisitionSelector(tiers, 0.35).acquire(pdfDoc());
    expect(out.pages).toBe(direct);
    expect(out.ocrUsed).toBe(false);
  });

  it("flags OCR when direct yields nothing under the default threshold", async () => {
    const tiers = setup([], [page(0, "generic", { tier: "generic", confidence: 0.5 })], ocrPages);
    const out = await new AcquisitionSelector(tiers).acquire(pdfDoc());

    expect(out.pages).toBe(ocrPages);
    expect(out.ocrUsed).toBe(true);
    expect(tiers.generic.extract).not.toHaveBeenCalled();
  });

  it("tries the generic tier when direct yields nothing and the threshold is 0", async () => {
    const generic = [page(0, "generic", { tier: "generic", confidence: 0.5 })];
    const tiers = setup([], generic, ocrPages);
    const out = await new AcquisitionSelector(tiers, 0).acquire(pdfDoc());

    expect(out.pages).toBe(generic);
    expect(out.ocrUsed).toBe(false);
    expect(out.states).toEqual(["init", "direct_attempted", "generic_attempted", "done"]);
    expect(tiers.ocr.extract).not.toHaveBeenCalled();
  });

  it("runs OCR when both text tiers come back empty", async () => {
    const tiers = setup([], [], ocrPages);
    const out = await new AcquisitionSelector(tiers, 0).acquire(pdfDoc());

    expect(out.pages).toBe(ocrPages);
    expect(out.ocrUsed).toBe(true);
    expect(out.states).toEqual(["init", "direct_attempted", "generic_attempted", "ocr_attempted", "done"]);
  });

  it("goes straight to OCR when forced", async () => {
    const tiers = setup([page(0, "direct", { confidence: 0.99 })], [], []);
    const out = await new AcquisitionSelector(tiers).acquire(pdfDoc(), { forceOcr: true });

    expect(out.pages).toEqual([]);
    expect(out.ocrUsed).toBe(true);
    expect(out.states).toEqual(["init", "ocr_attempted", "done"]);
    expect(tiers.direct.extract).not.toHaveBeenCalled();
    expect(tiers.generic.extract).not.toHaveBeenCalled();
  });

  it("treats a rejecting tier as an empty read and keeps falling through", async () => {
    const tiers = setup([], [], ocrPages);
    tiers.direct.extract.mockRejectedValueOnce(new Error("boom"));
    const out = await new AcquisitionSelector(tiers).acquire(pdfDoc());

    expect(out.pages).toBe(ocrPages);
    expect(out.ocrUsed).toBe(true);
    expect(out.states).toEqual(["init", "direct_attempted", "ocr_attempted", "done"]);
  });

  it("returns no pages when the OCR tier rejects too", async () => {
    const tiers = setup([], [], []);
    tiers.ocr.extract.mockRejectedValueOnce(new Error("engine gone"));
    const out = await new AcquisitionSelector(tiers).acquire(pdfDoc(), { forceOcr: true });

    expect(out).toEqual({ pages: [], ocrUsed: true, states: ["init", "ocr_attempted", "done"] });
  });

  it("reports OCR use whenever any final page came from OCR", async () => {
    const cases: Array<[PageRecord[], PageRecord[], number]> = [
      [[page(0, "a", { confidence: 0.9 })], [], 0.35],
      [[page(0, "a", { confidence: 0.1 })], [], 0.35],
      [[], [page(0, "g", { tier: "generic" })], 0],
      [[], [], 0.35],
    ];
    for (const [direct, generic, threshold] of cases) {
      const out = await new AcquisitionSelector(setup(direct, generic, ocrPages), threshold).acquire(pdfDoc());
      expect(out.ocrUsed).toBe(out.pages.some((p) => p.tier === "ocr"));
    }
  });
});
