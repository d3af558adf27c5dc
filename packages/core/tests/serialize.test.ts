import { describe, it, expect } from "vitest";
import {
  extractionResultFromJSON,
  extractionResultToJSON,
  parseResultFromJSON,
  parseResultToJSON,
} from "../src/serialize";
import { SerializationError } from "../src/errors";
import { generateFieldCandidates } from "../src/extract/candidates";
import { InvoiceParser } from "../src/extract/parser";
import type { ExtractionResult } from "../src/types";
import { INVOICE_TEXT, acmeTable, page, tok } from "./helpers";

function sampleExtraction(): ExtractionResult {
  const pages = [page(0, INVOICE_TEXT, { tokens: [tok("INV-2024-001", [130, 82, 190, 92])], confidence: 0.84 })];
  return { sourcePath: "invoices/acme.pdf", pages, fieldCandidates: generateFieldCandidates(pages), ocrUsed: false };
}

describe("extraction result encoding", () => {
  it("uses snake_case keys and null for absent optionals", () => {
    const json = extractionResultToJSON(sampleExtraction());
    expect(json.source_path).toBe("invoices/acme.pdf");
    expect(json.ocr_used).toBe(false);
    expect(json.field_candidates[0]).toMatchObject({
      field_name: "invoice_id",
      value: "INV-2024-001",
      page_number: 0,
      bbox: [130, 82, 190, 92],
    });
    expect(json.field_candidates[1].bbox).toBeNull();
  });

  it("survives a trip through JSON text", () => {
    const original = sampleExtraction();
    const decoded = extractionResultFromJSON(JSON.parse(JSON.stringify(extractionResultToJSON(original))));
    expect(decoded).toEqual(original);
  });

  it("rejects a candidate that points at a missing page", () => {
    const json = extractionResultToJSON(sampleExtraction());
    json.field_candidates[0].page_number = 3;
    expect(() => extractionResultFromJSON(json)).toThrow(
      new SerializationError("$.field_candidates[0].page_number", "does not reference a page"),
    );
  });

  it("names the offending path", () => {
    const json = extractionResultToJSON(sampleExtraction());
    json.pages[0].confidence = 1.5;
    expect(() => extractionResultFromJSON(json)).toThrow("$.pages[0].confidence: expected confidence in [0, 1]");
    expect(() => extractionResultFromJSON({ ...extractionResultToJSON(sampleExtraction()), ocr_used: "no" })).toThrow(
      "$.ocr_used: expected boolean",
    );
    expect(() => extractionResultFromJSON(null)).toThrow("$: expected object");
  });

  it("rejects an unknown candidate source", () => {
    const json = extractionResultToJSON(sampleExtraction());
    const bad = { ...json, field_candidates: [{ ...json.field_candidates[0], source: "guess" }] };
    expect(() => extractionResultFromJSON(bad)).toThrow(SerializationError);
    expect(() => extractionResultFromJSON(bad)).toThrow("$.field_candidates[0].source: expected one of");
  });
});

describe("parse result encoding", () => {
  it("survives a trip through JSON text", async () => {
    const parse = await new InvoiceParser({ knownEntities: acmeTable() }).parse([page(0, `${INVOICE_TEXT}\nWidget 2 $10.00`)]);
    const json = parseResultToJSON(parse);

    expect(json.invoice_id?.value).toBe("INV-2024-001");
    expect(json.line_items).toEqual([{ description: "Widget", quantity: "2", price: "$10.00" }]);
    expect(parseResultFromJSON(JSON.parse(JSON.stringify(json)))).toEqual(parse);
  });

  it("encodes missing fields as null", () => {
    const json = parseResultToJSON({
      vendor: null,
      invoiceId: null,
      invoiceDate: null,
      total: null,
      lineItems: [],
      additionalEntities: [],
      reasoningSteps: [],
    });
    expect(json).toEqual({
      vendor: null,
      invoice_id: null,
      invoice_date: null,
      total: null,
      line_items: [],
      additional_entities: [],
      reasoning_steps: [],
    });
  });

  it("rejects a malformed reasoning step", () => {
    expect(() =>
      parseResultFromJSON({
        vendor: null,
        invoice_id: null,
        invoice_date: null,
        total: null,
        line_items: [],
        additional_entities: [],
        reasoning_steps: [{ field: "total", method: "regex" }],
      }),
    ).toThrow("$.reasoning_steps[0].detail: expected string");
  });
});
