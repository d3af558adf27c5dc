import type {
  BBox,
  CandidateSource,
  ExtractionResult,
  FieldCandidate,
  LineItem,
  PageRecord,
  ParsedField,
  ParseResult,
  ReasoningStep,
  TierName,
  Token,
} from "./types";
import { CANDIDATE_SOURCES } from "./types";
import { SerializationError } from "./errors";

// Wire shapes: snake_case keys, `null` for absent values.

export type TokenJSON = { text: string; bbox: BBox };
export type PageRecordJSON = { index: number; text: string; tokens: TokenJSON[]; confidence: number; tier: TierName };
export type FieldCandidateJSON = {
  field_name: string;
  value: string;
  confidence: number;
  page_number: number;
  snippet: string | null;
  bbox: BBox | null;
  source: CandidateSource;
  metadata: Record<string, unknown>;
};
export type ExtractionResultJSON = {
  source_path: string;
  ocr_used: boolean;
  pages: PageRecordJSON[];
  field_candidates: FieldCandidateJSON[];
};
export type ParsedFieldJSON = { name: string; value: string; confidence: number; source: CandidateSource; reasoning: string };
export type ParseResultJSON = {
  vendor: ParsedFieldJSON | null;
  invoice_id: ParsedFieldJSON | null;
  invoice_date: ParsedFieldJSON | null;
  total: ParsedFieldJSON | null;
  line_items: LineItem[];
  additional_entities: ParsedFieldJSON[];
  reasoning_steps: ReasoningStep[];
};

export function extractionResultToJSON(r: ExtractionResult): ExtractionResultJSON {
  return {
    source_path: r.sourcePath,
    ocr_used: r.ocrUsed,
    pages: r.pages.map((p) => ({
      index: p.index,
      text: p.text,
      tokens: p.tokens.map((t) => ({ text: t.text, bbox: [...t.bbox] })),
      confidence: p.confidence,
      tier: p.tier,
    })),
    field_candidates: r.fieldCandidates.map((c) => ({
      field_name: c.fieldName,
      value: c.value,
      confidence: c.confidence,
      page_number: c.pageNumber,
      snippet: c.snippet ?? null,
      bbox: c.bbox ? [...c.bbox] : null,
      source: c.source,
      metadata: { ...c.metadata },
    })),
  };
}

function fieldToJSON(f: ParsedField | null): ParsedFieldJSON | null {
  return f ? { name: f.name, value: f.value, confidence: f.confidence, source: f.source, reasoning: f.reasoning } : null;
}

export function parseResultToJSON(r: ParseResult): ParseResultJSON {
  return {
    vendor: fieldToJSON(r.vendor),
    invoice_id: fieldToJSON(r.invoiceId),
    invoice_date: fieldToJSON(r.invoiceDate),
    total: fieldToJSON(r.total),
    line_items: r.lineItems.map((li) => ({ ...li })),
    additional_entities: r.additionalEntities.map((f) => ({ ...f })),
    reasoning_steps: r.reasoningSteps.map((s) => ({ ...s })),
  };
}

// --- decoding ---

type Obj = Record<string, unknown>;

function isObj(v: unknown): v is Obj {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function obj(v: unknown, path: string): Obj {
  if (!isObj(v)) throw new SerializationError(path, "expected object");
  return v;
}

function arr(v: unknown, path: string): unknown[] {
  if (!Array.isArray(v)) throw new SerializationError(path, "expected array");
  return v;
}

function str(v: unknown, path: string): string {
  if (typeof v !== "string") throw new SerializationError(path, "expected string");
  return v;
}

function num(v: unknown, path: string): number {
  if (typeof v !== "number" || !Number.isFinite(v)) throw new SerializationError(path, "expected number");
  return v;
}

function bool(v: unknown, path: string): boolean {
  if (typeof v !== "boolean") throw new SerializationError(path, "expected boolean");
  return v;
}

function confidence(v: unknown, path: string): number {
  const n = num(v, path);
  if (n < 0 || n > 1) throw new SerializationError(path, "expected confidence in [0, 1]");
  return n;
}

function bbox(v: unknown, path: string): BBox {
  const a = arr(v, path);
  if (a.length !== 4) throw new SerializationError(path, "expected [x0, y0, x1, y1]");
  return [num(a[0], `${path}[0]`), num(a[1], `${path}[1]`), num(a[2], `${path}[2]`), num(a[3], `${path}[3]`)];
}

function source(v: unknown, path: string): CandidateSource {
  const found = CANDIDATE_SOURCES.find((s) => s === v);
  if (!found) throw new SerializationError(path, `expected one of ${CANDIDATE_SOURCES.join(", ")}`);
  return found;
}

const TIERS: readonly TierName[] = ["direct", "generic", "ocr"];

function tier(v: unknown, path: string): TierName {
  const found = TIERS.find((t) => t === v);
  if (!found) throw new SerializationError(path, `expected one of ${TIERS.join(", ")}`);
  return found;
}

function token(v: unknown, path: string): Token {
  const o = obj(v, path);
  return { text: str(o.text, `${path}.text`), bbox: bbox(o.bbox, `${path}.bbox`) };
}

function page(v: unknown, path: string): PageRecord {
  const o = obj(v, path);
  return {
    index: num(o.index, `${path}.index`),
    text: str(o.text, `${path}.text`),
    tokens: arr(o.tokens, `${path}.tokens`).map((t, i) => token(t, `${path}.tokens[${i}]`)),
    confidence: confidence(o.confidence, `${path}.confidence`),
    tier: tier(o.tier, `${path}.tier`),
  };
}

function candidate(v: unknown, path: string): FieldCandidate {
  const o = obj(v, path);
  const c: FieldCandidate = {
    fieldName: str(o.field_name, `${path}.field_name`),
    value: str(o.value, `${path}.value`),
    confidence: confidence(o.confidence, `${path}.confidence`),
    pageNumber: num(o.page_number, `${path}.page_number`),
    source: source(o.source, `${path}.source`),
    metadata: o.metadata == null ? {} : { ...obj(o.metadata, `${path}.metadata`) },
  };
  if (o.snippet != null) c.snippet = str(o.snippet, `${path}.snippet`);
  if (o.bbox != null) c.bbox = bbox(o.bbox, `${path}.bbox`);
  return c;
}

export function extractionResultFromJSON(json: unknown): ExtractionResult {
  const o = obj(json, "$");
  const pages = arr(o.pages, "$.pages").map((p, i) => page(p, `$.pages[${i}]`));
  const fieldCandidates = arr(o.field_candidates, "$.field_candidates").map((c, i) =>
    candidate(c, `$.field_candidates[${i}]`),
  );
  for (const [i, c] of fieldCandidates.entries()) {
    if (!pages.some((p) => p.index === c.pageNumber)) {
      throw new SerializationError(`$.field_candidates[${i}].page_number`, "does not reference a page");
    }
  }
  return {
    sourcePath: str(o.source_path, "$.source_path"),
    ocrUsed: bool(o.ocr_used, "$.ocr_used"),
    pages,
    fieldCandidates,
  };
}

function parsedField(v: unknown, path: string): ParsedField {
  const o = obj(v, path);
  return {
    name: str(o.name, `${path}.name`),
    value: str(o.value, `${path}.value`),
    confidence: confidence(o.confidence, `${path}.confidence`),
    source: source(o.source, `${path}.source`),
    reasoning: str(o.reasoning, `${path}.reasoning`),
  };
}

function nullableField(v: unknown, path: string): ParsedField | null {
  return v == null ? null : parsedField(v, path);
}

export function parseResultFromJSON(json: unknown): ParseResult {
  const o = obj(json, "$");
  return {
    vendor: nullableField(o.vendor, "$.vendor"),
    invoiceId: nullableField(o.invoice_id, "$.invoice_id"),
    invoiceDate: nullableField(o.invoice_date, "$.invoice_date"),
    total: nullableField(o.total, "$.total"),
    lineItems: arr(o.line_items, "$.line_items").map((li, i) => {
      const p = `$.line_items[${i}]`;
      const item = obj(li, p);
      return {
        description: str(item.description, `${p}.description`),
        quantity: str(item.quantity, `${p}.quantity`),
        price: str(item.price, `${p}.price`),
      };
    }),
    additionalEntities: arr(o.additional_entities, "$.additional_entities").map((f, i) =>
      parsedField(f, `$.additional_entities[${i}]`),
    ),
    reasoningSteps: arr(o.reasoning_steps, "$.reasoning_steps").map((s, i) => {
      const p = `$.reasoning_steps[${i}]`;
      const step = obj(s, p);
      return { field: str(step.field, `${p}.field`), method: str(step.method, `${p}.method`), detail: str(step.detail, `${p}.detail`) };
    }),
  };
}
