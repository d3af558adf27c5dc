import type {
  EntityRecognizer,
  ExtractionResult,
  KnownEntityTable,
  LineItem,
  PageRecord,
  ParsedField,
  RecognizedEntity,
  ParseResult,
  ReasoningStep,
} from "../types";
import { FIELD_PATTERNS, compilePattern, type FieldPattern, type PatternField } from "./patterns";
import { buildTextStream } from "./candidates";
import { matchKnownEntity } from "./knownEntities";
import { detectLineItems } from "./lineItems";
import { round2 } from "../ingest/confidence";
import { getLogger } from "../logger";
import { getErrorMessage } from "../errors";

const ORGANIZATION_LABELS = new Set(["vendor", "org", "organization", "company"]);

export interface InvoiceParserOptions {
  knownEntities?: KnownEntityTable;
  recognizer?: EntityRecognizer;
}

/**
 * Fuses the known-entity table, per-field regexes, an optional entity recognizer and
 * line-item detection into one result. Steps run in that fixed order and each records what
 * it matched in the reasoning trail.
 */
export class InvoiceParser {
  private readonly knownEntities: KnownEntityTable;
  private readonly recognizer?: EntityRecognizer;

  constructor(opts: InvoiceParserOptions = {}) {
    this.knownEntities = opts.knownEntities ?? new Map();
    this.recognizer = opts.recognizer;
  }

  async parse(input: ExtractionResult | readonly PageRecord[]): Promise<ParseResult> {
    const log = getLogger("core");
    const pages = isPageList(input) ? input : input.pages;
    const { text } = buildTextStream(pages);
    const reasoningSteps: ReasoningStep[] = [];

    const vendor = this.matchVendor(text, reasoningSteps);
    const regexFields: Record<PatternField, ParsedField | null> = { invoice_id: null, invoice_date: null, total: null };
    for (const pattern of FIELD_PATTERNS) {
      regexFields[pattern.field] = regexExtract(text, pattern, reasoningSteps);
    }
    const additionalEntities = await this.recognizeEntities(text, reasoningSteps);
    const lineItems = extractLineItems(text, reasoningSteps);

    const result: ParseResult = {
      vendor,
      invoiceId: regexFields.invoice_id,
      invoiceDate: regexFields.invoice_date,
      total: regexFields.total,
      lineItems,
      additionalEntities,
      reasoningSteps,
    };
    log.info("parse.complete", {
      vendor: vendor?.value ?? null,
      fields: [vendor, result.invoiceId, result.invoiceDate, result.total].filter(Boolean).length,
      line_items: lineItems.length,
      entities: additionalEntities.length,
    });
    return result;
  }

  private matchVendor(text: string, steps: ReasoningStep[]): ParsedField | null {
    const hit = matchKnownEntity(text, this.knownEntities);
    if (!hit) return null;
    const { id, entity } = hit;
    steps.push({ field: "vendor", method: "known-entity", detail: `Matched vendor '${entity.name}' by UID ${id}` });
    return {
      name: "vendor",
      value: entity.name,
      confidence: clampUnit(entity.confidence),
      source: "known_entity",
      reasoning: `Matched known vendor ${entity.name}`,
    };
  }

  private async recognizeEntities(text: string, steps: ReasoningStep[]): Promise<ParsedField[]> {
    if (!this.recognizer || !text.trim()) return [];
    const log = getLogger("core");
    let entities: RecognizedEntity[];
    try {
      entities = await this.recognizer.recognize(text);
    } catch (e) {
      log.warn("parse.ner.failed", { recognizer: this.recognizer.name, error: getErrorMessage(e) });
      return [];
    }
    return entities.map((ent): ParsedField => {
      const label = ent.label.toLowerCase();
      if (ORGANIZATION_LABELS.has(label)) {
        steps.push({ field: "vendor", method: "ner", detail: `Detected organization entity '${ent.text}'` });
      }
      return {
        name: label,
        value: ent.text.trim(),
        confidence: clampUnit(ent.score ?? 0.5),
        source: "model",
        reasoning: `Detected entity ${ent.text} (${ent.label})`,
      };
    });
  }
}

function clampUnit(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.min(1, n)) : 0;
}

function isPageList(input: ExtractionResult | readonly PageRecord[]): input is readonly PageRecord[] {
  return Array.isArray(input);
}

// First match only; confidence grows with the captured length.
function regexExtract(text: string, pattern: FieldPattern, steps: ReasoningStep[]): ParsedField | null {
  const log = getLogger("core");
  const m = compilePattern(pattern, false).exec(text);
  if (!m) {
    log.debug("parse.regex.no_match", { field: pattern.field });
    return null;
  }
  const value = (m[1] ?? "").trim();
  const confidence = round2(Math.min(0.95, 0.6 + value.length / 30));
  const reasoning = `Detected ${pattern.label.toLowerCase()} via regex`;
  steps.push({ field: pattern.field, method: "regex", detail: `${reasoning}: '${value}'` });
  log.debug("parse.regex.match", { field: pattern.field, value, confidence });
  return { name: pattern.field, value, confidence, source: "regex", reasoning };
}

function extractLineItems(text: string, steps: ReasoningStep[]): LineItem[] {
  const items = detectLineItems(text);
  if (items.length) {
    steps.push({ field: "line_items", method: "regex-table", detail: `Detected ${items.length} potential line items` });
  }
  return items;
}
