// Field patterns shared by the candidate generator (all matches) and the parser (first match).
// Group 1 is the captured value.

export type PatternField = "invoice_id" | "invoice_date" | "total";

export type FieldPattern = {
  field: PatternField;
  label: string;
  source: string;
};

export const FIELD_PATTERNS: readonly FieldPattern[] = [
  {
    field: "invoice_id",
    label: "Invoice number",
    source: String.raw`invoice\s*(?:number|no\.?|#)\s*[:#-]?\s*([A-Z0-9][\w\-\/]*)`,
  },
  {
    field: "invoice_date",
    label: "Invoice date",
    source: String.raw`(?:invoice\s*)?date\s*[:#-]?\s*([0-9]{4}-[0-9]{2}-[0-9]{2}|[0-9]{1,2}[\-/][0-9]{1,2}[\-/][0-9]{2,4})`,
  },
  {
    field: "total",
    label: "Total amount",
    source: String.raw`total\s*(?:due|amount)?\s*[:#-]?\s*([$€£]?\s?[0-9,.]+)`,
  },
];

// Fresh RegExp per use: global regexes carry lastIndex state.
export function compilePattern(p: FieldPattern, global: boolean): RegExp {
  return new RegExp(p.source, global ? "gi" : "i");
}

export const LINE_ITEM_PATTERN = /^(?<desc>.+?)\s+(?<qty>\d+)\s+(?<price>[$€£]?\s?[0-9,.]+)$/;
