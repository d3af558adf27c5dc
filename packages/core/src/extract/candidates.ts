import type { BBox, FieldCandidate, PageRecord, Token } from "../types";
import { FIELD_PATTERNS, compilePattern } from "./patterns";
import { round2 } from "../ingest/confidence";
import { getLogger } from "../logger";

const SNIPPET_WINDOW = 60;
const VENDOR_HEADER_LINES = 10;

export type TextStream = {
  text: string;
  // Start offset of each page (by position) in `text`.
  pageStarts: number[];
};

// Pages joined in index order with a single "\n" between them.
export function buildTextStream(pages: readonly PageRecord[]): TextStream {
  const ordered = [...pages].sort((a, b) => a.index - b.index);
  const pageStarts: number[] = [];
  let offset = 0;
  for (const page of ordered) {
    pageStarts.push(offset);
    offset += page.text.length + 1;
  }
  return { text: ordered.map((p) => p.text).join("\n"), pageStarts };
}

// Position of the page owning `charIndex`; a page's range excludes its trailing separator.
export function locatePage(charIndex: number, pages: readonly PageRecord[], pageStarts: readonly number[]): number {
  for (let i = 0; i < pages.length; i++) {
    if (charIndex < pageStarts[i] + pages[i].text.length + 1) return i;
  }
  return 0;
}

export function extractSnippet(start: number, end: number, stream: string): string {
  return stream
    .slice(Math.max(0, start - SNIPPET_WINDOW), Math.min(stream.length, end + SNIPPET_WINDOW))
    .replace(/\n/g, " ");
}

export function findBBoxForValue(value: string, tokens: readonly Token[]): BBox | undefined {
  const fragments = value.split(/\s+/).filter(Boolean).map((f) => f.toLowerCase());
  const boxes = tokens
    .filter((t) => t.text && fragments.some((f) => t.text.toLowerCase().includes(f)))
    .map((t) => t.bbox);
  if (boxes.length === 0) return undefined;
  return [
    Math.min(...boxes.map((b) => b[0])),
    Math.min(...boxes.map((b) => b[1])),
    Math.max(...boxes.map((b) => b[2])),
    Math.max(...boxes.map((b) => b[3])),
  ];
}

// Mostly-numeric captures (dates, totals) score higher than free-text ones.
export function confidenceFromMatch(value: string): number {
  if (!value) return 0;
  const digits = (value.match(/\d/g) || []).length;
  return round2(Math.min(0.5 + 0.5 * (digits / value.length), 0.99));
}

export function guessVendor(pages: readonly PageRecord[]): FieldCandidate | null {
  const first = [...pages].sort((a, b) => a.index - b.index)[0];
  if (!first) return null;
  const header = first.text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, VENDOR_HEADER_LINES);
  if (header.length === 0) return null;
  const value = header[0];
  return {
    fieldName: "vendor",
    value,
    confidence: value.split(/\s+/).length >= 2 ? 0.6 : 0.4,
    pageNumber: first.index,
    snippet: value,
    source: "header",
    metadata: {},
  };
}

/**
 * Every regex match for the known fields, plus one header-based vendor guess. Ambiguity is
 * kept: a field may come back with several candidates, or none.
 */
export function generateFieldCandidates(pages: readonly PageRecord[]): FieldCandidate[] {
  const log = getLogger("core");
  const ordered = [...pages].sort((a, b) => a.index - b.index);
  const { text: stream, pageStarts } = buildTextStream(ordered);
  const candidates: FieldCandidate[] = [];
  if (!stream) {
    log.warn("candidates.no_text");
    return candidates;
  }

  for (const pattern of FIELD_PATTERNS) {
    for (const match of stream.matchAll(compilePattern(pattern, true))) {
      const value = (match[1] ?? "").trim();
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const page = ordered[locatePage(start, ordered, pageStarts)];
      const confidence = confidenceFromMatch(value);
      const bbox = findBBoxForValue(value, page.tokens);
      candidates.push({
        fieldName: pattern.field,
        value,
        confidence,
        pageNumber: page.index,
        snippet: extractSnippet(start, end, stream),
        ...(bbox ? { bbox } : {}),
        source: "regex",
        metadata: { pattern: pattern.source },
      });
      log.debug("candidates.match", { field: pattern.field, value, page: page.index, confidence });
    }
  }

  const vendor = guessVendor(ordered);
  if (vendor) candidates.push(vendor);
  return candidates;
}
