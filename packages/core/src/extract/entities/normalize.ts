import type { RecognizedEntity } from "../../types";

export function buildSystemPrompt(): string {
  return [
    "You are an entity recognizer for invoices.",
    "Find organizations, people, locations, dates and money amounts in the TEXT.",
    "Return ONLY valid JSON with this shape:",
    '{"entities": [{"text": string, "label": "ORG"|"PERSON"|"GPE"|"DATE"|"MONEY", "score": number, "start": number, "end": number}]}',
    "- text must be copied verbatim from TEXT.",
    "- score must be 0..1.",
    "- start is inclusive; end is exclusive; offsets are character offsets into TEXT.",
    '- If nothing is found, return {"entities": []}.',
  ].join("\n");
}

export function buildUserPrompt(text: string): string {
  return `TEXT:\n${text}`;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseLoose(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // Models sometimes wrap the JSON in prose; take the outermost object.
    const m = raw.match(/\{.*\}/s);
    if (!m) return null;
    try {
      return JSON.parse(m[0]);
    } catch {
      return null;
    }
  }
}

function clamp01(n: number): number { return isFinite(n) ? Math.max(0, Math.min(1, n)) : 0; }

/**
 * Validate a model reply against `text`. Spans that are missing or do not point at the
 * entity text are re-located by search; entities not found in the text are dropped.
 */
export function normalizeEntities(raw: string, text: string): RecognizedEntity[] {
  const parsed = parseLoose(raw);
  if (!isRecord(parsed) || !Array.isArray(parsed.entities)) {
    throw new Error("Entity recognizer returned non-JSON or invalid JSON");
  }
  const out: RecognizedEntity[] = [];
  for (const e of parsed.entities) {
    if (!isRecord(e) || typeof e.text !== "string" || typeof e.label !== "string") continue;
    const value = e.text.trim();
    if (!value) continue;
    let start = typeof e.start === "number" ? e.start : -1;
    if (text.slice(start, start + value.length) !== value) start = text.indexOf(value);
    if (start < 0) continue;
    const entity: RecognizedEntity = { text: value, label: e.label, start, end: start + value.length };
    if (typeof e.score === "number") entity.score = clamp01(e.score);
    out.push(entity);
  }
  return out;
}
