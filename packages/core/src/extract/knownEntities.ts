import fs from "fs";
import type { KnownEntity, KnownEntityTable } from "../types";
import { getLogger } from "../logger";
import { getErrorMessage } from "../errors";

const DEFAULT_PRIOR = 0.9;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Build a vendor table from `{ "<id>": { name, confidence?, ...extra } }`.
 * Entries without a name are dropped; extra keys become metadata.
 */
export function knownEntitiesFromObject(vendors: unknown): KnownEntityTable {
  const table = new Map<string, KnownEntity>();
  if (!isRecord(vendors)) return table;
  for (const [id, raw] of Object.entries(vendors)) {
    if (!isRecord(raw)) continue;
    const { name, confidence, ...metadata } = raw;
    if (typeof name !== "string" || !name.trim()) continue;
    const prior = Number(confidence ?? DEFAULT_PRIOR);
    table.set(id, {
      name: name.trim(),
      confidence: Number.isFinite(prior) ? Math.max(0, Math.min(1, prior)) : DEFAULT_PRIOR,
      metadata,
    });
  }
  return table;
}

// Reads `{ "vendors": {...} }`. Never throws: a missing or broken file yields an empty table.
export function loadKnownEntities(path: string): KnownEntityTable {
  const log = getLogger("core");
  if (!fs.existsSync(path)) {
    log.warn("known_entities.missing", { path });
    return new Map();
  }
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(path, "utf8"));
  } catch (e) {
    log.error("known_entities.parse_failed", { path, error: getErrorMessage(e) });
    return new Map();
  }
  const table = knownEntitiesFromObject(isRecord(data) ? data.vendors : undefined);
  log.debug("known_entities.loaded", { path, count: table.size });
  return table;
}

// First entry, in table order, whose name occurs case-insensitively in `text`. Blank names never match.
export function matchKnownEntity(
  text: string,
  table: KnownEntityTable,
): { id: string; entity: KnownEntity } | null {
  const haystack = text.toLowerCase();
  for (const [id, entity] of table) {
    const name = entity.name.trim().toLowerCase();
    if (name && haystack.includes(name)) return { id, entity };
  }
  return null;
}

export function findKnownEntityByName(name: string, table: KnownEntityTable): KnownEntity | undefined {
  const wanted = name.trim().toLowerCase();
  if (!wanted) return undefined;
  for (const entity of table.values()) {
    if (entity.name.trim().toLowerCase() === wanted) return entity;
  }
  return undefined;
}
