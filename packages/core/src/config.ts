export type NerBackend = "auto" | "ollama" | "groq" | "none";

export interface PipelineConfig {
  ocrThreshold: number;
  ocrLang: string;
  ocrLangPath?: string;
  rasterScale: number;
  knownEntitiesPath: string;
  /** Root that API requests may read documents from. */
  documentsDir: string;
  ner: {
    backend: NerBackend;
    ollamaHost?: string;
    ollamaModel: string;
    groqApiKey?: string;
    groqModel: string;
  };
}

export const DEFAULT_OCR_THRESHOLD = 0.35;

type Env = Record<string, string | undefined>;

function numberOr(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const v = raw?.trim();
  return v ? v : undefined;
}

function parseNerBackend(raw: string | undefined): NerBackend {
  switch ((raw ?? "").trim().toLowerCase()) {
    case "ollama":
      return "ollama";
    case "groq":
      return "groq";
    case "none":
    case "off":
      return "none";
    default:
      return "auto";
  }
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const threshold = numberOr(env.OCR_THRESHOLD, DEFAULT_OCR_THRESHOLD);
  const scale = numberOr(env.OCR_RASTER_SCALE, 2);
  return {
    ocrThreshold: Math.max(0, Math.min(1, threshold)),
    ocrLang: nonEmpty(env.OCR_LANG) ?? "eng",
    ocrLangPath: nonEmpty(env.OCR_LANG_PATH),
    rasterScale: scale > 0 ? scale : 2,
    knownEntitiesPath: nonEmpty(env.KNOWN_ENTITIES_PATH) ?? "config/known_entities.json",
    documentsDir: nonEmpty(env.DOCUMENTS_DIR) ?? "data",
    ner: {
      backend: parseNerBackend(env.NER_BACKEND),
      ollamaHost: nonEmpty(env.OLLAMA_HOST),
      ollamaModel: nonEmpty(env.DEFAULT_MODEL_OLLAMA) ?? "llama3.1:8b-instruct",
      groqApiKey: nonEmpty(env.GROQ_API_KEY),
      groqModel: nonEmpty(env.DEFAULT_MODEL_GROQ) ?? "llama-3.1-70b-versatile",
    },
  };
}
