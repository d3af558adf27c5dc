import type { EntityRecognizer } from "../../types";
import type { PipelineConfig } from "../../config";
import { createGroqRecognizer } from "./groq";
import { createOllamaRecognizer } from "./ollama";
import { getLogger } from "../../logger";

/**
 * Pick the entity-recognition backend from config. Explicit choices without their
 * credentials resolve to no recognizer; `auto` prefers Groq when a key is present.
 */
export function createEntityRecognizer(config: PipelineConfig["ner"]): EntityRecognizer | undefined {
  const log = getLogger("core").child({});
  const { backend } = config;
  if (backend === "none") return undefined;

  if (config.groqApiKey && (backend === "groq" || backend === "auto")) {
    log.info("ner.backend", { backend: "groq", model: config.groqModel });
    return createGroqRecognizer({ apiKey: config.groqApiKey, model: config.groqModel });
  }
  if (config.ollamaHost && (backend === "ollama" || backend === "auto")) {
    log.info("ner.backend", { backend: "ollama", model: config.ollamaModel });
    return createOllamaRecognizer({ host: config.ollamaHost, model: config.ollamaModel });
  }

  log.info("ner.backend.disabled", { requested: backend });
  return undefined;
}
