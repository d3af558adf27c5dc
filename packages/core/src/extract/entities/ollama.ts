import type { EntityRecognizer, RecognizedEntity } from "../../types";
import { getLogger } from "../../logger";
import { getErrorMessage } from "../../errors";
import { buildSystemPrompt, buildUserPrompt, normalizeEntities } from "./normalize";

interface OllamaOptions {
  host: string;
  model: string;
}

export function createOllamaRecognizer({ host, model }: OllamaOptions): EntityRecognizer {
  const log = getLogger("core").child({});
  const url = host.replace(/\/$/, "") + "/api/generate";

  return {
    name: "ollama",
    async recognize(text: string): Promise<RecognizedEntity[]> {
      try {
        const resp = await fetch(url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            model,
            prompt: `${buildSystemPrompt()}\n\n${buildUserPrompt(text)}`,
            stream: false,
            options: { temperature: 0 },
            format: "json",
          }),
        });
        if (!resp.ok) {
          const body = await resp.text();
          log.warn("ner.ollama.http_error", { status: resp.status, model });
          throw new Error(`Ollama HTTP ${resp.status}: ${body.slice(0, 120)}`);
        }
        const data: unknown = await resp.json();
        const content =
          typeof data === "object" && data !== null && "response" in data && typeof data.response === "string"
            ? data.response
            : "";
        return normalizeEntities(content, text);
      } catch (e) {
        log.warn("ner.ollama.exception", { error: getErrorMessage(e), model });
        throw e;
      }
    },
  };
}
