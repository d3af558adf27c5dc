import type { EntityRecognizer, RecognizedEntity } from "../../types";
import { getLogger } from "../../logger";
import { getErrorMessage } from "../../errors";
import { buildSystemPrompt, buildUserPrompt, normalizeEntities } from "./normalize";

const GROQ_URL = "https://api.groq.com/openai/v1/chat/completions";

interface GroqOptions {
  apiKey: string;
  model: string;
}

function messageContent(data: unknown): string {
  if (typeof data !== "object" || data === null || !("choices" in data) || !Array.isArray(data.choices)) return "";
  const first: unknown = data.choices[0];
  if (typeof first !== "object" || first === null || !("message" in first)) return "";
  const message: unknown = first.message;
  if (typeof message !== "object" || message === null || !("content" in message)) return "";
  return typeof message.content === "string" ? message.content : "";
}

export function createGroqRecognizer({ apiKey, model }: GroqOptions): EntityRecognizer {
  const log = getLogger("core").child({});

  return {
    name: "groq",
    async recognize(text: string): Promise<RecognizedEntity[]> {
      try {
        const resp = await fetch(GROQ_URL, {
          method: "POST",
          headers: {
            "Authorization": `Bearer ${apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model,
            temperature: 0,
            response_format: { type: "json_object" },
            messages: [
              { role: "system", content: buildSystemPrompt() },
              { role: "user", content: buildUserPrompt(text) },
            ],
          }),
        });
        if (!resp.ok) {
          log.warn("ner.groq.http_error", { status: resp.status, model });
          throw new Error(`Groq HTTP ${resp.status}`);
        }
        return normalizeEntities(messageContent(await resp.json()), text);
      } catch (e) {
        log.warn("ner.groq.exception", { error: getErrorMessage(e), model });
        throw e;
      }
    },
  };
}
