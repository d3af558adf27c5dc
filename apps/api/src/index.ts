import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { fileURLToPath } from "url";
import { createInvoicePipeline, getErrorMessage, getLogger, loadConfig } from "@invoice-pipeline/core";
import { createApp } from "./app";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const logger = getLogger("api");
const API_PORT = Number(process.env.API_PORT ?? 3001);

async function main() {
  const config = loadConfig();
  const pipeline = await createInvoicePipeline(config);
  const app = createApp(pipeline, { documentsDir: config.documentsDir });
  app.listen(API_PORT, () => {
    logger.info("api.listen", { port: API_PORT, ocr_threshold: config.ocrThreshold, ner: config.ner.backend });
  });
}

main().catch((e: unknown) => {
  logger.error("api.start_failed", { error: getErrorMessage(e) });
  process.exitCode = 1;
});
