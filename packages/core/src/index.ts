export type * from "./types";
export { CANDIDATE_SOURCES } from "./types";
export * from "./ingest/index";
export { getLogger } from "./logger";
export type { Logger, LogContext } from "./logger";
export { DocumentNotFoundError, SerializationError, getErrorMessage } from "./errors";
export { DEFAULT_OCR_THRESHOLD, loadConfig } from "./config";
export type { NerBackend, PipelineConfig } from "./config";

export { FIELD_PATTERNS, LINE_ITEM_PATTERN, compilePattern } from "./extract/patterns";
export type { FieldPattern, PatternField } from "./extract/patterns";
export {
  buildTextStream,
  confidenceFromMatch,
  findBBoxForValue,
  generateFieldCandidates,
  guessVendor,
} from "./extract/candidates";
export { detectLineItems } from "./extract/lineItems";
export {
  findKnownEntityByName,
  knownEntitiesFromObject,
  loadKnownEntities,
  matchKnownEntity,
} from "./extract/knownEntities";
export { InvoiceParser } from "./extract/parser";
export type { InvoiceParserOptions } from "./extract/parser";
export { createEntityRecognizer } from "./extract/entities/router";
export { createGroqRecognizer } from "./extract/entities/groq";
export { createOllamaRecognizer } from "./extract/entities/ollama";
export { normalizeEntities } from "./extract/entities/normalize";

export * from "./serialize";
export { buildInvoiceRecord, toTsv } from "./record";
export type { BuildRecordOptions } from "./record";
export {
  InvoicePipeline,
  assertDocumentExists,
  createInvoicePipeline,
  tiersFromBackends,
} from "./pipeline";
export type { ExtractOptions, InvoicePipelineOptions, ProcessOptions, ProcessResult } from "./pipeline";
