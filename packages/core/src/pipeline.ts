import fs from "fs";
import path from "path";
import type {
  EntityRecognizer,
  ExtractionResult,
  InvoiceRecord,
  KnownEntityTable,
  ParseResult,
} from "./types";
import { loadConfig, type PipelineConfig } from "./config";
import { DocumentNotFoundError, getErrorMessage } from "./errors";
import { getLogger } from "./logger";
import {
  AcquisitionSelector,
  DirectTier,
  GenericTier,
  OcrTier,
  guessMimeType,
  loadAcquisitionBackends,
  type AcquisitionBackends,
  type AcquisitionTiers,
} from "./ingest/index";
import { generateFieldCandidates } from "./extract/candidates";
import { InvoiceParser } from "./extract/parser";
import { loadKnownEntities } from "./extract/knownEntities";
import { createEntityRecognizer } from "./extract/entities/router";
import { buildInvoiceRecord } from "./record";

export type ExtractOptions = {
  forceOcr?: boolean;
};

export type ProcessOptions = ExtractOptions & {
  vendorCode?: string;
};

export type ProcessResult = {
  extraction: ExtractionResult;
  parse: ParseResult;
  record: InvoiceRecord;
};

export interface InvoicePipelineOptions {
  tiers: AcquisitionTiers;
  ocrThreshold?: number;
  knownEntities?: KnownEntityTable;
  recognizer?: EntityRecognizer;
}

export function assertDocumentExists(filePath: string): void {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new DocumentNotFoundError(filePath);
  }
}

export function tiersFromBackends(backends: AcquisitionBackends): AcquisitionTiers {
  const ocr = new OcrTier(backends.rasterizer, backends.recognizer);
  if (!ocr.available) {
    getLogger("core").warn("pipeline.ocr_unavailable", {
      rasterizer: backends.rasterizer?.name ?? null,
      recognizer: backends.recognizer?.name ?? null,
    });
  }
  return {
    direct: new DirectTier(backends.layoutReader),
    generic: new GenericTier(backends.textReader),
    ocr,
  };
}

// A file that vanishes or turns unreadable between the check and the read counts as missing.
async function readDocument(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await fs.promises.readFile(filePath));
  } catch (e) {
    getLogger("core").warn("extract.read_failed", { document: filePath, error: getErrorMessage(e) });
    throw new DocumentNotFoundError(filePath);
  }
}

/**
 * Document in, candidates out. One instance can serve many documents; it holds only the
 * tiers, the vendor table and the recognizer handle.
 */
export class InvoicePipeline {
  private readonly selector: AcquisitionSelector;
  private readonly parser: InvoiceParser;
  readonly knownEntities: KnownEntityTable;

  constructor(opts: InvoicePipelineOptions) {
    this.selector = new AcquisitionSelector(opts.tiers, opts.ocrThreshold);
    this.knownEntities = opts.knownEntities ?? new Map();
    this.parser = new InvoiceParser({ knownEntities: this.knownEntities, recognizer: opts.recognizer });
  }

  async extract(filePath: string, opts: ExtractOptions = {}): Promise<ExtractionResult> {
    assertDocumentExists(filePath);
    const log = getLogger("core").child({ document: filePath });
    const data = await readDocument(filePath);
    const mimeType = guessMimeType(path.basename(filePath));
    log.info("extract.start", { mime: mimeType, bytes: data.byteLength, force_ocr: Boolean(opts.forceOcr) });

    const { pages, ocrUsed } = await this.selector.acquire({ path: filePath, data, mimeType }, opts);
    const fieldCandidates = generateFieldCandidates(pages);
    log.info("extract.complete", { pages: pages.length, candidates: fieldCandidates.length, ocr_used: ocrUsed });
    return { sourcePath: filePath, pages, fieldCandidates, ocrUsed };
  }

  parse(extraction: ExtractionResult): Promise<ParseResult> {
    return this.parser.parse(extraction);
  }

  async process(filePath: string, opts: ProcessOptions = {}): Promise<ProcessResult> {
    const extraction = await this.extract(filePath, { forceOcr: opts.forceOcr });
    const parse = await this.parse(extraction);
    const record = buildInvoiceRecord(parse, { knownEntities: this.knownEntities, vendorCode: opts.vendorCode });
    return { extraction, parse, record };
  }
}

export async function createInvoicePipeline(config: PipelineConfig = loadConfig()): Promise<InvoicePipeline> {
  const backends = await loadAcquisitionBackends(config);
  return new InvoicePipeline({
    tiers: tiersFromBackends(backends),
    ocrThreshold: config.ocrThreshold,
    knownEntities: loadKnownEntities(config.knownEntitiesPath),
    recognizer: createEntityRecognizer(config.ner),
  });
}
