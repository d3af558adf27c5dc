import type { PageRecord, TierName } from "../types";
import type {
  AcquisitionTier,
  DocumentSource,
  LayoutTextReader,
  PlainTextReader,
  Rasterizer,
  TextRecognizer,
} from "./types";
import { estimatePageConfidence } from "./confidence";
import { getLogger, type Logger } from "../logger";
import { getErrorMessage } from "../errors";

const GENERIC_PAGE_CONFIDENCE = 0.5;

function isPdf(doc: DocumentSource): boolean {
  return doc.mimeType === "application/pdf";
}

abstract class BaseTier implements AcquisitionTier {
  abstract readonly name: TierName;
  protected readonly log: Logger;

  constructor() {
    this.log = getLogger("core");
  }

  async extract(doc: DocumentSource): Promise<PageRecord[]> {
    const log = this.log.child({ tier: this.name, document: doc.path });
    try {
      const pages = await this.read(doc, log);
      log.debug("tier.done", { pages: pages.length });
      return pages;
    } catch (e) {
      log.error("tier.failed", { error: getErrorMessage(e) });
      return [];
    }
  }

  protected abstract read(doc: DocumentSource, log: Logger): Promise<PageRecord[]>;
}

/** Layout-aware extraction from the document's own text layer. */
export class DirectTier extends BaseTier {
  readonly name = "direct" as const;

  constructor(private readonly reader?: LayoutTextReader) {
    super();
  }

  protected async read(doc: DocumentSource, log: Logger): Promise<PageRecord[]> {
    if (!this.reader) {
      log.warn("tier.direct.reader_missing");
      return [];
    }
    if (!isPdf(doc)) {
      log.info("tier.direct.skipped", { mime: doc.mimeType });
      return [];
    }
    const pages = await this.reader.readPages(doc);
    return pages.map((page, index) => ({
      index,
      text: page.text,
      tokens: page.tokens,
      confidence: estimatePageConfidence(page.tokens),
      tier: this.name,
    }));
  }
}

/** Text-only extraction; no positional grounding, so every page gets a flat 0.5. */
export class GenericTier extends BaseTier {
  readonly name = "generic" as const;

  constructor(private readonly reader?: PlainTextReader) {
    super();
  }

  protected async read(doc: DocumentSource, log: Logger): Promise<PageRecord[]> {
    if (!this.reader) {
      log.warn("tier.generic.reader_missing");
      return [];
    }
    if (!isPdf(doc)) {
      log.info("tier.generic.skipped", { mime: doc.mimeType });
      return [];
    }
    const texts = await this.reader.readPages(doc);
    return texts.map((text, index) => {
      if (text === null) log.warn("tier.generic.page_unreadable", { page: index });
      return { index, text: text ?? "", tokens: [], confidence: GENERIC_PAGE_CONFIDENCE, tier: this.name };
    });
  }
}

/** Rasterize, then recognize. Needs both capabilities; without either it yields nothing. */
export class OcrTier extends BaseTier {
  readonly name = "ocr" as const;

  constructor(private readonly rasterizer?: Rasterizer, private readonly recognizer?: TextRecognizer) {
    super();
  }

  get available(): boolean {
    return Boolean(this.rasterizer && this.recognizer);
  }

  protected async read(doc: DocumentSource, log: Logger): Promise<PageRecord[]> {
    if (!this.rasterizer || !this.recognizer) {
      log.error("tier.ocr.backend_missing", {
        rasterizer_available: Boolean(this.rasterizer),
        recognizer_available: Boolean(this.recognizer),
      });
      return [];
    }
    const images = await this.rasterizer.rasterize(doc);
    const pages: PageRecord[] = [];
    for (const [index, image] of images.entries()) {
      try {
        const { text, words } = await this.recognizer.recognize(image);
        const tokens = words.map((w) => ({ text: w.text, bbox: w.bbox }));
        pages.push({ index, text, tokens, confidence: estimatePageConfidence(tokens), tier: this.name });
      } catch (e) {
        log.warn("tier.ocr.page_failed", { page: index, error: getErrorMessage(e) });
        pages.push({ index, text: "", tokens: [], confidence: 0, tier: this.name });
      }
    }
    return pages;
  }
}
