import type { PageRecord } from '../types';
import type {
  AcquisitionOutcome,
  AcquisitionState,
  AcquisitionTier,
  DocumentSource,
  LayoutTextReader,
  PlainTextReader,
  Rasterizer,
  TextRecognizer,
} from './types';
import { DEFAULT_OCR_THRESHOLD, type PipelineConfig } from '../config';
import { getLogger, type Logger } from '../logger';
import { getErrorMessage } from '../errors';

export function guessMimeType(filename?: string): string {
  const ext = (filename || '').toLowerCase();
  if (ext.endsWith('.pdf')) return 'application/pdf';
  if (ext.endsWith('.png')) return 'image/png';
  if (ext.endsWith('.jpg') || ext.endsWith('.jpeg')) return 'image/jpeg';
  if (ext.endsWith('.tif') || ext.endsWith('.tiff')) return 'image/tiff';
  if (ext.endsWith('.bmp')) return 'image/bmp';
  if (ext.endsWith('.gif')) return 'image/gif';
  if (ext.endsWith('.webp')) return 'image/webp';
  // Unknown extensions are tried as PDF; a non-PDF body then fails inside the tiers.
  return 'application/pdf';
}

export type AcquisitionTiers = {
  direct: AcquisitionTier;
  generic: AcquisitionTier;
  ocr: AcquisitionTier;
};

export type AcquireOptions = {
  forceOcr?: boolean;
};

function meanConfidence(pages: PageRecord[]): number {
  if (pages.length === 0) return 0;
  return pages.reduce((sum, p) => sum + p.confidence, 0) / pages.length;
}

// A tier that breaks its no-throw contract counts as an empty read.
async function runTier(tier: AcquisitionTier, doc: DocumentSource, log: Logger): Promise<PageRecord[]> {
  try {
    return await tier.extract(doc);
  } catch (e) {
    log.error(`acquire.${tier.name}.failed`, { error: getErrorMessage(e) });
    return [];
  }
}

/**
 * Runs the tiers in fallback order: direct, generic when direct is empty and not flagged,
 * then OCR when flagged or still empty.
 */
export class AcquisitionSelector {
  constructor(
    private readonly tiers: AcquisitionTiers,
    private readonly ocrThreshold: number = DEFAULT_OCR_THRESHOLD,
  ) {}

  async acquire(doc: DocumentSource, opts: AcquireOptions = {}): Promise<AcquisitionOutcome> {
    const log = getLogger('core').child({ document: doc.path });
    const states: AcquisitionState[] = ['init'];
    let pages: PageRecord[] = [];
    let ocrUsed = Boolean(opts.forceOcr);

    if (!opts.forceOcr) {
      pages = await runTier(this.tiers.direct, doc, log);
      states.push('direct_attempted');
      const avg = meanConfidence(pages);
      log.debug('acquire.direct.result', { pages: pages.length, avg_confidence: avg });
      // An empty read scores 0, so it flags OCR for any positive threshold.
      if (avg < this.ocrThreshold) {
        log.warn('acquire.ocr.flagged', { pages: pages.length, avg_confidence: avg, threshold: this.ocrThreshold });
        ocrUsed = true;
      }
    }

    if (pages.length === 0 && !ocrUsed) {
      log.info('acquire.generic.start');
      pages = await runTier(this.tiers.generic, doc, log);
      states.push('generic_attempted');
    }

    if (ocrUsed || pages.length === 0) {
      log.info('acquire.ocr.start', { forced: Boolean(opts.forceOcr) });
      pages = await runTier(this.tiers.ocr, doc, log);
      states.push('ocr_attempted');
      ocrUsed = true;
    }

    states.push('done');
    log.info('acquire.complete', { pages: pages.length, ocr_used: ocrUsed, states });
    return { pages, ocrUsed, states };
  }
}

export type AcquisitionBackends = {
  layoutReader?: LayoutTextReader;
  textReader?: PlainTextReader;
  rasterizer?: Rasterizer;
  recognizer?: TextRecognizer;
};

async function optional<T>(label: string, load: () => Promise<T>): Promise<T | undefined> {
  const log = getLogger('core');
  try {
    return await load();
  } catch (e) {
    log.warn('backend.unavailable', { backend: label, error: getErrorMessage(e) });
    return undefined;
  }
}

// Resolve every optional backend once; a missing module leaves its capability undefined.
export async function loadAcquisitionBackends(config: PipelineConfig): Promise<AcquisitionBackends> {
  const layoutReader = await optional('pdfjs-dist', () => import('./pdf').then((m) => m.createPdfjsLayoutReader()));
  const textReader = await optional('pdf-parse', () => import('./text').then((m) => m.createPdfParseTextReader()));
  const rasterizer = await optional('mupdf', () => import('./raster').then((m) => m.createMupdfRasterizer(config.rasterScale)));
  const recognizer = await optional('tesseract.js', () =>
    import('./image').then((m) => m.createTesseractRecognizer({ lang: config.ocrLang, langPath: config.ocrLangPath })),
  );
  return { layoutReader, textReader, rasterizer, recognizer };
}

export { estimatePageConfidence } from './confidence';
export { DirectTier, GenericTier, OcrTier } from './tiers';
export { layoutPageFromItems } from './pdf';
export type { PdfTextItem } from './pdf';
export type * from './types';
