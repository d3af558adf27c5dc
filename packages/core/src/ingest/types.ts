import type { BBox, PageRecord, TierName, Token } from "../types";

export type DocumentSource = {
  path: string;
  data: Uint8Array;
  mimeType: string;
};

// One page as read by a layout-aware reader: text plus word tokens with boxes.
export type LayoutPage = {
  text: string;
  tokens: Token[];
};

export interface LayoutTextReader {
  readonly name: string;
  readPages(doc: DocumentSource): Promise<LayoutPage[]>;
}

// Plain text per page; `null` marks a page the reader could not produce text for.
export interface PlainTextReader {
  readonly name: string;
  readPages(doc: DocumentSource): Promise<Array<string | null>>;
}

export type PageImage = {
  pageIndex: number;
  png: Uint8Array;
  width: number;
  height: number;
};

export interface Rasterizer {
  readonly name: string;
  rasterize(doc: DocumentSource): Promise<PageImage[]>;
}

export type RecognizedWord = {
  text: string;
  bbox: BBox;
};

export type RecognizedPage = {
  text: string;
  words: RecognizedWord[];
};

export interface TextRecognizer {
  readonly name: string;
  recognize(image: PageImage): Promise<RecognizedPage>;
}

export interface AcquisitionTier {
  readonly name: TierName;
  // Never rejects: tier-local faults surface as an empty sequence.
  extract(doc: DocumentSource): Promise<PageRecord[]>;
}

export type AcquisitionState = "init" | "direct_attempted" | "generic_attempted" | "ocr_attempted" | "done";

export type AcquisitionOutcome = {
  pages: PageRecord[];
  ocrUsed: boolean;
  states: AcquisitionState[];
};
