// x0, y0, x1, y1 in page coordinates; origin top-left, y grows downward.
export type BBox = [number, number, number, number];

export interface Token {
  text: string;
  bbox: BBox;
}

export type TierName = "direct" | "generic" | "ocr";

export interface PageRecord {
  index: number; // 0-based physical page order, contiguous
  text: string;
  tokens: Token[];
  confidence: number; // 0..1
  tier: TierName;
}

export type CandidateSource = "regex" | "header" | "known_entity" | "model";

export const CANDIDATE_SOURCES: readonly CandidateSource[] = ["regex", "header", "known_entity", "model"];

export interface FieldCandidate {
  fieldName: string;
  value: string;
  confidence: number; // 0..1
  pageNumber: number; // index into the page sequence that produced it
  snippet?: string;
  bbox?: BBox;
  source: CandidateSource;
  metadata: Record<string, unknown>;
}

export interface ExtractionResult {
  sourcePath: string;
  pages: PageRecord[];
  fieldCandidates: FieldCandidate[];
  ocrUsed: boolean;
}

export interface ParsedField {
  name: string;
  value: string;
  confidence: number;
  source: CandidateSource;
  reasoning: string;
}

export interface LineItem {
  description: string;
  quantity: string;
  price: string;
}

export interface ReasoningStep {
  field: string;
  method: string;
  detail: string;
}

export interface ParseResult {
  vendor: ParsedField | null;
  invoiceId: ParsedField | null;
  invoiceDate: ParsedField | null;
  total: ParsedField | null;
  lineItems: LineItem[];
  additionalEntities: ParsedField[];
  reasoningSteps: ReasoningStep[]; // append-only, chronological
}

export interface KnownEntity {
  name: string;
  confidence: number;
  metadata: Record<string, unknown>;
}

// Keyed by vendor identifier; iteration order is the match tie-break.
export type KnownEntityTable = ReadonlyMap<string, KnownEntity>;

export interface RecognizedEntity {
  text: string;
  label: string;
  start: number; // inclusive char offset in the full text
  end: number; // exclusive
  score?: number;
}

export interface EntityRecognizer {
  readonly name: string;
  recognize(text: string): Promise<RecognizedEntity[]>;
}

export interface InvoiceRecord {
  invoiceDate: string;
  invoiceNumber: string;
  address: string;
  description: string;
  amount: string;
  vendorCode: string;
}
