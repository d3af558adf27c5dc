import type { TextItem, TextMarkedContent } from "pdfjs-dist/types/src/display/api";
import type { BBox, Token } from "../types";
import type { DocumentSource, LayoutPage, LayoutTextReader } from "./types";
import { getLogger } from "../logger";
import { getErrorMessage } from "../errors";

export type PdfTextItem = {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
};

type PositionedItem = PdfTextItem & { x: number; y: number };

function clusterItemsIntoLines(items: PdfTextItem[]) {
  const lineTolerance = 3; // points
  const lines: Array<{ y: number; items: PositionedItem[] }> = [];
  for (const raw of items) {
    if (!raw.str) continue;
    const x = Number(raw.transform[4] ?? 0);
    const y = Number(raw.transform[5] ?? 0);
    let line = lines.find((ln) => Math.abs(ln.y - y) <= lineTolerance);
    if (!line) {
      line = { y, items: [] };
      lines.push(line);
    }
    line.items.push({ ...raw, x, y });
  }

  // Sort top-to-bottom (PDF origin bottom-left)
  lines.sort((a, b) => b.y - a.y);

  return lines;
}

function itemWidth(item: PdfTextItem, text: string): number {
  const rawWidth = Number(item.width ?? Math.abs(item.transform[0] ?? 0));
  return rawWidth || text.length * 4;
}

// Split a text run into word tokens, spreading the run's width evenly across characters.
function wordTokens(text: string, left: number, width: number, top: number, bottom: number): Token[] {
  const charWidth = text.length ? width / text.length : 0;
  const tokens: Token[] = [];
  for (const m of text.matchAll(/\S+/g)) {
    const offset = m.index ?? 0;
    const x0 = left + offset * charWidth;
    const bbox: BBox = [x0, top, x0 + m[0].length * charWidth, bottom];
    tokens.push({ text: m[0], bbox });
  }
  return tokens;
}

/**
 * Rebuild a page from positioned text runs. Wide gaps become tabs, word gaps spaces.
 * Boxes are flipped to a top-left origin.
 */
export function layoutPageFromItems(items: PdfTextItem[], viewportHeight: number): LayoutPage {
  const defaultWordGap = 2.5;
  const defaultColumnGap = 12;
  let buffer = "";
  const tokens: Token[] = [];

  for (const line of clusterItemsIntoLines(items)) {
    if (buffer.length && !buffer.endsWith("\n")) buffer += "\n";
    let prevRight: number | null = null;
    const sorted = line.items.slice().sort((a, b) => a.x - b.x);
    let totalWidth = 0;
    let totalChars = 0;
    for (const item of sorted) {
      const normalized = item.str.replace(/[\u00A0]/g, " ");
      totalWidth += itemWidth(item, normalized);
      totalChars += normalized.replace(/\s+/g, "").length || normalized.length;
    }
    const avgCharWidth = totalChars ? totalWidth / totalChars : 0;
    const wordGapThreshold = Math.max(defaultWordGap, avgCharWidth * 0.6);
    const columnGapThreshold = Math.max(defaultColumnGap, avgCharWidth * 3.5);
    for (const item of sorted) {
      const text = item.str.replace(/[\u00A0]/g, " ");
      const width = itemWidth(item, text);
      const height = Number(item.height ?? Math.abs(item.transform[3] ?? 0));
      if (prevRight !== null) {
        const gap = item.x - prevRight;
        if (gap > columnGapThreshold) {
          buffer += "\t";
        } else if (gap > wordGapThreshold) {
          buffer += " ";
        }
      }
      buffer += text;
      const bottom = viewportHeight - item.y;
      tokens.push(...wordTokens(text, item.x, width, bottom - (height || 0), bottom));
      prevRight = item.x + width;
    }
  }

  return { text: buffer, tokens };
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return "str" in item;
}

export async function createPdfjsLayoutReader(): Promise<LayoutTextReader> {
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const log = getLogger("core").child({ tier: "direct" });

  return {
    name: "pdfjs",
    async readPages(doc: DocumentSource): Promise<LayoutPage[]> {
      // pdfjs may detach the buffer it is handed; give it a copy.
      const task = getDocument({ data: new Uint8Array(doc.data), isEvalSupported: false });
      const pdf = await task.promise;
      try {
        const pages: LayoutPage[] = [];
        for (let p = 1; p <= pdf.numPages; p++) {
          try {
            const page = await pdf.getPage(p);
            const viewport = page.getViewport({ scale: 1 });
            const content = await page.getTextContent();
            const items: PdfTextItem[] = content.items.filter(isTextItem).map((it) => ({
              str: it.str,
              transform: it.transform,
              width: it.width,
              height: it.height,
            }));
            pages.push(layoutPageFromItems(items, viewport.height));
            page.cleanup();
          } catch (e) {
            log.warn("pdfjs.page.failed", { document: doc.path, page: p - 1, error: getErrorMessage(e) });
            pages.push({ text: "", tokens: [] });
          }
        }
        return pages;
      } finally {
        await pdf.destroy();
      }
    },
  };
}
