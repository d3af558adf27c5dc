import type { BBox } from "../types";
import type { PageImage, RecognizedPage, RecognizedWord, TextRecognizer } from "./types";

export type TesseractOptions = {
  lang: string; // tesseract codes, "+" or comma separated
  langPath?: string; // optional local traineddata dir
};

export async function createTesseractRecognizer(opts: TesseractOptions): Promise<TextRecognizer> {
  const { createWorker } = await import("tesseract.js");
  const langs = (opts.lang || "eng").trim().replace(/[\s,]+/g, "+");

  return {
    name: "tesseract.js",
    async recognize(image: PageImage): Promise<RecognizedPage> {
      const worker = await createWorker(langs, undefined, {
        langPath: opts.langPath,
        gzip: true,
      });
      try {
        const { data } = await worker.recognize(Buffer.from(image.png));
        const words: RecognizedWord[] = [];
        for (const w of data.words ?? []) {
          const text = w.text.trim();
          if (!text) continue;
          const bbox: BBox = [w.bbox.x0, w.bbox.y0, w.bbox.x1, w.bbox.y1];
          words.push({ text, bbox });
        }
        return { text: data.text.replace(/\r\n/g, "\n"), words };
      } finally {
        await worker.terminate();
      }
    },
  };
}
