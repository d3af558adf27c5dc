import type { DocumentSource, PageImage, Rasterizer } from "./types";

// Renders every page (or the single frame of an image file) to PNG through MuPDF's WASM build.
export async function createMupdfRasterizer(scale = 2): Promise<Rasterizer> {
  const mupdf = await import("mupdf");

  return {
    name: "mupdf",
    async rasterize(doc: DocumentSource): Promise<PageImage[]> {
      const document = mupdf.Document.openDocument(doc.data, doc.mimeType);
      const images: PageImage[] = [];
      const count = document.countPages();
      for (let i = 0; i < count; i++) {
        const page = document.loadPage(i);
        const pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false, true);
        images.push({
          pageIndex: i,
          png: pixmap.asPNG(),
          width: pixmap.getWidth(),
          height: pixmap.getHeight(),
        });
      }
      return images;
    },
  };
}
