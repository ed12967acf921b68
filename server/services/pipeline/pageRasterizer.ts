import { pdfToPng } from "pdf-to-png-converter";

export interface RasterizedPage {
  pageIndex: number;
  png: Buffer;
  /** Pixel dimensions of `png`. */
  width: number;
  height: number;
}

export interface PageRasterizer {
  render(bytes: Buffer, pageIndex: number, dpi: number): Promise<RasterizedPage>;
}

const POINTS_PER_INCH = 72;

export class PdfToPngRasterizer implements PageRasterizer {
  async render(bytes: Buffer, pageIndex: number, dpi: number): Promise<RasterizedPage> {
    const [page] = await pdfToPng(bytes, {
      viewportScale: dpi / POINTS_PER_INCH,
      pagesToProcess: [pageIndex + 1],
      disableFontFace: true,
      useSystemFonts: false,
    });
    if (!page?.content) {
      throw new Error(`Page ${pageIndex + 1} could not be rasterized`);
    }
    return {
      pageIndex,
      png: page.content,
      width: page.width,
      height: page.height,
    };
  }
}
