import PDFDocument from "pdfkit";

import { ReconstructionError, describeError } from "../../errors";
import { fitTextToBox, type TextMeasurer } from "./textFit";
import type { Block, ExtractedDocument, ExtractedPage } from "./types";

export interface ReconstructOptions {
  /** Rasterized PNG of the source page, by page index. Required for scan pages. */
  backgrounds: Map<number, Buffer>;
  fontPath: string | null;
  minFontSize: number;
  maxFontSize: number;
  title?: string;
}

export interface ReconstructResult {
  pdf: Buffer;
  clippedBlocks: string[];
  shrunkBlocks: string[];
}

const BODY_FONT = "body";
const FALLBACK_FONT = "Helvetica";
const CLIP_MARKER_SIZE = 4;
const CLIP_MARKER_COLOR = "#d32f2f";
const DEFAULT_TEXT_COLOR = "#000000";

const pdfkitMeasurer = (doc: PDFKit.PDFDocument): TextMeasurer => ({
  heightOf(text, fontSize, width) {
    doc.fontSize(fontSize);
    return doc.heightOfString(text, { width, lineGap: 0 });
  },
});

function drawBackground(doc: PDFKit.PDFDocument, page: ExtractedPage, image: Buffer) {
  doc.image(image, 0, 0, { width: page.width, height: page.height });
}

const renderedText = (block: Block): string =>
  block.translatedText && block.translatedText.trim()
    ? block.translatedText
    : block.sourceText;

function drawBlock(
  doc: PDFKit.PDFDocument,
  block: Block,
  options: ReconstructOptions,
  whiteOut: boolean,
): { clipped: boolean; shrunk: boolean } {
  const { x, y, width, height } = block.bbox;
  const text = renderedText(block);
  if (whiteOut) {
    doc.save().rect(x, y, width, height).fill("#ffffff").restore();
  }
  if (!text.trim() || width <= 0 || height <= 0) {
    return { clipped: false, shrunk: false };
  }

  const fit = fitTextToBox(text, block.bbox, pdfkitMeasurer(doc), {
    preferredSize: block.fontHint.size,
    minFontSize: options.minFontSize,
    maxFontSize: options.maxFontSize,
  });

  doc.save();
  doc.rect(x, y, width, height).clip();
  doc
    .fillColor(block.fontHint.color ?? DEFAULT_TEXT_COLOR)
    .fontSize(fit.fontSize)
    .text(text, x, y, {
      width,
      height: fit.maxHeight,
      ellipsis: fit.clipped,
      lineGap: 0,
    });
  doc.restore();

  if (fit.clipped) {
    doc
      .save()
      .rect(x + width - CLIP_MARKER_SIZE, y, CLIP_MARKER_SIZE, CLIP_MARKER_SIZE)
      .fill(CLIP_MARKER_COLOR)
      .restore();
  }
  return { clipped: fit.clipped, shrunk: fit.shrunk };
}

/**
 * Writes one output page per source page at the original size. A page with a
 * raster keeps it as background and each block is painted white before its
 * text is placed; pages whose OCR failed are reproduced from the raster alone.
 */
export async function reconstructDocument(
  document: ExtractedDocument,
  options: ReconstructOptions,
): Promise<ReconstructResult> {
  const clippedBlocks: string[] = [];
  const shrunkBlocks: string[] = [];

  try {
    const pdf = await new Promise<Buffer>((resolve, reject) => {
      const doc = new PDFDocument({ autoFirstPage: false, margin: 0 });
      const chunks: Buffer[] = [];

      doc.on("data", (chunk: Buffer) => {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      });
      doc.on("error", reject);
      doc.on("end", () => {
        resolve(Buffer.concat(chunks));
      });

      try {
        if (options.title) {
          doc.info.Title = options.title;
        }
        if (options.fontPath) {
          doc.registerFont(BODY_FONT, options.fontPath);
          doc.font(BODY_FONT);
        } else {
          doc.font(FALLBACK_FONT);
        }

        for (const page of document.pages) {
          doc.addPage({ size: [page.width, page.height], margin: 0 });
          const background = options.backgrounds.get(page.index);
          if (page.classification === "scan" && !background) {
            throw new ReconstructionError(
              `Missing page image for scan page ${page.index + 1}`,
            );
          }
          if (background) {
            drawBackground(doc, page, background);
          }
          if (page.classification === "scan" && page.ocrStatus !== "recognized") continue;

          for (const block of page.blocks) {
            const drawn = drawBlock(doc, block, options, background !== undefined);
            if (drawn.clipped) clippedBlocks.push(block.id);
            if (drawn.shrunk) shrunkBlocks.push(block.id);
          }
        }
        doc.end();
      } catch (error) {
        reject(error);
      }
    });

    return { pdf, clippedBlocks, shrunkBlocks };
  } catch (error) {
    if (error instanceof ReconstructionError) throw error;
    throw new ReconstructionError(`PDF assembly failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
