import { OPS, getDocument } from "pdfjs-dist";
import type {
  PDFDocumentProxy,
  PDFPageProxy,
  TextItem,
  TextMarkedContent,
} from "pdfjs-dist/types/src/display/api";

import { UnsupportedDocumentError } from "../../errors";
import type { Block, BoundingBox, ExtractedDocument, ExtractedPage } from "./types";

export interface ExtractionOptions {
  pageLimit: number;
  minTextDensity: number;
  ocrConfidenceThreshold: number;
  onPage?: (pageIndex: number) => Promise<void> | void;
}

// Glyph ascent and descent as a share of the font size.
const ASCENT = 0.8;
const DESCENT = 0.2;
const BLOCK_GAP_FACTOR = 0.8;
const DENSITY_AREA = 10_000;
// Glyphs searched ahead when matching text items to drawn glyphs.
const COLOR_LOOKAHEAD = 64;
const DEFAULT_FILL = "#000000";

interface PositionedItem {
  text: string;
  x: number;
  baseline: number;
  width: number;
  size: number;
  fontName: string | null;
  color: string | null;
}

interface TextLine {
  items: PositionedItem[];
  baseline: number;
  left: number;
  right: number;
  size: number;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

const isPdfHeader = (bytes: Buffer) =>
  bytes.subarray(0, 1024).toString("latin1").includes("%PDF-");

const isTextItem = (item: TextItem | TextMarkedContent): item is TextItem =>
  "str" in item;

function isPrintable(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  if (code === 0xfffd) return false;
  if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) return false;
  if (code >= 0xe000 && code <= 0xf8ff) return false;
  if (code >= 0xf0000) return false;
  return true;
}

/**
 * Share of printable characters among the non-whitespace characters of `text`.
 * Empty input scores 0.
 */
export function measureTextConfidence(text: string): { characters: number; confidence: number } {
  let characters = 0;
  let printable = 0;
  for (const char of text) {
    if (/\s/.test(char)) continue;
    characters += 1;
    if (isPrintable(char)) printable += 1;
  }
  return {
    characters,
    confidence: characters ? printable / characters : 0,
  };
}

async function openPdf(bytes: Buffer): Promise<PDFDocumentProxy> {
  if (!bytes.length) {
    throw new UnsupportedDocumentError("empty", "Uploaded file is empty");
  }
  if (!isPdfHeader(bytes)) {
    throw new UnsupportedDocumentError("not_pdf", "File is not a PDF document");
  }

  // pdf.js takes ownership of the array it is given.
  const task = getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    disableFontFace: true,
    useSystemFonts: false,
    verbosity: 0,
  });
  try {
    return await task.promise;
  } catch (error) {
    await task.destroy();
    const name = error instanceof Error ? error.name : "";
    if (name === "PasswordException") {
      throw new UnsupportedDocumentError("encrypted", "PDF is password protected");
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new UnsupportedDocumentError("unreadable", `PDF could not be parsed: ${detail}`);
  }
}

function assertPageCount(pageCount: number, pageLimit: number) {
  if (pageCount === 0) {
    throw new UnsupportedDocumentError("empty", "PDF has no pages");
  }
  if (pageCount > pageLimit) {
    throw new UnsupportedDocumentError(
      "too_many_pages",
      `PDF has ${pageCount} pages; the limit is ${pageLimit}`,
    );
  }
}

/** Opens the document and checks the page count without reading any page. */
export async function inspectDocument(
  bytes: Buffer,
  pageLimit: number,
): Promise<{ pageCount: number }> {
  const pdf = await openPdf(bytes);
  try {
    assertPageCount(pdf.numPages, pageLimit);
    return { pageCount: pdf.numPages };
  } finally {
    await pdf.destroy();
  }
}

interface ColoredGlyph {
  char: string;
  color: string;
}

const hexByte = (value: number) =>
  Math.max(0, Math.min(255, Math.round(value))).toString(16).padStart(2, "0");

function toHexColor(args: unknown): string | null {
  const values: unknown[] = Array.isArray(args)
    ? args
    : args instanceof Uint8ClampedArray
      ? Array.from(args)
      : [];
  const [first] = values;
  if (typeof first === "string" && /^#[0-9a-f]{6}$/i.test(first)) {
    return first.toLowerCase();
  }
  const rgb = values.slice(0, 3).filter((value): value is number => typeof value === "number");
  return rgb.length === 3 ? `#${rgb.map(hexByte).join("")}` : null;
}

function glyphChars(glyphs: unknown): string[] {
  if (!Array.isArray(glyphs)) return [];
  const chars: string[] = [];
  for (const glyph of glyphs) {
    if (
      typeof glyph === "object" &&
      glyph !== null &&
      "unicode" in glyph &&
      typeof glyph.unicode === "string"
    ) {
      for (const char of glyph.unicode) {
        if (!/\s/.test(char)) chars.push(char);
      }
    }
  }
  return chars;
}

const TEXT_OPS = new Set<number>([
  OPS.showText,
  OPS.showSpacedText,
  OPS.nextLineShowText,
  OPS.nextLineSetSpacingShowText,
]);

/** Non-whitespace glyphs in drawing order with the fill colour in effect. */
async function readGlyphColors(page: PDFPageProxy): Promise<ColoredGlyph[]> {
  const { fnArray, argsArray } = await page.getOperatorList();
  const glyphs: ColoredGlyph[] = [];
  const stack: string[] = [];
  let fill = DEFAULT_FILL;

  fnArray.forEach((fn, index) => {
    const args: unknown = argsArray[index];
    if (fn === OPS.save) {
      stack.push(fill);
    } else if (fn === OPS.restore) {
      fill = stack.pop() ?? DEFAULT_FILL;
    } else if (fn === OPS.setFillRGBColor) {
      fill = toHexColor(args) ?? fill;
    } else if (TEXT_OPS.has(fn) && Array.isArray(args)) {
      for (const char of glyphChars(args[args.length - 1])) {
        glyphs.push({ char, color: fill });
      }
    }
  });
  return glyphs;
}

/**
 * Colour of the first glyph of each item, matched in order against the drawn
 * glyphs. Items that cannot be matched get null.
 */
function matchItemColors(texts: string[], glyphs: ColoredGlyph[]): Array<string | null> {
  let cursor = 0;
  return texts.map((text) => {
    let color: string | null = null;
    for (const char of text) {
      if (/\s/.test(char)) continue;
      const end = Math.min(glyphs.length, cursor + COLOR_LOOKAHEAD);
      for (let index = cursor; index < end; index += 1) {
        if (glyphs[index].char === char) {
          if (color === null) color = glyphs[index].color;
          cursor = index + 1;
          break;
        }
      }
    }
    return color;
  });
}

async function readPositionedItems(
  page: PDFPageProxy,
  viewportTransform: number[],
): Promise<PositionedItem[]> {
  const content = await page.getTextContent();
  const textItems = content.items.filter(isTextItem).filter((item) => item.str);
  const colors = matchItemColors(
    textItems.map((item) => item.str),
    textItems.length ? await readGlyphColors(page) : [],
  );
  const [a, b, c, d, e, f] = viewportTransform;
  const items: PositionedItem[] = [];

  textItems.forEach((item, index) => {
    const [, , tc, td, tx, ty] = item.transform.map(Number);
    const size = Math.hypot(tc, td) || Number(item.height) || 0;
    if (size <= 0) return;
    const style = content.styles[item.fontName];
    items.push({
      text: item.str,
      x: a * tx + c * ty + e,
      baseline: b * tx + d * ty + f,
      width: Math.abs(Number(item.width)),
      size,
      fontName: style?.fontFamily || item.fontName || null,
      color: colors[index] ?? null,
    });
  });
  return items;
}

function groupLines(items: PositionedItem[]): TextLine[] {
  const lines: TextLine[] = [];
  let current: TextLine | null = null;

  for (const item of items) {
    const sameLine =
      current !== null &&
      Math.abs(item.baseline - current.baseline) <= current.size * 0.5 &&
      item.x >= current.right - current.size;
    if (current && sameLine) {
      current.items.push(item);
      current.right = Math.max(current.right, item.x + item.width);
      current.left = Math.min(current.left, item.x);
      current.size = Math.max(current.size, item.size);
      continue;
    }
    current = {
      items: [item],
      baseline: item.baseline,
      left: item.x,
      right: item.x + item.width,
      size: item.size,
    };
    lines.push(current);
  }

  return lines.filter((line) => line.items.some((item) => item.text.trim()));
}

function lineText(line: TextLine): string {
  let text = "";
  let previousEnd: number | null = null;
  for (const item of line.items) {
    const gap = previousEnd === null ? 0 : item.x - previousEnd;
    if (
      text &&
      gap > line.size * 0.15 &&
      !/\s$/.test(text) &&
      !/^\s/.test(item.text)
    ) {
      text += " ";
    }
    text += item.text;
    previousEnd = item.x + item.width;
  }
  return text.replace(/\s+/g, " ").trim();
}

const lineTop = (line: TextLine) => line.baseline - line.size * ASCENT;
const lineBottom = (line: TextLine) => line.baseline + line.size * DESCENT;

function belongsToBlock(block: TextLine[], line: TextLine): boolean {
  const previous = block[block.length - 1];
  const ratio = line.size / previous.size;
  if (ratio < 0.8 || ratio > 1.25) return false;

  const gap = lineTop(line) - lineBottom(previous);
  const lineHeight = previous.size * (ASCENT + DESCENT);
  if (gap < -lineHeight * 0.5 || gap >= lineHeight * BLOCK_GAP_FACTOR) return false;

  const left = Math.min(...block.map((entry) => entry.left));
  const right = Math.max(...block.map((entry) => entry.right));
  return line.left < right && line.right > left;
}

function groupBlocks(lines: TextLine[]): TextLine[][] {
  const blocks: TextLine[][] = [];
  for (const line of lines) {
    const current = blocks[blocks.length - 1];
    if (current && belongsToBlock(current, line)) {
      current.push(line);
    } else {
      blocks.push([line]);
    }
  }
  return blocks;
}

function blockBox(lines: TextLine[]): BoundingBox {
  const left = Math.min(...lines.map((line) => line.left));
  const right = Math.max(...lines.map((line) => line.right));
  const top = Math.min(...lines.map(lineTop));
  const bottom = Math.max(...lines.map(lineBottom));
  return {
    x: round2(left),
    y: round2(top),
    width: round2(right - left),
    height: round2(bottom - top),
  };
}

export const blockId = (pageIndex: number, ordinal: number) =>
  `p${pageIndex + 1}-b${ordinal + 1}`;

async function extractPage(
  pdf: PDFDocumentProxy,
  pageIndex: number,
  options: ExtractionOptions,
): Promise<ExtractedPage> {
  const page = await pdf.getPage(pageIndex + 1);
  try {
    const viewport = page.getViewport({ scale: 1 });
    const width = round2(viewport.width);
    const height = round2(viewport.height);
    const items = await readPositionedItems(page, viewport.transform);

    const { characters, confidence } = measureTextConfidence(
      items.map((item) => item.text).join(" "),
    );
    const density = (characters * DENSITY_AREA) / (width * height);
    const textBearing =
      density > options.minTextDensity &&
      confidence >= options.ocrConfidenceThreshold;

    const base = {
      index: pageIndex,
      width,
      height,
      textConfidence: round2(confidence),
      characterCount: characters,
    };
    if (!textBearing) {
      return { ...base, classification: "scan", ocrStatus: "pending", blocks: [] };
    }

    const blocks: Block[] = groupBlocks(groupLines(items))
      .map((lines) => ({
        lines,
        text: lines.map(lineText).filter(Boolean).join(" "),
      }))
      .filter((entry) => entry.text.length > 0)
      .map((entry, ordinal): Block => {
        const sizes = entry.lines.map((line) => line.size);
        return {
          id: blockId(pageIndex, ordinal),
          pageIndex,
          bbox: blockBox(entry.lines),
          sourceText: entry.text,
          translatedText: null,
          confidence: round2(confidence),
          fontHint: {
            size: round2(sizes.reduce((sum, size) => sum + size, 0) / sizes.length),
            name: entry.lines[0].items[0]?.fontName ?? null,
            color:
              entry.lines.flatMap((line) => line.items).find((item) => item.color)?.color ??
              null,
          },
          origin: "text_layer",
          errorTag: null,
        };
      });

    return { ...base, classification: "text", ocrStatus: "not_needed", blocks };
  } finally {
    page.cleanup();
  }
}

/**
 * Reads every page's text layer into positioned blocks and classifies pages as
 * text-bearing or scan-like. Scan-like pages come back without blocks and with
 * `ocrStatus = pending`.
 */
export async function extractDocument(
  bytes: Buffer,
  options: ExtractionOptions,
): Promise<ExtractedDocument> {
  const pdf = await openPdf(bytes);
  try {
    assertPageCount(pdf.numPages, options.pageLimit);
    const pages: ExtractedPage[] = [];
    for (let index = 0; index < pdf.numPages; index += 1) {
      pages.push(await extractPage(pdf, index, options));
      await options.onPage?.(index);
    }
    return { pageCount: pdf.numPages, pages };
  } finally {
    await pdf.destroy();
  }
}
