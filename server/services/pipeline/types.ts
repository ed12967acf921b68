import type { LanguageCode } from "../../config/pipelineConfig";

/** Geometry in PDF points, origin at the top-left corner of the page. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type PageClassification = "text" | "scan";
export type OcrStatus = "not_needed" | "pending" | "recognized" | "failed";
export type BlockOrigin = "text_layer" | "ocr";
export type BlockErrorTag = "translation_failed";

export interface FontHint {
  size: number;
  name: string | null;
  /** `#rrggbb` fill colour of the source text, when known. */
  color: string | null;
}

export interface Block {
  id: string;
  pageIndex: number;
  bbox: BoundingBox;
  sourceText: string;
  translatedText: string | null;
  confidence: number;
  fontHint: FontHint;
  origin: BlockOrigin;
  errorTag: BlockErrorTag | null;
}

export interface ExtractedPage {
  index: number;
  width: number;
  height: number;
  classification: PageClassification;
  textConfidence: number;
  characterCount: number;
  ocrStatus: OcrStatus;
  blocks: Block[];
}

export interface ExtractedDocument {
  pageCount: number;
  pages: ExtractedPage[];
}

export type JobWarningCode = "ocr_failed" | "translation_failed";

export interface JobWarning {
  code: JobWarningCode;
  pageIndex: number | null;
  blockIds?: string[];
  message: string;
}

export interface LanguagePair {
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
}

export const countBlocks = (document: ExtractedDocument): number =>
  document.pages.reduce((sum, page) => sum + page.blocks.length, 0);

export const allBlocks = (document: ExtractedDocument): Block[] =>
  document.pages.flatMap((page) => page.blocks);
