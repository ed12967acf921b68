import type { LanguageCode } from "../../config/pipelineConfig";

export interface TranslationRequest {
  segments: string[];
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  model: string;
  signal?: AbortSignal;
}

export interface TranslationResult {
  /** Positionally aligned with the request segments when the model behaves. */
  segments: string[];
  /** Self-reported by the model, 0..1. */
  confidence: number;
  model: string;
}

export interface TranslationCapability {
  readonly provider: string;
  translate(request: TranslationRequest): Promise<TranslationResult>;
}

export interface OcrSpan {
  text: string;
  bbox: { x0: number; y0: number; x1: number; y1: number };
  confidence: number;
}

export interface OcrRequest {
  image: Buffer;
  sourceLang: LanguageCode;
  model: string;
  signal?: AbortSignal;
}

export interface OcrCapability {
  readonly provider: string;
  recognize(request: OcrRequest): Promise<OcrSpan[]>;
}

export interface ModelProviders {
  translator: TranslationCapability;
  ocr: OcrCapability;
}
