import type { FastifyBaseLogger } from "fastify";
import pLimit from "p-limit";

import type { LanguageCode } from "../../config/pipelineConfig";
import { ProviderError } from "../../errors";
import type { OcrCapability, OcrSpan } from "../providers/capabilities";
import {
  RetryExhaustedError,
  runWithRetry,
  withTimeout,
  type RetryPolicy,
} from "../retryPolicy";
import { blockId } from "./blockExtractor";
import type { PageRasterizer, RasterizedPage } from "./pageRasterizer";
import type { Block, ExtractedDocument, ExtractedPage, JobWarning } from "./types";

export interface OcrFallbackOptions {
  bytes: Buffer;
  rasterizer: PageRasterizer;
  ocr: OcrCapability;
  sourceLang: LanguageCode;
  model: string;
  renderDpi: number;
  retryPolicy: RetryPolicy;
  concurrency: number;
  timeoutMs: number;
  log: FastifyBaseLogger;
  sleep?: (ms: number) => Promise<void>;
}

export interface OcrOutcome {
  pageIndex: number;
  status: "recognized" | "failed";
  blockCount: number;
  attempts: number;
  reason: string | null;
}

export interface OcrFallbackResult {
  document: ExtractedDocument;
  outcomes: OcrOutcome[];
  warnings: JobWarning[];
}

// Span coordinates past this multiple of the page size are image pixels.
const PIXEL_SPACE_FACTOR = 1.25;
const MIN_SPAN_CHARS = 2;
const MIN_SPAN_POINTS = 4;

const round2 = (value: number) => Math.round(value * 100) / 100;

function estimateFontSize(text: string, width: number, height: number): number {
  // Glyphs average about half an em wide on a 1.2 em line.
  const size = Math.sqrt((width * height) / (Math.max(1, text.length) * 0.6));
  return Math.round(Math.min(Math.max(size, 6), 20) * 2) / 2;
}

/**
 * Maps OCR spans onto page geometry. Spans reported in image pixels are scaled
 * to PDF points; short or tiny spans are dropped.
 */
export function spansToBlocks(
  page: Pick<ExtractedPage, "index" | "width" | "height">,
  raster: Pick<RasterizedPage, "width" | "height">,
  spans: OcrSpan[],
): Block[] {
  const maxX = Math.max(0, ...spans.map((span) => Math.max(span.bbox.x0, span.bbox.x1)));
  const maxY = Math.max(0, ...spans.map((span) => Math.max(span.bbox.y0, span.bbox.y1)));
  const pixelSpace =
    maxX > page.width * PIXEL_SPACE_FACTOR || maxY > page.height * PIXEL_SPACE_FACTOR;
  const scaleX = pixelSpace && raster.width > 0 ? page.width / raster.width : 1;
  const scaleY = pixelSpace && raster.height > 0 ? page.height / raster.height : 1;

  const blocks: Block[] = [];
  for (const span of spans) {
    const text = span.text.replace(/\s+/g, " ").trim();
    if (text.length < MIN_SPAN_CHARS) continue;

    const left = Math.max(0, Math.min(span.bbox.x0, span.bbox.x1) * scaleX);
    const top = Math.max(0, Math.min(span.bbox.y0, span.bbox.y1) * scaleY);
    const right = Math.min(page.width, Math.max(span.bbox.x0, span.bbox.x1) * scaleX);
    const bottom = Math.min(page.height, Math.max(span.bbox.y0, span.bbox.y1) * scaleY);
    const width = right - left;
    const height = bottom - top;
    if (width < MIN_SPAN_POINTS || height < MIN_SPAN_POINTS) continue;

    blocks.push({
      id: blockId(page.index, blocks.length),
      pageIndex: page.index,
      bbox: { x: round2(left), y: round2(top), width: round2(width), height: round2(height) },
      sourceText: text,
      translatedText: null,
      confidence: Math.min(Math.max(span.confidence, 0), 1),
      fontHint: { size: estimateFontSize(text, width, height), name: null, color: null },
      origin: "ocr",
      errorTag: null,
    });
  }
  return blocks;
}

async function recognizePage(
  page: ExtractedPage,
  options: OcrFallbackOptions,
): Promise<{ page: ExtractedPage; outcome: OcrOutcome }> {
  const raster = await options.rasterizer.render(options.bytes, page.index, options.renderDpi);

  let spans: OcrSpan[] = [];
  let attempts = 0;
  let reason: string | null = null;
  try {
    const result = await runWithRetry(
      options.retryPolicy,
      () =>
        withTimeout(options.ocr.provider, options.timeoutMs, (signal) =>
          options.ocr.recognize({
            image: raster.png,
            sourceLang: options.sourceLang,
            model: options.model,
            signal,
          }),
        ),
      {
        sleep: options.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          options.log.warn(
            { pageIndex: page.index, attempt, delayMs, err: error },
            "[OCR] Transient provider error, retrying",
          ),
      },
    );
    spans = result.value;
    attempts = result.attempts;
  } catch (error) {
    if (!(error instanceof RetryExhaustedError)) {
      throw error;
    }
    attempts = error.attempts;
    reason =
      error.lastError instanceof ProviderError
        ? `${error.lastError.kind}: ${error.lastError.message}`
        : error.message;
  }

  const blocks = spansToBlocks(page, raster, spans);
  if (!blocks.length) {
    return {
      page: { ...page, ocrStatus: "failed", blocks: [] },
      outcome: {
        pageIndex: page.index,
        status: "failed",
        blockCount: 0,
        attempts,
        reason: reason ?? "no usable text spans",
      },
    };
  }
  return {
    page: { ...page, ocrStatus: "recognized", blocks },
    outcome: {
      pageIndex: page.index,
      status: "recognized",
      blockCount: blocks.length,
      attempts,
      reason: null,
    },
  };
}

/**
 * Runs OCR over every scan-like page still pending recognition. A page that
 * yields nothing usable is marked failed and reported as an `ocr_failed`
 * warning; non-transient provider errors propagate.
 */
export async function recognizeScanPages(
  document: ExtractedDocument,
  options: OcrFallbackOptions,
): Promise<OcrFallbackResult> {
  const limit = pLimit(Math.max(1, options.concurrency));
  const pending = document.pages.filter(
    (page) => page.classification === "scan" && page.ocrStatus === "pending",
  );
  if (!pending.length) {
    return { document, outcomes: [], warnings: [] };
  }

  options.log.info({ pages: pending.map((page) => page.index) }, "[OCR] Recognizing scan pages");
  const results = await Promise.all(
    pending.map((page) => limit(() => recognizePage(page, options))),
  );

  const replaced = new Map(
    results.map((result): [number, ExtractedPage] => [result.page.index, result.page]),
  );
  const outcomes = results
    .map((result) => result.outcome)
    .sort((a, b) => a.pageIndex - b.pageIndex);
  const warnings: JobWarning[] = outcomes
    .filter((outcome) => outcome.status === "failed")
    .map((outcome): JobWarning => ({
      code: "ocr_failed",
      pageIndex: outcome.pageIndex,
      message: `OCR found no usable text on page ${outcome.pageIndex + 1} (${outcome.reason ?? "unknown"})`,
    }));

  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      options.log.warn({ ...outcome }, "[OCR] Page yielded no usable text");
    } else {
      options.log.info({ ...outcome }, "[OCR] Page recognized");
    }
  }

  return {
    document: {
      ...document,
      pages: document.pages.map((page) => replaced.get(page.index) ?? page),
    },
    outcomes,
    warnings,
  };
}
