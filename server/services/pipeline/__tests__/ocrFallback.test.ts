import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { ProviderError } from "../../../errors";
import { createSilentLogger } from "../../../logger";
import { FakeOcr, FakeRasterizer, noSleep } from "../../../testing/fakes";
import { createRetryPolicy } from "../../retryPolicy";
import { recognizeScanPages, spansToBlocks, type OcrFallbackOptions } from "../ocrFallback";
import type { ExtractedDocument, ExtractedPage } from "../types";

const page = (index: number, classification: "text" | "scan"): ExtractedPage => ({
  index,
  width: 612,
  height: 792,
  classification,
  textConfidence: classification === "text" ? 1 : 0,
  characterCount: classification === "text" ? 120 : 0,
  ocrStatus: classification === "text" ? "not_needed" : "pending",
  blocks: [],
});

const fallbackOptions = (
  ocr: FakeOcr,
  rasterizer = new FakeRasterizer((index) => Buffer.from(`page-${index}`), {
    width: 1224,
    height: 1584,
  }),
): OcrFallbackOptions => ({
  bytes: Buffer.from("%PDF-1.7"),
  rasterizer,
  ocr,
  sourceLang: "en",
  model: "ocr-model",
  renderDpi: 144,
  retryPolicy: createRetryPolicy({ maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, factor: 2 }),
  concurrency: 2,
  timeoutMs: 1_000,
  log: createSilentLogger(),
  sleep: noSleep,
});

describe("spansToBlocks", () => {
  test("keeps point-space spans, normalizes boxes and drops fragments", () => {
    const blocks = spansToBlocks({ index: 2, width: 612, height: 792 }, { width: 1, height: 1 }, [
      { text: "Invoice total", bbox: { x0: 250, y0: 80, x1: 50, y1: 60 }, confidence: 0.9 },
      { text: "  Due   date ", bbox: { x0: 50, y0: 100, x1: 150, y1: 104 }, confidence: 1.4 },
      { text: "tiny", bbox: { x0: 10, y0: 10, x1: 13, y1: 30 }, confidence: 1 },
      { text: "x", bbox: { x0: 10, y0: 200, x1: 100, y1: 240 }, confidence: 1 },
    ]);
    assert.deepEqual(blocks, [
      {
        id: "p3-b1",
        pageIndex: 2,
        bbox: { x: 50, y: 60, width: 200, height: 20 },
        sourceText: "Invoice total",
        translatedText: null,
        confidence: 0.9,
        fontHint: { size: 20, name: null, color: null },
        origin: "ocr",
        errorTag: null,
      },
      {
        id: "p3-b2",
        pageIndex: 2,
        bbox: { x: 50, y: 100, width: 100, height: 4 },
        sourceText: "Due date",
        translatedText: null,
        confidence: 1,
        fontHint: { size: 9, name: null, color: null },
        origin: "ocr",
        errorTag: null,
      },
    ]);
  });

  test("scales pixel-space spans down to page points", () => {
    const [block] = spansToBlocks(
      { index: 0, width: 612, height: 792 },
      { width: 1224, height: 1584 },
      [{ text: "Scanned paragraph", bbox: { x0: 200, y0: 1000, x1: 1000, y1: 1100 }, confidence: 0.8 }],
    );
    assert.deepEqual(block.bbox, { x: 100, y: 500, width: 400, height: 50 });
  });
});

describe("recognizeScanPages", () => {
  test("recognizes scan pages and warns about the ones that yield nothing", async () => {
    const document: ExtractedDocument = {
      pageCount: 3,
      pages: [page(0, "text"), page(1, "scan"), page(2, "scan")],
    };
    const ocr = new FakeOcr((request) =>
      request.image.toString() === "page-1"
        ? [
            { text: "Scanned paragraph", bbox: { x0: 200, y0: 1000, x1: 1000, y1: 1100 }, confidence: 0.8 },
            { text: "x", bbox: { x0: 10, y0: 10, x1: 20, y1: 20 }, confidence: 1 },
          ]
        : [],
    );
    const rasterizer = new FakeRasterizer((index) => Buffer.from(`page-${index}`), {
      width: 1224,
      height: 1584,
    });

    const result = await recognizeScanPages(document, fallbackOptions(ocr, rasterizer));

    assert.deepEqual(result.outcomes, [
      { pageIndex: 1, status: "recognized", blockCount: 1, attempts: 1, reason: null },
      { pageIndex: 2, status: "failed", blockCount: 0, attempts: 1, reason: "no usable text spans" },
    ]);
    assert.deepEqual(result.warnings, [
      {
        code: "ocr_failed",
        pageIndex: 2,
        message: "OCR found no usable text on page 3 (no usable text spans)",
      },
    ]);
    const [textPage, recognized, failed] = result.document.pages;
    assert.deepEqual(textPage, document.pages[0]);
    assert.equal(recognized.ocrStatus, "recognized");
    assert.deepEqual(
      recognized.blocks.map((block) => [block.id, block.sourceText, block.bbox]),
      [["p2-b1", "Scanned paragraph", { x: 100, y: 500, width: 400, height: 50 }]],
    );
    assert.equal(failed.ocrStatus, "failed");
    assert.deepEqual(failed.blocks, []);
    assert.equal(ocr.calls[0].model, "ocr-model");
    assert.deepEqual([...rasterizer.calls].sort((a, b) => a - b), [1, 2]);
  });

  test("marks a page failed once transient errors use up the retries", async () => {
    const ocr = new FakeOcr(() => {
      throw new ProviderError("unavailable", "upstream down", "fake");
    });
    const result = await recognizeScanPages(
      { pageCount: 1, pages: [page(0, "scan")] },
      fallbackOptions(ocr),
    );
    assert.equal(ocr.calls.length, 2);
    assert.deepEqual(result.outcomes, [
      { pageIndex: 0, status: "failed", blockCount: 0, attempts: 2, reason: "unavailable: upstream down" },
    ]);
    assert.equal(
      result.warnings[0].message,
      "OCR found no usable text on page 1 (unavailable: upstream down)",
    );
  });

  test("lets non-transient provider errors through", async () => {
    const ocr = new FakeOcr(() => {
      throw new ProviderError("auth", "bad key", "fake");
    });
    await assert.rejects(
      recognizeScanPages({ pageCount: 1, pages: [page(0, "scan")] }, fallbackOptions(ocr)),
      (error) => error instanceof ProviderError && error.kind === "auth",
    );
    assert.equal(ocr.calls.length, 1);
  });

  test("leaves documents without pending scan pages untouched", async () => {
    const rasterizer = new FakeRasterizer();
    const document: ExtractedDocument = { pageCount: 1, pages: [page(0, "text")] };
    const result = await recognizeScanPages(document, fallbackOptions(new FakeOcr(), rasterizer));
    assert.equal(result.document, document);
    assert.deepEqual(result.outcomes, []);
    assert.deepEqual(rasterizer.calls, []);
  });
});
