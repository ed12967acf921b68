import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { ProviderError, TranslationFailedError } from "../../../errors";
import { createSilentLogger } from "../../../logger";
import { FakeTranslator, noSleep } from "../../../testing/fakes";
import { MemoryPipelineStore } from "../../../testing/memoryStore";
import type { TranslationRequest } from "../../providers/capabilities";
import { createRetryPolicy } from "../../retryPolicy";
import {
  planBatches,
  splitOversizedText,
  translateBlocks,
  type TranslationBatcherOptions,
} from "../translationBatcher";
import type { Block } from "../types";

const block = (id: string, sourceText: string, pageIndex = 0): Block => ({
  id,
  pageIndex,
  bbox: { x: 72, y: 72, width: 300, height: 20 },
  sourceText,
  translatedText: null,
  confidence: 1,
  fontHint: { size: 11, name: null, color: null },
  origin: "text_layer",
  errorTag: null,
});

const batcherOptions = (
  translator: FakeTranslator,
  store: MemoryPipelineStore,
  overrides: Partial<TranslationBatcherOptions> = {},
): TranslationBatcherOptions => ({
  jobId: "job-1",
  sourceLang: "tr",
  targetLang: "en",
  translator,
  primaryModel: "primary-model",
  fallbackModel: "fallback-model",
  maxBatchChars: 3_500,
  maxBatchBlocks: 40,
  lowConfidenceThreshold: 0.6,
  retryPolicy: createRetryPolicy({ maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0, factor: 2 }),
  concurrency: 2,
  timeoutMs: 1_000,
  cache: store.cache,
  batchStore: store.batches,
  log: createSilentLogger(),
  sleep: noSleep,
  ...overrides,
});

const byModel =
  (primary: { prefix: string; confidence: number }, fallback: { prefix: string; confidence: number } | "misaligned") =>
  (request: TranslationRequest) => {
    if (request.model === "primary-model") {
      return {
        segments: request.segments.map((segment) => `${primary.prefix}${segment}`),
        confidence: primary.confidence,
        model: request.model,
      };
    }
    if (fallback === "misaligned") {
      return { segments: [], confidence: 0.9, model: request.model };
    }
    return {
      segments: request.segments.map((segment) => `${fallback.prefix}${segment}`),
      confidence: fallback.confidence,
      model: request.model,
    };
  };

const failOn = (text: string, error: () => ProviderError) => (request: TranslationRequest) => {
  if (request.segments.includes(text)) throw error();
  return {
    segments: request.segments.map((segment) => `EN: ${segment}`),
    confidence: 0.95,
    model: request.model,
  };
};

describe("splitOversizedText", () => {
  test("cuts at the last space inside the limit", () => {
    assert.deepEqual(splitOversizedText("aaa bbb ccc", 7), ["aaa bbb", "ccc"]);
  });

  test("hard-cuts text without usable spaces", () => {
    assert.deepEqual(splitOversizedText("abcdefghij", 4), ["abcd", "efgh", "ij"]);
  });
});

describe("planBatches", () => {
  const blocks = [block("b1", "a".repeat(10)), block("b2", "b".repeat(10)), block("b3", "c".repeat(10))];

  test("closes a batch before it would exceed the character bound", () => {
    const plan = planBatches(blocks, { maxBatchChars: 25, maxBatchBlocks: 10 });
    assert.deepEqual(
      plan.map((batch) => [batch.items.map((item) => item.blockId), batch.chars]),
      [
        [["b1", "b2"], 20],
        [["b3"], 10],
      ],
    );
  });

  test("closes a batch at the block bound", () => {
    const plan = planBatches(blocks, { maxBatchChars: 1_000, maxBatchBlocks: 1 });
    assert.deepEqual(plan.map((batch) => batch.items.map((item) => item.blockId)), [["b1"], ["b2"], ["b3"]]);
  });

  test("splits oversized blocks into ordered pieces with stable keys", () => {
    const long = [block("long", "aaaa bbbb cccc dddd eeee ffff")];
    const plan = planBatches(long, { maxBatchChars: 10, maxBatchBlocks: 10 });
    assert.deepEqual(
      plan.map((batch) => batch.items.map((item) => [item.piece, item.text])),
      [[[0, "aaaa bbbb"]], [[1, "cccc dddd"]], [[2, "eeee ffff"]]],
    );
    assert.deepEqual(
      planBatches(long, { maxBatchChars: 10, maxBatchBlocks: 10 }).map((batch) => batch.key),
      plan.map((batch) => batch.key),
    );
  });
});

describe("translateBlocks", () => {
  const blocks = [block("p1-b1", "Merhaba dunya"), block("p1-b2", "Rapor ozeti")];

  test("translates blocks with the primary model and caches confident results", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator();

    const outcome = await translateBlocks(blocks, batcherOptions(translator, store));

    assert.deepEqual(
      outcome.blocks.map((entry) => [entry.id, entry.translatedText, entry.errorTag]),
      [
        ["p1-b1", "EN: Merhaba dunya", null],
        ["p1-b2", "EN: Rapor ozeti", null],
      ],
    );
    assert.equal(translator.calls.length, 1);
    assert.deepEqual(translator.calls[0].segments, ["Merhaba dunya", "Rapor ozeti"]);
    assert.equal(translator.calls[0].model, "primary-model");
    const [report] = outcome.batches;
    assert.equal(report.resolution, "primary");
    assert.equal(report.attempts, 1);
    assert.equal(report.confidence, 0.95);
    assert.deepEqual(outcome.warnings, []);
    assert.equal(await store.cache.get("tr", "en", "Merhaba dunya"), "EN: Merhaba dunya");

    const again = new FakeTranslator();
    const cached = await translateBlocks(blocks, batcherOptions(again, store, { jobId: "job-2" }));
    assert.equal(cached.cacheHits, 2);
    assert.equal(again.calls.length, 0);
    assert.deepEqual(cached.batches, []);
    assert.equal(cached.blocks[1].translatedText, "EN: Rapor ozeti");
  });

  test("resubmits low-confidence batches to the fallback model", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator(
      byModel({ prefix: "LOW: ", confidence: 0.3 }, { prefix: "FB: ", confidence: 0.9 }),
    );

    const outcome = await translateBlocks(blocks, batcherOptions(translator, store));

    assert.deepEqual(translator.calls.map((call) => call.model), ["primary-model", "fallback-model"]);
    assert.equal(outcome.blocks[0].translatedText, "FB: Merhaba dunya");
    assert.equal(outcome.batches[0].resolution, "fallback");
    assert.equal(outcome.batches[0].model, "fallback-model");
    assert.equal(outcome.batches[0].attempts, 2);
    assert.equal(await store.cache.get("tr", "en", "Rapor ozeti"), "FB: Rapor ozeti");
  });

  test("keeps an aligned low-confidence result when the fallback is unusable, without caching it", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator(byModel({ prefix: "LOW: ", confidence: 0.3 }, "misaligned"));

    const outcome = await translateBlocks(blocks, batcherOptions(translator, store));

    assert.equal(outcome.blocks[0].translatedText, "LOW: Merhaba dunya");
    assert.equal(outcome.batches[0].resolution, "primary");
    assert.equal(outcome.batches[0].confidence, 0.3);
    assert.equal(await store.cache.get("tr", "en", "Merhaba dunya"), null);
  });

  test("resubmits a batch with a blank translation to the fallback model", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator((request) => ({
      segments: request.segments.map((segment) =>
        request.model === "primary-model" && segment === "Rapor ozeti" ? "  " : `EN: ${segment}`,
      ),
      confidence: 0.95,
      model: request.model,
    }));

    const outcome = await translateBlocks(blocks, batcherOptions(translator, store));

    assert.deepEqual(translator.calls.map((call) => call.model), ["primary-model", "fallback-model"]);
    assert.equal(outcome.batches[0].resolution, "fallback");
    assert.deepEqual(
      outcome.blocks.map((entry) => entry.translatedText),
      ["EN: Merhaba dunya", "EN: Rapor ozeti"],
    );
  });

  test("fails blocks whose translation stays blank on both models", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator((request) => ({
      segments: request.segments.map((segment) => (segment === "Rapor ozeti" ? "" : `EN: ${segment}`)),
      confidence: 0.95,
      model: request.model,
    }));

    const outcome = await translateBlocks(
      blocks,
      batcherOptions(translator, store, { maxBatchBlocks: 1 }),
    );

    assert.deepEqual(
      outcome.blocks.map((entry) => [entry.id, entry.translatedText, entry.errorTag]),
      [
        ["p1-b1", "EN: Merhaba dunya", null],
        ["p1-b2", null, "translation_failed"],
      ],
    );
    assert.deepEqual(outcome.warnings, [
      {
        code: "translation_failed",
        pageIndex: 0,
        blockIds: ["p1-b2"],
        message: "Translation failed for 1 block(s) after 2 attempt(s)",
      },
    ]);
    assert.equal(await store.cache.get("tr", "en", "Rapor ozeti"), null);
  });

  test("tags blocks of a failed batch and keeps the rest", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator(
      failOn("Rapor ozeti", () => new ProviderError("invalid_request", "rejected", "fake")),
    );

    const outcome = await translateBlocks(
      blocks,
      batcherOptions(translator, store, { maxBatchBlocks: 1 }),
    );

    assert.deepEqual(
      outcome.blocks.map((entry) => [entry.id, entry.translatedText, entry.errorTag]),
      [
        ["p1-b1", "EN: Merhaba dunya", null],
        ["p1-b2", null, "translation_failed"],
      ],
    );
    assert.deepEqual(outcome.failedBlockIds, ["p1-b2"]);
    assert.deepEqual(outcome.warnings, [
      {
        code: "translation_failed",
        pageIndex: 0,
        blockIds: ["p1-b2"],
        message: "Translation failed for 1 block(s) after 2 attempt(s)",
      },
    ]);
    assert.equal((await store.batches.listSucceeded("job-1")).length, 1);
  });

  test("counts retries of transient failures on both models", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator(
      failOn("Rapor ozeti", () => new ProviderError("rate_limit", "slow down", "fake")),
    );

    const outcome = await translateBlocks(
      blocks,
      batcherOptions(translator, store, { maxBatchBlocks: 1 }),
    );

    assert.equal(
      outcome.warnings[0].message,
      "Translation failed for 1 block(s) after 4 attempt(s)",
    );
    assert.equal(translator.calls.length, 5);
  });

  test("fails the stage when every batch fails", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator(() => {
      throw new ProviderError("invalid_request", "rejected", "fake");
    });
    await assert.rejects(
      translateBlocks(blocks, batcherOptions(translator, store)),
      (error) => error instanceof TranslationFailedError && error.failedBatches === 1,
    );
  });

  test("reuses batches that already succeeded for the job", async () => {
    const first = new MemoryPipelineStore();
    await translateBlocks(blocks, batcherOptions(new FakeTranslator(), first));

    const freshCache = new MemoryPipelineStore();
    const translator = new FakeTranslator();
    const outcome = await translateBlocks(
      blocks,
      batcherOptions(translator, first, { cache: freshCache.cache }),
    );

    assert.equal(translator.calls.length, 0);
    assert.equal(outcome.batches[0].resolution, "reused");
    assert.equal(outcome.blocks[0].translatedText, "EN: Merhaba dunya");
  });

  test("reassembles split blocks in piece order", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator((request) => ({
      segments: request.segments.map((segment) => segment.toUpperCase()),
      confidence: 1,
      model: request.model,
    }));

    const outcome = await translateBlocks(
      [block("p1-b1", "aaaa bbbb cccc dddd eeee ffff")],
      batcherOptions(translator, store, { maxBatchChars: 10, concurrency: 3 }),
    );

    assert.equal(translator.calls.length, 3);
    assert.equal(outcome.blocks[0].translatedText, "AAAA BBBB CCCC DDDD EEEE FFFF");
  });

  test("skips blocks without text", async () => {
    const store = new MemoryPipelineStore();
    const translator = new FakeTranslator();

    const outcome = await translateBlocks(
      [block("p1-b1", "   "), block("p1-b2", "Merhaba dunya")],
      batcherOptions(translator, store),
    );

    assert.deepEqual(translator.calls[0].segments, ["Merhaba dunya"]);
    assert.equal(outcome.blocks[0].translatedText, null);
    assert.equal(outcome.blocks[0].errorTag, null);
  });
});
