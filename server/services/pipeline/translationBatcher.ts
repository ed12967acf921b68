import { createHash } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import pLimit from "p-limit";

import type { LanguageCode } from "../../config/pipelineConfig";
import type { BatchRepository, StoredBatch, TranslationCache } from "../../db/types";
import { TranslationFailedError, describeError } from "../../errors";
import type {
  TranslationCapability,
  TranslationResult,
} from "../providers/capabilities";
import {
  RetryExhaustedError,
  runWithRetry,
  unwrapRetryError,
  withTimeout,
  type RetryPolicy,
} from "../retryPolicy";
import type { Block, JobWarning } from "./types";

/** Oversized blocks are only split at word boundaries this far in. */
export const MIN_SPLIT_CHARS = 150;

export interface BatchLimits {
  maxBatchChars: number;
  maxBatchBlocks: number;
}

export interface BatchItem {
  blockId: string;
  /** Position of this piece within its block; 0 for unsplit blocks. */
  piece: number;
  text: string;
}

export interface PlannedBatch {
  key: string;
  items: BatchItem[];
  chars: number;
}

export interface TranslationBatcherOptions extends BatchLimits {
  jobId: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  translator: TranslationCapability;
  primaryModel: string;
  fallbackModel: string;
  lowConfidenceThreshold: number;
  retryPolicy: RetryPolicy;
  concurrency: number;
  timeoutMs: number;
  cache: TranslationCache;
  batchStore: BatchRepository;
  log: FastifyBaseLogger;
  sleep?: (ms: number) => Promise<void>;
}

export type BatchResolution = "primary" | "fallback" | "reused" | "failed";

export interface BatchReport {
  key: string;
  blockIds: string[];
  resolution: BatchResolution;
  model: string | null;
  attempts: number;
  confidence: number | null;
}

export interface TranslationOutcome {
  blocks: Block[];
  batches: BatchReport[];
  warnings: JobWarning[];
  failedBlockIds: string[];
  cacheHits: number;
}

/** Splits `text` into pieces of at most `maxChars`, preferring word boundaries. */
export function splitOversizedText(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let remaining = text.trim();
  const floor = Math.min(MIN_SPLIT_CHARS, Math.floor(maxChars / 2));

  while (remaining.length > maxChars) {
    let cut = remaining.lastIndexOf(" ", maxChars);
    if (cut < floor) {
      cut = maxChars;
    }
    const chunk = remaining.slice(0, cut).trim();
    if (chunk) pieces.push(chunk);
    remaining = remaining.slice(cut).trimStart();
  }
  if (remaining) pieces.push(remaining);
  return pieces;
}

export function batchKey(items: BatchItem[]): string {
  const hash = createHash("sha256");
  for (const item of items) {
    hash.update(`${item.blockId}#${item.piece}\u0000${item.text}\u0001`);
  }
  return hash.digest("hex");
}

/**
 * Groups blocks in reading order. A batch closes before it would exceed either
 * bound; a block longer than `maxBatchChars` is split into pieces first.
 */
export function planBatches(
  blocks: Array<Pick<Block, "id" | "sourceText">>,
  limits: BatchLimits,
): PlannedBatch[] {
  const maxChars = Math.max(1, limits.maxBatchChars);
  const maxItems = Math.max(1, limits.maxBatchBlocks);
  const batches: PlannedBatch[] = [];
  let items: BatchItem[] = [];
  let chars = 0;

  const close = () => {
    if (!items.length) return;
    batches.push({ key: batchKey(items), items, chars });
    items = [];
    chars = 0;
  };

  for (const block of blocks) {
    const pieces = splitOversizedText(block.sourceText, maxChars);
    pieces.forEach((text, piece) => {
      if (items.length && (chars + text.length > maxChars || items.length >= maxItems)) {
        close();
      }
      items.push({ blockId: block.id, piece, text });
      chars += text.length;
    });
  }
  close();
  return batches;
}

/** One non-blank translation per batch item, in order. */
const isComplete = (segments: string[], expected: number) =>
  segments.length === expected &&
  segments.every((segment) => segment.trim().length > 0);

interface ModelAttempt {
  result: TranslationResult | null;
  attempts: number;
  error: unknown;
}

const attemptsOf = (error: unknown) =>
  error instanceof RetryExhaustedError ? error.attempts : 1;

async function callModel(
  batch: PlannedBatch,
  model: string,
  options: TranslationBatcherOptions,
): Promise<ModelAttempt> {
  try {
    const { value, attempts } = await runWithRetry(
      options.retryPolicy,
      () =>
        withTimeout(options.translator.provider, options.timeoutMs, (signal) =>
          options.translator.translate({
            segments: batch.items.map((item) => item.text),
            sourceLang: options.sourceLang,
            targetLang: options.targetLang,
            model,
            signal,
          }),
        ),
      {
        sleep: options.sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          options.log.warn(
            { batchKey: batch.key, model, attempt, delayMs, err: error },
            "[TRANSLATE] Transient provider error, retrying",
          ),
      },
    );
    return { result: value, attempts, error: null };
  } catch (error) {
    return { result: null, attempts: attemptsOf(error), error: unwrapRetryError(error) };
  }
}

interface BatchResult {
  report: BatchReport;
  translations: string[] | null;
}

async function translateBatch(
  batch: PlannedBatch,
  options: TranslationBatcherOptions,
): Promise<BatchResult> {
  const blockIds = [...new Set(batch.items.map((item) => item.blockId))];
  const aligned = (result: TranslationResult | null): result is TranslationResult =>
    result !== null && isComplete(result.segments, batch.items.length);

  const primary = await callModel(batch, options.primaryModel, options);
  let attempts = primary.attempts;
  let chosen: TranslationResult | null = null;
  let resolution: BatchResolution = "failed";

  if (aligned(primary.result) && primary.result.confidence >= options.lowConfidenceThreshold) {
    chosen = primary.result;
    resolution = "primary";
  } else {
    options.log.info(
      {
        batchKey: batch.key,
        confidence: primary.result?.confidence ?? null,
        segments: primary.result?.segments.length ?? null,
        expected: batch.items.length,
        err: primary.error ? describeError(primary.error) : undefined,
      },
      "[TRANSLATE] Resubmitting batch to fallback model",
    );
    const fallback = await callModel(batch, options.fallbackModel, options);
    attempts += fallback.attempts;
    if (aligned(fallback.result)) {
      chosen = fallback.result;
      resolution = "fallback";
    } else if (aligned(primary.result)) {
      chosen = primary.result;
      resolution = "primary";
    } else {
      options.log.warn(
        {
          batchKey: batch.key,
          blockIds,
          err: fallback.error ? describeError(fallback.error) : "missing or blank segments",
        },
        "[TRANSLATE] Batch failed",
      );
    }
  }

  const stored: StoredBatch = {
    batchKey: batch.key,
    blockIds,
    provider: options.translator.provider,
    model: chosen?.model ?? options.fallbackModel,
    attempts,
    status: chosen ? "succeeded" : "failed",
    translations: chosen?.segments ?? null,
    confidence: chosen?.confidence ?? null,
  };
  await options.batchStore.record(options.jobId, stored);

  return {
    report: {
      key: batch.key,
      blockIds,
      resolution,
      model: chosen?.model ?? null,
      attempts,
      confidence: chosen?.confidence ?? null,
    },
    translations: chosen?.segments ?? null,
  };
}

function failureWarning(blocks: Block[], report: BatchReport): JobWarning {
  const pages = new Set(blocks.map((block) => block.pageIndex));
  const [onlyPage] = pages;
  return {
    code: "translation_failed",
    pageIndex: pages.size === 1 && onlyPage !== undefined ? onlyPage : null,
    blockIds: report.blockIds,
    message: `Translation failed for ${report.blockIds.length} block(s) after ${report.attempts} attempt(s)`,
  };
}

/**
 * Translates blocks in bounded batches with cache lookup, fallback model and
 * per-batch persistence. Failed batches leave their blocks untranslated with
 * `errorTag = translation_failed`; when every batch fails the whole stage
 * fails with TranslationFailedError.
 */
export async function translateBlocks(
  blocks: Block[],
  options: TranslationBatcherOptions,
): Promise<TranslationOutcome> {
  const translated = new Map<string, string>();
  const failed = new Set<string>();
  let cacheHits = 0;

  const pending: Block[] = [];
  for (const block of blocks) {
    if (!block.sourceText.trim()) continue;
    const cached = await options.cache.get(
      options.sourceLang,
      options.targetLang,
      block.sourceText,
    );
    if (cached !== null && cached.trim()) {
      translated.set(block.id, cached);
      cacheHits += 1;
    } else {
      pending.push(block);
    }
  }

  const plan = planBatches(pending, options);
  const stored = new Map(
    (await options.batchStore.listSucceeded(options.jobId)).map(
      (batch): [string, StoredBatch] => [batch.batchKey, batch],
    ),
  );

  const limit = pLimit(Math.max(1, options.concurrency));
  const results = await Promise.all(
    plan.map((batch) =>
      limit(async (): Promise<BatchResult> => {
        const previous = stored.get(batch.key);
        if (previous?.translations && isComplete(previous.translations, batch.items.length)) {
          return {
            report: {
              key: batch.key,
              blockIds: previous.blockIds,
              resolution: "reused",
              model: previous.model,
              attempts: previous.attempts,
              confidence: previous.confidence,
            },
            translations: previous.translations,
          };
        }
        return translateBatch(batch, options);
      }),
    ),
  );

  const pieces = new Map<string, string[]>();
  results.forEach((result, index) => {
    const batch = plan[index];
    batch.items.forEach((item, position) => {
      const text = result.translations?.[position];
      if (text === undefined) {
        failed.add(item.blockId);
        return;
      }
      const parts = pieces.get(item.blockId) ?? [];
      parts[item.piece] = text;
      pieces.set(item.blockId, parts);
    });
  });

  for (const block of pending) {
    if (failed.has(block.id)) continue;
    const parts = pieces.get(block.id);
    if (!parts) continue;
    const text = parts.join(" ").trim();
    translated.set(block.id, text);
  }

  const confident = new Set(
    results
      .filter(
        (result) =>
          result.report.resolution !== "failed" &&
          (result.report.confidence ?? 0) >= options.lowConfidenceThreshold,
      )
      .flatMap((result) => result.report.blockIds),
  );
  for (const block of pending) {
    const text = translated.get(block.id);
    if (text !== undefined && confident.has(block.id)) {
      await options.cache.set(options.sourceLang, options.targetLang, block.sourceText, text);
    }
  }

  const byId = new Map(blocks.map((block): [string, Block] => [block.id, block]));
  const warnings = results
    .filter((result) => result.report.resolution === "failed")
    .map((result) =>
      failureWarning(
        result.report.blockIds.flatMap((id) => {
          const block = byId.get(id);
          return block ? [block] : [];
        }),
        result.report,
      ),
    );

  const failedBatches = results.filter((result) => result.report.resolution === "failed");
  if (plan.length > 0 && failedBatches.length === plan.length) {
    throw new TranslationFailedError(failedBatches.length);
  }

  const output = blocks.map((block): Block => {
    if (failed.has(block.id)) {
      return { ...block, translatedText: null, errorTag: "translation_failed" };
    }
    const text = translated.get(block.id);
    return text === undefined
      ? { ...block }
      : { ...block, translatedText: text, errorTag: null };
  });

  options.log.info(
    {
      jobId: options.jobId,
      batches: plan.length,
      failedBatches: failedBatches.length,
      cacheHits,
      failedBlocks: failed.size,
    },
    "[TRANSLATE] Blocks translated",
  );

  return {
    blocks: output,
    batches: results.map((result) => result.report),
    warnings,
    failedBlockIds: [...failed],
    cacheHits,
  };
}
