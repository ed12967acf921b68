import { getEnv, type AppEnv } from "./env";

export type LanguageCode = "tr" | "en";

export const SUPPORTED_LANGUAGE_PAIRS: ReadonlyArray<
  readonly [LanguageCode, LanguageCode]
> = [
  ["tr", "en"],
  ["en", "tr"],
] as const;

// Hard ceilings; configuration may lower them but never raise them.
export const HARD_PAGE_LIMIT = 150;
export const HARD_FILE_SIZE_LIMIT_BYTES = 80 * 1024 * 1024;

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export interface PipelineLimits {
  maxPages: number;
  maxFileBytes: number;
  retentionHours: number;
}

export interface ExtractionConfig {
  /** Non-whitespace characters per 10 000 pt² below which a page is scan-like. */
  minTextDensity: number;
  /** Share of printable characters below which the text layer is distrusted. */
  ocrConfidenceThreshold: number;
}

export interface OcrConfig {
  model: string;
  renderDpi: number;
  concurrency: number;
}

export interface TranslationConfig {
  primaryModel: string;
  fallbackModel: string;
  maxBatchChars: number;
  maxBatchBlocks: number;
  lowConfidenceThreshold: number;
  concurrency: number;
}

export interface ProviderCallConfig {
  timeoutMs: number;
  retry: RetryPolicyOptions;
}

export interface RenderConfig {
  fontPath: string | null;
  minFontSize: number;
  maxFontSize: number;
}

export interface PipelineConfig {
  limits: PipelineLimits;
  extraction: ExtractionConfig;
  ocr: OcrConfig;
  translation: TranslationConfig;
  provider: ProviderCallConfig;
  render: RenderConfig;
  runLeaseMs: number;
}

export interface PipelineConfigOverrides {
  limits?: Partial<PipelineLimits>;
  extraction?: Partial<ExtractionConfig>;
  ocr?: Partial<OcrConfig>;
  translation?: Partial<TranslationConfig>;
  provider?: {
    timeoutMs?: number;
    retry?: Partial<RetryPolicyOptions>;
  };
  render?: Partial<RenderConfig>;
  runLeaseMs?: number;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  limits: {
    maxPages: HARD_PAGE_LIMIT,
    maxFileBytes: HARD_FILE_SIZE_LIMIT_BYTES,
    retentionHours: 24,
  },
  extraction: {
    minTextDensity: 0.4,
    ocrConfidenceThreshold: 0.85,
  },
  ocr: {
    model: "google/gemini-2.5-flash-lite",
    renderDpi: 170,
    concurrency: 2,
  },
  translation: {
    primaryModel: "google/gemini-2.5-flash-lite",
    fallbackModel: "google/gemini-2.5-flash",
    maxBatchChars: 3_500,
    maxBatchBlocks: 40,
    lowConfidenceThreshold: 0.6,
    concurrency: 3,
  },
  provider: {
    timeoutMs: 90_000,
    retry: {
      maxAttempts: 3,
      baseDelayMs: 1_000,
      maxDelayMs: 15_000,
      factor: 2,
    },
  },
  render: {
    fontPath: null,
    minFontSize: 6,
    maxFontSize: 20,
  },
  runLeaseMs: 15 * 60 * 1000,
};

const clampPositive = (value: number, ceiling: number) =>
  Math.max(1, Math.min(Math.floor(value), ceiling));

export function buildPipelineConfig(
  overrides: PipelineConfigOverrides = {},
): PipelineConfig {
  const base = DEFAULT_PIPELINE_CONFIG;
  const limits = { ...base.limits, ...(overrides.limits ?? {}) };

  return {
    limits: {
      maxPages: clampPositive(limits.maxPages, HARD_PAGE_LIMIT),
      maxFileBytes: clampPositive(limits.maxFileBytes, HARD_FILE_SIZE_LIMIT_BYTES),
      retentionHours: Math.max(1, limits.retentionHours),
    },
    extraction: { ...base.extraction, ...(overrides.extraction ?? {}) },
    ocr: { ...base.ocr, ...(overrides.ocr ?? {}) },
    translation: { ...base.translation, ...(overrides.translation ?? {}) },
    provider: {
      timeoutMs: overrides.provider?.timeoutMs ?? base.provider.timeoutMs,
      retry: { ...base.provider.retry, ...(overrides.provider?.retry ?? {}) },
    },
    render: { ...base.render, ...(overrides.render ?? {}) },
    runLeaseMs: overrides.runLeaseMs ?? base.runLeaseMs,
  };
}

export function pipelineConfigFromEnv(env: AppEnv): PipelineConfig {
  return buildPipelineConfig({
    limits: {
      maxPages: env.MAX_PAGES_PER_JOB,
      maxFileBytes: env.MAX_FILE_MB * 1024 * 1024,
      retentionHours: env.RETENTION_HOURS,
    },
    extraction: {
      minTextDensity: env.TEXT_DENSITY_MIN,
      ocrConfidenceThreshold: env.OCR_CONFIDENCE_THRESHOLD,
    },
    ocr: {
      model: env.OCR_MODEL,
      renderDpi: env.OCR_RENDER_DPI,
      concurrency: env.OCR_CONCURRENCY,
    },
    translation: {
      primaryModel: env.TRANSLATE_MODEL,
      fallbackModel: env.FALLBACK_MODEL,
      maxBatchChars: env.TRANSLATION_BATCH_MAX_CHARS,
      maxBatchBlocks: env.TRANSLATION_BATCH_MAX_BLOCKS,
      lowConfidenceThreshold: env.TRANSLATION_LOW_CONFIDENCE,
      concurrency: env.TRANSLATION_CONCURRENCY,
    },
    provider: {
      timeoutMs: env.PROVIDER_TIMEOUT_MS,
      retry: {
        maxAttempts: env.PROVIDER_MAX_ATTEMPTS,
        baseDelayMs: env.PROVIDER_BACKOFF_MS,
      },
    },
    render: {
      fontPath: env.RENDER_FONT_PATH ?? null,
    },
    runLeaseMs: env.RUN_LEASE_MS,
  });
}

let cachedConfig: PipelineConfig | null = null;

export function getPipelineConfig(): PipelineConfig {
  if (!cachedConfig) {
    cachedConfig = pipelineConfigFromEnv(getEnv());
  }
  return cachedConfig;
}

export function isSupportedLanguagePair(
  sourceLang: string,
  targetLang: string,
): boolean {
  const source = sourceLang.trim().toLowerCase();
  const target = targetLang.trim().toLowerCase();
  return SUPPORTED_LANGUAGE_PAIRS.some(
    ([from, to]) => from === source && to === target,
  );
}

export function parseLanguageCode(value: string): LanguageCode | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === "tr" || normalized === "en") {
    return normalized;
  }
  return null;
}
