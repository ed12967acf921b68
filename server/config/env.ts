// server/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length ? value.trim() : undefined));

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.string().default('8900'),
  APP_VERSION: z.string().default('0.1.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  DATABASE_URL: optionalString,
  REDIS_URL: optionalString,
  STORAGE_DIR: z.string().default('storage'),
  ADMIN_API_TOKEN: optionalString,
  CLIENT_ORIGIN: optionalString,

  MODEL_PROVIDER: z.enum(['openrouter', 'openai']).default('openrouter'),
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  OPENAI_API_KEY: optionalString,
  TRANSLATE_MODEL: z.string().default('google/gemini-2.5-flash-lite'),
  FALLBACK_MODEL: z.string().default('google/gemini-2.5-flash'),
  OCR_MODEL: z.string().default('google/gemini-2.5-flash-lite'),

  MAX_FILE_MB: numberFromEnv(80),
  MAX_PAGES_PER_JOB: numberFromEnv(150),
  RETENTION_HOURS: numberFromEnv(24),
  RUN_LEASE_MS: numberFromEnv(15 * 60 * 1000),

  JOB_WORKER_CONCURRENCY: numberFromEnv(2),
  OCR_CONCURRENCY: numberFromEnv(2),
  TRANSLATION_CONCURRENCY: numberFromEnv(3),
  PROVIDER_TIMEOUT_MS: numberFromEnv(90_000),
  PROVIDER_MAX_ATTEMPTS: numberFromEnv(3),
  PROVIDER_BACKOFF_MS: numberFromEnv(1_000),

  TEXT_DENSITY_MIN: numberFromEnv(0.4),
  OCR_CONFIDENCE_THRESHOLD: numberFromEnv(0.85),
  TRANSLATION_LOW_CONFIDENCE: numberFromEnv(0.6),
  TRANSLATION_BATCH_MAX_CHARS: numberFromEnv(3_500),
  TRANSLATION_BATCH_MAX_BLOCKS: numberFromEnv(40),
  OCR_RENDER_DPI: numberFromEnv(170),
  RENDER_FONT_PATH: optionalString,
});

export type AppEnv = z.infer<typeof schema>;

let cachedEnv: AppEnv | null = null;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return schema.parse(source);
}

export function getEnv(): AppEnv {
  if (!cachedEnv) {
    cachedEnv = loadEnv();
  }
  return cachedEnv;
}
