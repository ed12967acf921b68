import { createHash } from "node:crypto";
import type { Pool } from "pg";
import type { LanguageCode } from "../config/pipelineConfig";
import { parseExtractedDocument } from "../services/pipeline/documentSchema";
import type { ExtractedDocument } from "../services/pipeline/types";
import { PgCreditLedger } from "./creditLedger";
import { PgJobRepository } from "./jobRepository";
import type {
  BatchRepository,
  CheckpointRepository,
  CheckpointStage,
  PipelineStore,
  Queryable,
  StoreScope,
  StoredBatch,
  TranslationCache,
} from "./types";

export const translationCacheKey = (
  sourceLang: LanguageCode,
  targetLang: LanguageCode,
  text: string,
): string =>
  createHash("sha256")
    .update(`${sourceLang}\u0000${targetLang}\u0000${text}`)
    .digest("hex");

class PgCheckpointRepository implements CheckpointRepository {
  constructor(private readonly db: Queryable) {}

  async save(
    jobId: string,
    stage: CheckpointStage,
    document: ExtractedDocument,
  ): Promise<void> {
    await this.db.query(
      `INSERT INTO job_checkpoints (job_id, stage, payload)
       VALUES ($1, $2, $3)
       ON CONFLICT (job_id, stage) DO UPDATE
         SET payload = EXCLUDED.payload, created_at = NOW()`,
      [jobId, stage, JSON.stringify(document)],
    );
  }

  async load(
    jobId: string,
    stage: CheckpointStage,
  ): Promise<ExtractedDocument | null> {
    const { rows } = await this.db.query<{ payload: unknown }>(
      `SELECT payload FROM job_checkpoints WHERE job_id = $1 AND stage = $2`,
      [jobId, stage],
    );
    return rows.length ? parseExtractedDocument(rows[0].payload) : null;
  }
}

type BatchRow = {
  batch_key: string;
  block_ids: unknown;
  provider: string;
  model: string;
  attempts: number;
  translations: unknown;
  confidence: number | null;
};

const toStringArray = (value: unknown): string[] | null =>
  Array.isArray(value) && value.every((item) => typeof item === "string")
    ? value.filter((item): item is string => typeof item === "string")
    : null;

class PgBatchRepository implements BatchRepository {
  constructor(private readonly db: Queryable) {}

  async listSucceeded(jobId: string): Promise<StoredBatch[]> {
    const { rows } = await this.db.query<BatchRow>(
      `SELECT batch_key, block_ids, provider, model, attempts, translations, confidence
         FROM job_batches
        WHERE job_id = $1 AND status = 'succeeded'`,
      [jobId],
    );
    return rows.map((row): StoredBatch => ({
      batchKey: row.batch_key,
      blockIds: toStringArray(row.block_ids) ?? [],
      provider: row.provider,
      model: row.model,
      attempts: row.attempts,
      status: "succeeded",
      translations: toStringArray(row.translations),
      confidence: row.confidence,
    }));
  }

  async record(jobId: string, batch: StoredBatch): Promise<void> {
    await this.db.query(
      `INSERT INTO job_batches (
         job_id, batch_key, block_ids, provider, model, attempts, status,
         translations, confidence, updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
       ON CONFLICT (job_id, batch_key) DO UPDATE
         SET provider = EXCLUDED.provider,
             model = EXCLUDED.model,
             attempts = job_batches.attempts + EXCLUDED.attempts,
             status = EXCLUDED.status,
             translations = EXCLUDED.translations,
             confidence = EXCLUDED.confidence,
             updated_at = NOW()`,
      [
        jobId,
        batch.batchKey,
        JSON.stringify(batch.blockIds),
        batch.provider,
        batch.model,
        batch.attempts,
        batch.status,
        batch.translations ? JSON.stringify(batch.translations) : null,
        batch.confidence,
      ],
    );
  }
}

class PgTranslationCache implements TranslationCache {
  constructor(private readonly db: Queryable) {}

  async get(
    sourceLang: LanguageCode,
    targetLang: LanguageCode,
    text: string,
  ): Promise<string | null> {
    const { rows } = await this.db.query<{ translated_text: string }>(
      `SELECT translated_text FROM translation_cache WHERE cache_key = $1`,
      [translationCacheKey(sourceLang, targetLang, text)],
    );
    return rows[0]?.translated_text ?? null;
  }

  async set(
    sourceLang: LanguageCode,
    targetLang: LanguageCode,
    text: string,
    translated: string,
  ): Promise<void> {
    await this.db.query(
      `INSERT INTO translation_cache (cache_key, source_lang, target_lang, translated_text)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (cache_key) DO NOTHING`,
      [translationCacheKey(sourceLang, targetLang, text), sourceLang, targetLang, translated],
    );
  }
}

const createScope = (db: Queryable): StoreScope => ({
  jobs: new PgJobRepository(db),
  ledger: new PgCreditLedger(db),
  checkpoints: new PgCheckpointRepository(db),
  batches: new PgBatchRepository(db),
  cache: new PgTranslationCache(db),
});

export class PgPipelineStore implements PipelineStore {
  readonly jobs: StoreScope["jobs"];
  readonly ledger: StoreScope["ledger"];
  readonly checkpoints: StoreScope["checkpoints"];
  readonly batches: StoreScope["batches"];
  readonly cache: StoreScope["cache"];

  constructor(private readonly pool: Pool) {
    const scope = createScope(pool);
    this.jobs = scope.jobs;
    this.ledger = scope.ledger;
    this.checkpoints = scope.checkpoints;
    this.batches = scope.batches;
    this.cache = scope.cache;
  }

  async transaction<T>(work: (scope: StoreScope) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await work(createScope(client));
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
}
