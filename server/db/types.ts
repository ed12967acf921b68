import type { QueryResult, QueryResultRow } from "pg";
import type { LanguageCode } from "../config/pipelineConfig";
import type { PipelineErrorCode } from "../errors";
import type { JobStatus } from "../services/jobs/jobStateMachine";
import type { ExtractedDocument, JobWarning } from "../services/pipeline/types";

/** Anything that runs SQL: the pool or a transaction client. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export interface JobErrorDetail {
  code: PipelineErrorCode;
  message: string;
}

export interface JobRecord {
  jobId: string;
  ownerId: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  status: JobStatus;
  fileName: string;
  fileSize: number;
  pageCount: number;
  pagesProcessed: number;
  sourceRef: string | null;
  artifactRef: string | null;
  error: JobErrorDetail | null;
  warnings: JobWarning[];
  failedBlockCount: number;
  clippedBlockCount: number;
  creditsCharged: number;
  cancelRequested: boolean;
  runToken: string | null;
  leaseExpiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  completedAt: Date | null;
  cleanedAt: Date | null;
}

export interface NewJob {
  jobId: string;
  ownerId: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  fileName: string;
  fileSize: number;
  sourceRef: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface JobPatch {
  pageCount?: number;
  pagesProcessed?: number;
  artifactRef?: string | null;
  error?: JobErrorDetail | null;
  warnings?: JobWarning[];
  failedBlockCount?: number;
  clippedBlockCount?: number;
  creditsCharged?: number;
}

export interface JobStats {
  jobCount: number;
  successCount: number;
  failedCount: number;
  avgPages: number;
}

export interface JobRepository {
  create(job: NewJob): Promise<JobRecord>;
  get(jobId: string): Promise<JobRecord | null>;
  /**
   * Moves a job from `from` to `to` and applies `patch` in the same row write.
   * Throws InvalidTransitionError when the edge is not allowed or the stored
   * status is no longer `from`. With `runToken` the write also requires the
   * job's lease to carry that token, else RunLeaseLostError.
   */
  transition(
    jobId: string,
    from: JobStatus,
    to: JobStatus,
    patch: JobPatch,
    now: Date,
    runToken?: string,
  ): Promise<JobRecord>;
  update(jobId: string, patch: JobPatch, now: Date): Promise<JobRecord>;
  acquireRun(
    jobId: string,
    runToken: string,
    leaseExpiresAt: Date,
    now: Date,
  ): Promise<boolean>;
  /** Extends the lease while `runToken` still holds it. */
  renewRun(
    jobId: string,
    runToken: string,
    leaseExpiresAt: Date,
    now: Date,
  ): Promise<boolean>;
  releaseRun(jobId: string, runToken: string): Promise<void>;
  requestCancel(jobId: string, now: Date): Promise<JobRecord | null>;
  listStalled(now: Date, limit: number): Promise<JobRecord[]>;
  listExpired(now: Date, limit: number): Promise<JobRecord[]>;
  markCleaned(jobId: string, now: Date): Promise<void>;
  stats(): Promise<JobStats>;
}

export type LedgerEntryType = "grant" | "debit" | "refund";

export interface LedgerEntry {
  id: number;
  ownerId: string;
  type: LedgerEntryType;
  amount: number;
  jobId: string | null;
  externalRef: string | null;
  note: string | null;
  createdAt: Date;
}

export interface CreditBalance {
  ownerId: string;
  availableCredits: number;
}

export interface LedgerMutation {
  /** False when the operation had already been applied for this job. */
  applied: boolean;
  amount: number;
  /** Balance after the call; null when no account was involved. */
  balance: number | null;
}

/**
 * Debit and refund are idempotent per job id. Callers run them inside
 * `PipelineStore.transaction` so they commit together with the job write.
 */
export interface CreditLedger {
  balance(ownerId: string): Promise<CreditBalance>;
  grant(
    ownerId: string,
    amount: number,
    note: string,
    externalRef: string | null,
  ): Promise<CreditBalance>;
  debit(ownerId: string, amount: number, jobId: string): Promise<LedgerMutation>;
  refund(jobId: string): Promise<LedgerMutation>;
  history(ownerId: string, limit: number): Promise<LedgerEntry[]>;
}

export type CheckpointStage = "extracted" | "translated";

export interface CheckpointRepository {
  save(
    jobId: string,
    stage: CheckpointStage,
    document: ExtractedDocument,
  ): Promise<void>;
  load(jobId: string, stage: CheckpointStage): Promise<ExtractedDocument | null>;
}

export type BatchStatus = "succeeded" | "failed";

export interface StoredBatch {
  batchKey: string;
  blockIds: string[];
  provider: string;
  model: string;
  attempts: number;
  status: BatchStatus;
  translations: string[] | null;
  confidence: number | null;
}

export interface BatchRepository {
  listSucceeded(jobId: string): Promise<StoredBatch[]>;
  record(jobId: string, batch: StoredBatch): Promise<void>;
}

export interface TranslationCache {
  get(
    sourceLang: LanguageCode,
    targetLang: LanguageCode,
    text: string,
  ): Promise<string | null>;
  set(
    sourceLang: LanguageCode,
    targetLang: LanguageCode,
    text: string,
    translated: string,
  ): Promise<void>;
}

export interface StoreScope {
  jobs: JobRepository;
  ledger: CreditLedger;
  checkpoints: CheckpointRepository;
  batches: BatchRepository;
  cache: TranslationCache;
}

export interface PipelineStore extends StoreScope {
  /** Runs `work` in one commit; any throw rolls every write back. */
  transaction<T>(work: (scope: StoreScope) => Promise<T>): Promise<T>;
}
