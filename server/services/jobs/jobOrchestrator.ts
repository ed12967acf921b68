import type { FastifyBaseLogger } from "fastify";
import { nanoid } from "nanoid";
import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";

import {
  isSupportedLanguagePair,
  parseLanguageCode,
  type LanguageCode,
  type PipelineConfig,
} from "../../config/pipelineConfig";
import type { JobRecord, PipelineStore } from "../../db/types";
import {
  ArtifactUnavailableError,
  InsufficientCreditsError,
  InvalidTransitionError,
  JobAccessDeniedError,
  JobAlreadyRunningError,
  JobCancelledError,
  JobNotFoundError,
  ReconstructionError,
  RunLeaseLostError,
  UnsupportedDocumentError,
  describeError,
  toErrorDetail,
} from "../../errors";
import { extractDocument, inspectDocument } from "../pipeline/blockExtractor";
import { reconstructDocument } from "../pipeline/layoutReconstructor";
import { recognizeScanPages } from "../pipeline/ocrFallback";
import type { PageRasterizer } from "../pipeline/pageRasterizer";
import { translateBlocks } from "../pipeline/translationBatcher";
import {
  allBlocks,
  type Block,
  type ExtractedDocument,
  type JobWarning,
} from "../pipeline/types";
import type { ModelProviders } from "../providers/capabilities";
import { createRetryPolicy, type RetryPolicy } from "../retryPolicy";
import type { ArtifactStorage } from "../storage/artifactStorage";
import {
  isTerminalStatus,
  resolveVisibleStatus,
  type VisibleJobStatus,
} from "./jobStateMachine";

export interface JobOrchestratorDeps {
  store: PipelineStore;
  storage: ArtifactStorage;
  providers: ModelProviders;
  rasterizer: PageRasterizer;
  config: PipelineConfig;
  log: FastifyBaseLogger;
  /** Hands a job to the worker pool; duplicate ids must be ignored. */
  enqueue: (jobId: string) => Promise<void>;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  createJobId?: () => string;
  createRunToken?: () => string;
}

export interface SubmitJobInput {
  ownerId: string;
  sourceLang: string;
  targetLang: string;
  fileName: string;
  bytes: Buffer;
}

export interface JobView {
  jobId: string;
  ownerId: string;
  sourceLang: LanguageCode;
  targetLang: LanguageCode;
  status: VisibleJobStatus;
  fileName: string;
  fileSize: number;
  pageCount: number;
  pagesProcessed: number;
  creditsCharged: number;
  warningCount: number;
  warnings: JobWarning[];
  failedBlockCount: number;
  clippedBlockCount: number;
  error: JobRecord["error"];
  downloadReady: boolean;
  createdAt: string;
  updatedAt: string;
  expiresAt: string;
  completedAt: string | null;
}

export function toJobView(job: JobRecord, now: Date): JobView {
  const status = resolveVisibleStatus(job, now);
  return {
    jobId: job.jobId,
    ownerId: job.ownerId,
    sourceLang: job.sourceLang,
    targetLang: job.targetLang,
    status,
    fileName: job.fileName,
    fileSize: job.fileSize,
    pageCount: job.pageCount,
    pagesProcessed: job.pagesProcessed,
    creditsCharged: job.creditsCharged,
    warningCount: job.warnings.length,
    warnings: job.warnings,
    failedBlockCount: job.failedBlockCount,
    clippedBlockCount: job.clippedBlockCount,
    error: job.error,
    downloadReady: status === "completed" && job.artifactRef !== null,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    expiresAt: job.expiresAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
  };
}

const HOUR_MS = 60 * 60 * 1000;

const mergeBlocks = (
  document: ExtractedDocument,
  blocks: Block[],
): ExtractedDocument => {
  const byId = new Map(blocks.map((block): [string, Block] => [block.id, block]));
  return {
    ...document,
    pages: document.pages.map((page) => ({
      ...page,
      blocks: page.blocks.map((block) => byId.get(block.id) ?? block),
    })),
  };
};

/**
 * Drives a job through validating, extracting, translating and reconstructing.
 * Every persisted status change goes through the job repository's guarded
 * transition; the debit commits with validating→extracting and every move to
 * `failed` refunds in the same transaction.
 */
export class JobOrchestrator {
  private readonly store: PipelineStore;
  private readonly storage: ArtifactStorage;
  private readonly providers: ModelProviders;
  private readonly rasterizer: PageRasterizer;
  private readonly config: PipelineConfig;
  private readonly log: FastifyBaseLogger;
  private readonly enqueue: (jobId: string) => Promise<void>;
  private readonly clock: () => Date;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly createJobId: () => string;
  private readonly createRunToken: () => string;
  private readonly retryPolicy: RetryPolicy;
  private readonly activeRuns = new Set<string>();

  constructor(deps: JobOrchestratorDeps) {
    this.store = deps.store;
    this.storage = deps.storage;
    this.providers = deps.providers;
    this.rasterizer = deps.rasterizer;
    this.config = deps.config;
    this.log = deps.log;
    this.enqueue = deps.enqueue;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep;
    this.createJobId = deps.createJobId ?? uuidv4;
    this.createRunToken = deps.createRunToken ?? (() => nanoid());
    this.retryPolicy = createRetryPolicy(deps.config.provider.retry);
  }

  async submit(input: SubmitJobInput): Promise<JobView> {
    const sourceLang = parseLanguageCode(input.sourceLang);
    const targetLang = parseLanguageCode(input.targetLang);
    if (
      !sourceLang ||
      !targetLang ||
      !isSupportedLanguagePair(sourceLang, targetLang)
    ) {
      throw new UnsupportedDocumentError(
        "language_pair",
        `Unsupported language pair ${input.sourceLang}->${input.targetLang}`,
      );
    }
    if (input.bytes.length > this.config.limits.maxFileBytes) {
      throw new UnsupportedDocumentError(
        "too_large",
        `File exceeds maximum allowed size of ${Math.round(
          this.config.limits.maxFileBytes / (1024 * 1024),
        )}MB.`,
      );
    }

    const jobId = this.createJobId();
    const sourceRef = await this.storage.put(jobId, "source", input.bytes);
    const createdAt = this.clock();
    await this.store.jobs.create({
      jobId,
      ownerId: input.ownerId,
      sourceLang,
      targetLang,
      fileName: input.fileName,
      fileSize: input.bytes.length,
      sourceRef,
      createdAt,
      expiresAt: new Date(
        createdAt.getTime() + this.config.limits.retentionHours * HOUR_MS,
      ),
    });
    this.log.info(
      { jobId, ownerId: input.ownerId, sourceLang, targetLang, fileSize: input.bytes.length },
      "[JOB] Submitted",
    );

    await this.validate(jobId);
    await this.enqueue(jobId);
    return this.describe(jobId);
  }

  /**
   * created→validating→extracting. Failures are recorded on the job before
   * they are rethrown.
   */
  async validate(jobId: string): Promise<JobRecord> {
    const job = await this.requireJob(jobId);
    if (job.status !== "created" && job.status !== "validating") {
      return job;
    }
    try {
      return await this.validateStage(job);
    } catch (error) {
      await this.failJob(jobId, error);
      throw error;
    }
  }

  /**
   * Runs the pipeline from the job's last committed stage. Fatal errors end the
   * job in `failed` and the failed record is returned.
   */
  async run(jobId: string): Promise<JobRecord> {
    if (this.activeRuns.has(jobId)) {
      throw new JobAlreadyRunningError(jobId);
    }
    this.activeRuns.add(jobId);
    try {
      const job = await this.requireJob(jobId);
      if (isTerminalStatus(job.status)) {
        return job;
      }
      const runToken = this.createRunToken();
      const now = this.clock();
      const acquired = await this.store.jobs.acquireRun(
        jobId,
        runToken,
        new Date(now.getTime() + this.config.runLeaseMs),
        now,
      );
      if (!acquired) {
        throw new JobAlreadyRunningError(jobId);
      }
      try {
        return await this.execute(jobId, runToken);
      } finally {
        await this.store.jobs.releaseRun(jobId, runToken);
      }
    } finally {
      this.activeRuns.delete(jobId);
    }
  }

  async cancel(jobId: string): Promise<JobView> {
    const job = await this.requireJob(jobId);
    if (isTerminalStatus(job.status)) {
      throw new InvalidTransitionError(jobId, job.status, "failed");
    }
    const now = this.clock();
    await this.store.jobs.requestCancel(jobId, now);
    const leaseActive =
      job.runToken !== null &&
      job.leaseExpiresAt !== null &&
      job.leaseExpiresAt.getTime() > now.getTime();
    if (!this.activeRuns.has(jobId) && !leaseActive) {
      await this.failJob(jobId, new JobCancelledError(jobId));
    }
    this.log.info({ jobId, running: leaseActive }, "[JOB] Cancellation requested");
    return this.describe(jobId);
  }

  async describe(jobId: string, now: Date = this.clock()): Promise<JobView> {
    return toJobView(await this.requireJob(jobId), now);
  }

  /** Translated PDF bytes for the job's owner. */
  async loadArtifact(jobId: string, ownerId: string): Promise<{ job: JobView; pdf: Buffer }> {
    const job = await this.requireJob(jobId);
    if (job.ownerId !== ownerId) {
      throw new JobAccessDeniedError(jobId);
    }
    const view = toJobView(job, this.clock());
    if (view.status === "expired") {
      throw new ArtifactUnavailableError(jobId, "expired");
    }
    if (job.status !== "completed" || !job.artifactRef) {
      throw new ArtifactUnavailableError(jobId, "not_completed");
    }
    const pdf = await this.storage.get(job.artifactRef);
    if (!pdf) {
      throw new ArtifactUnavailableError(jobId, "missing");
    }
    return { job: view, pdf };
  }

  /** Re-enqueues non-terminal jobs with no live run lease. */
  async resumeStalled(limit = 100): Promise<string[]> {
    const stalled = await this.store.jobs.listStalled(this.clock(), limit);
    for (const job of stalled) {
      await this.enqueue(job.jobId);
    }
    if (stalled.length) {
      this.log.info(
        { jobIds: stalled.map((job) => job.jobId) },
        "[JOB] Re-enqueued stalled jobs",
      );
    }
    return stalled.map((job) => job.jobId);
  }

  private async requireJob(jobId: string): Promise<JobRecord> {
    const job = await this.store.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  private async loadSource(job: JobRecord): Promise<Buffer> {
    const bytes = job.sourceRef ? await this.storage.get(job.sourceRef) : null;
    if (!bytes) {
      throw new UnsupportedDocumentError(
        "unreadable",
        `Source file for job ${job.jobId} is no longer available`,
      );
    }
    return bytes;
  }

  /** Pushes the lease forward; a lapsed lease taken by another run stops this one. */
  private async renewLease(jobId: string, runToken: string): Promise<void> {
    const now = this.clock();
    const renewed = await this.store.jobs.renewRun(
      jobId,
      runToken,
      new Date(now.getTime() + this.config.runLeaseMs),
      now,
    );
    if (!renewed) {
      throw new RunLeaseLostError(jobId, runToken);
    }
  }

  private async assertNotCancelled(jobId: string): Promise<void> {
    const job = await this.requireJob(jobId);
    if (job.cancelRequested) {
      throw new JobCancelledError(jobId);
    }
  }

  private async execute(jobId: string, runToken: string): Promise<JobRecord> {
    let job = await this.requireJob(jobId);
    try {
      while (!isTerminalStatus(job.status)) {
        await this.assertNotCancelled(jobId);
        await this.renewLease(jobId, runToken);
        switch (job.status) {
          case "created":
          case "validating":
            job = await this.validateStage(job, runToken);
            break;
          case "extracting":
            job = await this.extractStage(job, runToken);
            break;
          case "translating":
            job = await this.translateStage(job, runToken);
            break;
          case "reconstructing":
            job = await this.reconstructStage(job, runToken);
            break;
        }
      }
      this.log.info(
        {
          jobId,
          status: job.status,
          warnings: job.warnings.length,
          failedBlocks: job.failedBlockCount,
          clippedBlocks: job.clippedBlockCount,
        },
        "[JOB] Run finished",
      );
      return job;
    } catch (error) {
      if (this.isSuperseded(error)) {
        return this.stopSuperseded(jobId, runToken, error);
      }
      try {
        return (await this.failJob(jobId, error, runToken)) ?? job;
      } catch (failError) {
        if (failError instanceof RunLeaseLostError) {
          return this.stopSuperseded(jobId, runToken, failError);
        }
        throw failError;
      }
    }
  }

  private isSuperseded(error: unknown): boolean {
    return error instanceof RunLeaseLostError || error instanceof InvalidTransitionError;
  }

  /** Another run owns the job now; leave its state alone. */
  private async stopSuperseded(
    jobId: string,
    runToken: string,
    error: unknown,
  ): Promise<JobRecord> {
    this.log.warn(
      { jobId, runToken, err: describeError(error) },
      "[JOB] Run superseded, stopping without changing the job",
    );
    return this.requireJob(jobId);
  }

  private async validateStage(job: JobRecord, runToken?: string): Promise<JobRecord> {
    const current =
      job.status === "created"
        ? await this.store.jobs.transition(
            job.jobId,
            "created",
            "validating",
            {},
            this.clock(),
            runToken,
          )
        : job;

    const bytes = await this.loadSource(current);
    const { pageCount } = await inspectDocument(bytes, this.config.limits.maxPages);
    const balance = await this.store.ledger.balance(current.ownerId);
    if (balance.availableCredits < pageCount) {
      throw new InsufficientCreditsError(
        current.ownerId,
        pageCount,
        balance.availableCredits,
      );
    }

    const next = await this.store.transaction(async (scope) => {
      const debit = await scope.ledger.debit(current.ownerId, pageCount, current.jobId);
      return scope.jobs.transition(
        current.jobId,
        "validating",
        "extracting",
        { pageCount, creditsCharged: debit.amount },
        this.clock(),
        runToken,
      );
    });
    this.log.info(
      { jobId: current.jobId, pageCount, creditsCharged: next.creditsCharged },
      "[JOB] Validated and debited",
    );
    return next;
  }

  private async extractStage(job: JobRecord, runToken: string): Promise<JobRecord> {
    const bytes = await this.loadSource(job);
    const extracted = await extractDocument(bytes, {
      pageLimit: this.config.limits.maxPages,
      minTextDensity: this.config.extraction.minTextDensity,
      ocrConfidenceThreshold: this.config.extraction.ocrConfidenceThreshold,
      onPage: async (pageIndex) => {
        await this.renewLease(job.jobId, runToken);
        await this.store.jobs.update(
          job.jobId,
          { pagesProcessed: pageIndex + 1 },
          this.clock(),
        );
      },
    });
    const scanPages = extracted.pages.filter((page) => page.classification === "scan").length;
    this.log.info(
      { jobId: job.jobId, pageCount: extracted.pageCount, scanPages },
      "[JOB] Text layer extracted",
    );

    const ocr = await recognizeScanPages(extracted, {
      bytes,
      rasterizer: this.rasterizer,
      ocr: this.providers.ocr,
      sourceLang: job.sourceLang,
      model: this.config.ocr.model,
      renderDpi: this.config.ocr.renderDpi,
      retryPolicy: this.retryPolicy,
      concurrency: this.config.ocr.concurrency,
      timeoutMs: this.config.provider.timeoutMs,
      log: this.log,
      sleep: this.sleep,
    });

    return this.store.transaction(async (scope) => {
      await scope.checkpoints.save(job.jobId, "extracted", ocr.document);
      return scope.jobs.transition(
        job.jobId,
        "extracting",
        "translating",
        { warnings: ocr.warnings, pagesProcessed: ocr.document.pageCount },
        this.clock(),
        runToken,
      );
    });
  }

  private async translateStage(job: JobRecord, runToken: string): Promise<JobRecord> {
    const document = await this.store.checkpoints.load(job.jobId, "extracted");
    if (!document) {
      throw new Error(`Extraction checkpoint for job ${job.jobId} is missing`);
    }

    const outcome = await translateBlocks(allBlocks(document), {
      jobId: job.jobId,
      sourceLang: job.sourceLang,
      targetLang: job.targetLang,
      translator: this.providers.translator,
      primaryModel: this.config.translation.primaryModel,
      fallbackModel: this.config.translation.fallbackModel,
      maxBatchChars: this.config.translation.maxBatchChars,
      maxBatchBlocks: this.config.translation.maxBatchBlocks,
      lowConfidenceThreshold: this.config.translation.lowConfidenceThreshold,
      retryPolicy: this.retryPolicy,
      concurrency: this.config.translation.concurrency,
      timeoutMs: this.config.provider.timeoutMs,
      cache: this.store.cache,
      batchStore: this.store.batches,
      log: this.log,
      sleep: this.sleep,
    });
    const translated = mergeBlocks(document, outcome.blocks);

    return this.store.transaction(async (scope) => {
      await scope.checkpoints.save(job.jobId, "translated", translated);
      return scope.jobs.transition(
        job.jobId,
        "translating",
        "reconstructing",
        {
          warnings: [...job.warnings, ...outcome.warnings],
          failedBlockCount: outcome.failedBlockIds.length,
        },
        this.clock(),
        runToken,
      );
    });
  }

  private async renderBackgrounds(
    job: JobRecord,
    document: ExtractedDocument,
  ): Promise<Map<number, Buffer>> {
    const bytes = await this.loadSource(job);
    const limit = pLimit(Math.max(1, this.config.ocr.concurrency));
    try {
      const rendered = await Promise.all(
        document.pages.map((page) =>
          limit(() => this.rasterizer.render(bytes, page.index, this.config.ocr.renderDpi)),
        ),
      );
      return new Map(rendered.map((page): [number, Buffer] => [page.pageIndex, page.png]));
    } catch (error) {
      throw new ReconstructionError(
        `Page images could not be rendered: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private async reconstructStage(job: JobRecord, runToken: string): Promise<JobRecord> {
    const document = await this.store.checkpoints.load(job.jobId, "translated");
    if (!document) {
      throw new Error(`Translation checkpoint for job ${job.jobId} is missing`);
    }

    const backgrounds = await this.renderBackgrounds(job, document);
    const result = await reconstructDocument(document, {
      backgrounds,
      fontPath: this.config.render.fontPath,
      minFontSize: this.config.render.minFontSize,
      maxFontSize: this.config.render.maxFontSize,
      title: job.fileName,
    });
    const artifactRef = await this.storage.put(job.jobId, "output", result.pdf);
    this.log.info(
      {
        jobId: job.jobId,
        bytes: result.pdf.length,
        clippedBlocks: result.clippedBlocks.length,
        shrunkBlocks: result.shrunkBlocks.length,
      },
      "[RECONSTRUCT] PDF assembled",
    );

    return this.store.jobs.transition(
      job.jobId,
      "reconstructing",
      "completed",
      {
        artifactRef,
        clippedBlockCount: result.clippedBlocks.length,
        pagesProcessed: document.pageCount,
      },
      this.clock(),
      runToken,
    );
  }

  /**
   * Moves a non-terminal job to `failed` and refunds its debit in one
   * transaction. Returns the stored job; terminal jobs are left untouched.
   * With `runToken` the move only happens while that run holds the lease.
   */
  private async failJob(
    jobId: string,
    error: unknown,
    runToken?: string,
  ): Promise<JobRecord | null> {
    const detail = toErrorDetail(error);
    const result = await this.store.transaction(async (scope) => {
      const job = await scope.jobs.get(jobId);
      if (!job || isTerminalStatus(job.status)) {
        return { job, transitioned: false, refunded: false };
      }
      const failed = await scope.jobs.transition(
        jobId,
        job.status,
        "failed",
        { error: detail },
        this.clock(),
        runToken,
      );
      const refund = await scope.ledger.refund(jobId);
      return { job: failed, transitioned: true, refunded: refund.applied };
    });

    if (result.transitioned) {
      this.log.warn(
        { jobId, code: detail.code, err: describeError(error), refunded: result.refunded },
        "[JOB] Failed",
      );
    }
    return result.job;
  }
}
