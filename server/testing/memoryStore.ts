import type { LanguageCode } from "../config/pipelineConfig";
import {
  InsufficientCreditsError,
  InvalidTransitionError,
  JobNotFoundError,
  RunLeaseLostError,
} from "../errors";
import { translationCacheKey } from "../db/pgStore";
import type {
  BatchRepository,
  CheckpointRepository,
  CheckpointStage,
  CreditBalance,
  CreditLedger,
  JobPatch,
  JobRecord,
  JobRepository,
  JobStats,
  LedgerEntry,
  LedgerEntryType,
  LedgerMutation,
  NewJob,
  PipelineStore,
  StoreScope,
  StoredBatch,
  TranslationCache,
} from "../db/types";
import {
  assertTransition,
  isTerminalStatus,
  type JobStatus,
} from "../services/jobs/jobStateMachine";
import type { ExtractedDocument } from "../services/pipeline/types";

interface MemoryState {
  jobs: Map<string, JobRecord>;
  accounts: Map<string, number>;
  ledger: LedgerEntry[];
  checkpoints: Map<string, ExtractedDocument>;
  batches: Map<string, Map<string, StoredBatch>>;
  cache: Map<string, string>;
  nextLedgerId: number;
}

const emptyState = (): MemoryState => ({
  jobs: new Map(),
  accounts: new Map(),
  ledger: [],
  checkpoints: new Map(),
  batches: new Map(),
  cache: new Map(),
  nextLedgerId: 1,
});

type StateRef = () => MemoryState;

const applyPatch = (job: JobRecord, patch: JobPatch): JobRecord => {
  const next = { ...job };
  if (patch.pageCount !== undefined) next.pageCount = patch.pageCount;
  if (patch.pagesProcessed !== undefined) next.pagesProcessed = patch.pagesProcessed;
  if (patch.artifactRef !== undefined) next.artifactRef = patch.artifactRef;
  if (patch.error !== undefined) next.error = patch.error;
  if (patch.warnings !== undefined) next.warnings = patch.warnings;
  if (patch.failedBlockCount !== undefined) next.failedBlockCount = patch.failedBlockCount;
  if (patch.clippedBlockCount !== undefined) next.clippedBlockCount = patch.clippedBlockCount;
  if (patch.creditsCharged !== undefined) next.creditsCharged = patch.creditsCharged;
  return next;
};

class MemoryJobRepository implements JobRepository {
  constructor(private readonly state: StateRef) {}

  async create(job: NewJob): Promise<JobRecord> {
    const record: JobRecord = {
      ...job,
      status: "created",
      pageCount: 0,
      pagesProcessed: 0,
      artifactRef: null,
      error: null,
      warnings: [],
      failedBlockCount: 0,
      clippedBlockCount: 0,
      creditsCharged: 0,
      cancelRequested: false,
      runToken: null,
      leaseExpiresAt: null,
      updatedAt: job.createdAt,
      completedAt: null,
      cleanedAt: null,
    };
    this.state().jobs.set(job.jobId, record);
    return structuredClone(record);
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const job = this.state().jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async transition(
    jobId: string,
    from: JobStatus,
    to: JobStatus,
    patch: JobPatch,
    now: Date,
    runToken?: string,
  ): Promise<JobRecord> {
    assertTransition(jobId, from, to);
    const current = this.state().jobs.get(jobId);
    if (!current) throw new JobNotFoundError(jobId);
    if (current.status !== from) {
      throw new InvalidTransitionError(jobId, current.status, to);
    }
    if (runToken !== undefined && current.runToken !== runToken) {
      throw new RunLeaseLostError(jobId, runToken);
    }
    const next: JobRecord = {
      ...applyPatch(current, patch),
      status: to,
      updatedAt: now,
      completedAt: isTerminalStatus(to) ? now : current.completedAt,
    };
    if (next.status === "completed" && !next.artifactRef) {
      throw new Error("jobs_completed_has_artifact violated");
    }
    this.state().jobs.set(jobId, next);
    return structuredClone(next);
  }

  async update(jobId: string, patch: JobPatch, now: Date): Promise<JobRecord> {
    const current = this.state().jobs.get(jobId);
    if (!current) throw new JobNotFoundError(jobId);
    const next = { ...applyPatch(current, patch), updatedAt: now };
    this.state().jobs.set(jobId, next);
    return structuredClone(next);
  }

  async acquireRun(
    jobId: string,
    runToken: string,
    leaseExpiresAt: Date,
    now: Date,
  ): Promise<boolean> {
    const current = this.state().jobs.get(jobId);
    if (!current || isTerminalStatus(current.status)) return false;
    const leaseActive =
      current.runToken !== null &&
      current.leaseExpiresAt !== null &&
      current.leaseExpiresAt.getTime() > now.getTime();
    if (leaseActive) return false;
    this.state().jobs.set(jobId, {
      ...current,
      runToken,
      leaseExpiresAt,
      updatedAt: now,
    });
    return true;
  }

  async renewRun(
    jobId: string,
    runToken: string,
    leaseExpiresAt: Date,
    now: Date,
  ): Promise<boolean> {
    const current = this.state().jobs.get(jobId);
    if (!current || current.runToken !== runToken) return false;
    this.state().jobs.set(jobId, { ...current, leaseExpiresAt, updatedAt: now });
    return true;
  }

  async releaseRun(jobId: string, runToken: string): Promise<void> {
    const current = this.state().jobs.get(jobId);
    if (!current || current.runToken !== runToken) return;
    this.state().jobs.set(jobId, { ...current, runToken: null, leaseExpiresAt: null });
  }

  async requestCancel(jobId: string, now: Date): Promise<JobRecord | null> {
    const current = this.state().jobs.get(jobId);
    if (!current) return null;
    const next = { ...current, cancelRequested: true, updatedAt: now };
    this.state().jobs.set(jobId, next);
    return structuredClone(next);
  }

  async listStalled(now: Date, limit: number): Promise<JobRecord[]> {
    return [...this.state().jobs.values()]
      .filter(
        (job) =>
          !isTerminalStatus(job.status) &&
          (job.runToken === null ||
            (job.leaseExpiresAt !== null &&
              job.leaseExpiresAt.getTime() <= now.getTime())),
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async listExpired(now: Date, limit: number): Promise<JobRecord[]> {
    return [...this.state().jobs.values()]
      .filter(
        (job) => job.cleanedAt === null && job.expiresAt.getTime() < now.getTime(),
      )
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async markCleaned(jobId: string, now: Date): Promise<void> {
    const current = this.state().jobs.get(jobId);
    if (!current) return;
    this.state().jobs.set(jobId, { ...current, cleanedAt: now, updatedAt: now });
  }

  async stats(): Promise<JobStats> {
    const jobs = [...this.state().jobs.values()];
    const totalPages = jobs.reduce((sum, job) => sum + job.pageCount, 0);
    return {
      jobCount: jobs.length,
      successCount: jobs.filter((job) => job.status === "completed").length,
      failedCount: jobs.filter((job) => job.status === "failed").length,
      avgPages: jobs.length ? totalPages / jobs.length : 0,
    };
  }
}

class MemoryCreditLedger implements CreditLedger {
  constructor(private readonly state: StateRef) {}

  async balance(ownerId: string): Promise<CreditBalance> {
    return { ownerId, availableCredits: this.state().accounts.get(ownerId) ?? 0 };
  }

  async grant(
    ownerId: string,
    amount: number,
    note: string,
    externalRef: string | null,
  ): Promise<CreditBalance> {
    if (!Number.isInteger(amount) || amount <= 0) {
      throw new Error("Grant amount must be a positive integer");
    }
    const balance = (this.state().accounts.get(ownerId) ?? 0) + amount;
    this.state().accounts.set(ownerId, balance);
    this.append(ownerId, "grant", amount, null, externalRef, note);
    return { ownerId, availableCredits: balance };
  }

  async debit(
    ownerId: string,
    amount: number,
    jobId: string,
  ): Promise<LedgerMutation> {
    const existing = this.findJobEntry(jobId, "debit");
    if (existing) {
      return {
        applied: false,
        amount: existing.amount,
        balance: this.state().accounts.get(existing.ownerId) ?? 0,
      };
    }
    const available = this.state().accounts.get(ownerId) ?? 0;
    if (available < amount) {
      throw new InsufficientCreditsError(ownerId, amount, available);
    }
    const balance = available - amount;
    this.state().accounts.set(ownerId, balance);
    this.append(ownerId, "debit", amount, jobId, null, null);
    return { applied: true, amount, balance };
  }

  async refund(jobId: string): Promise<LedgerMutation> {
    const debit = this.findJobEntry(jobId, "debit");
    if (!debit) return { applied: false, amount: 0, balance: null };
    const previous = this.findJobEntry(jobId, "refund");
    if (previous) {
      return {
        applied: false,
        amount: previous.amount,
        balance: this.state().accounts.get(debit.ownerId) ?? 0,
      };
    }
    const balance = (this.state().accounts.get(debit.ownerId) ?? 0) + debit.amount;
    this.state().accounts.set(debit.ownerId, balance);
    this.append(debit.ownerId, "refund", debit.amount, jobId, null, "job failed");
    return { applied: true, amount: debit.amount, balance };
  }

  async history(ownerId: string, limit: number): Promise<LedgerEntry[]> {
    return this.state()
      .ledger.filter((entry) => entry.ownerId === ownerId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((entry) => structuredClone(entry));
  }

  private findJobEntry(jobId: string, type: LedgerEntryType): LedgerEntry | undefined {
    return this.state().ledger.find(
      (entry) => entry.jobId === jobId && entry.type === type,
    );
  }

  private append(
    ownerId: string,
    type: LedgerEntryType,
    amount: number,
    jobId: string | null,
    externalRef: string | null,
    note: string | null,
  ): void {
    const state = this.state();
    state.ledger.push({
      id: state.nextLedgerId,
      ownerId,
      type,
      amount,
      jobId,
      externalRef,
      note,
      createdAt: new Date(),
    });
    state.nextLedgerId += 1;
  }
}

class MemoryCheckpointRepository implements CheckpointRepository {
  constructor(private readonly state: StateRef) {}

  async save(
    jobId: string,
    stage: CheckpointStage,
    document: ExtractedDocument,
  ): Promise<void> {
    this.state().checkpoints.set(`${jobId}:${stage}`, structuredClone(document));
  }

  async load(
    jobId: string,
    stage: CheckpointStage,
  ): Promise<ExtractedDocument | null> {
    const document = this.state().checkpoints.get(`${jobId}:${stage}`);
    return document ? structuredClone(document) : null;
  }
}

class MemoryBatchRepository implements BatchRepository {
  constructor(private readonly state: StateRef) {}

  async listSucceeded(jobId: string): Promise<StoredBatch[]> {
    const batches = this.state().batches.get(jobId);
    if (!batches) return [];
    return [...batches.values()]
      .filter((batch) => batch.status === "succeeded")
      .map((batch) => structuredClone(batch));
  }

  async record(jobId: string, batch: StoredBatch): Promise<void> {
    const batches = this.state().batches.get(jobId) ?? new Map<string, StoredBatch>();
    const previous = batches.get(batch.batchKey);
    batches.set(batch.batchKey, {
      ...structuredClone(batch),
      attempts: (previous?.attempts ?? 0) + batch.attempts,
    });
    this.state().batches.set(jobId, batches);
  }
}

class MemoryTranslationCache implements TranslationCache {
  constructor(private readonly state: StateRef) {}

  async get(
    sourceLang: LanguageCode,
    targetLang: LanguageCode,
    text: string,
  ): Promise<string | null> {
    return this.state().cache.get(translationCacheKey(sourceLang, targetLang, text)) ?? null;
  }

  async set(
    sourceLang: LanguageCode,
    targetLang: LanguageCode,
    text: string,
    translated: string,
  ): Promise<void> {
    const key = translationCacheKey(sourceLang, targetLang, text);
    if (!this.state().cache.has(key)) {
      this.state().cache.set(key, translated);
    }
  }
}

/**
 * In-process PipelineStore for tests. Transactions snapshot the whole state
 * and restore it when the work throws.
 */
export class MemoryPipelineStore implements PipelineStore {
  private state: MemoryState = emptyState();
  readonly jobs: JobRepository;
  readonly ledger: CreditLedger;
  readonly checkpoints: CheckpointRepository;
  readonly batches: BatchRepository;
  readonly cache: TranslationCache;
  transactionCount = 0;

  constructor() {
    const ref: StateRef = () => this.state;
    this.jobs = new MemoryJobRepository(ref);
    this.ledger = new MemoryCreditLedger(ref);
    this.checkpoints = new MemoryCheckpointRepository(ref);
    this.batches = new MemoryBatchRepository(ref);
    this.cache = new MemoryTranslationCache(ref);
  }

  async transaction<T>(work: (scope: StoreScope) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    this.transactionCount += 1;
    try {
      return await work(this);
    } catch (error) {
      this.state = snapshot;
      throw error;
    }
  }

  ledgerEntries(ownerId?: string): LedgerEntry[] {
    return this.state.ledger
      .filter((entry) => !ownerId || entry.ownerId === ownerId)
      .map((entry) => structuredClone(entry));
  }

  /** Overwrites stored job fields directly, bypassing the state machine. */
  forceJob(jobId: string, fields: Partial<JobRecord>): void {
    const current = this.state.jobs.get(jobId);
    if (!current) throw new JobNotFoundError(jobId);
    this.state.jobs.set(jobId, { ...current, ...fields });
  }
}
