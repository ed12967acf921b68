import { parseLanguageCode, type LanguageCode } from "../config/pipelineConfig";
import {
  InvalidTransitionError,
  JobNotFoundError,
  RunLeaseLostError,
  isPipelineErrorCode,
} from "../errors";
import {
  assertTransition,
  isJobStatus,
  type JobStatus,
} from "../services/jobs/jobStateMachine";
import { parseWarnings } from "../services/pipeline/documentSchema";
import type {
  JobErrorDetail,
  JobPatch,
  JobRecord,
  JobRepository,
  JobStats,
  NewJob,
  Queryable,
} from "./types";

type JobRow = {
  job_id: string;
  owner_id: string;
  source_lang: string;
  target_lang: string;
  status: string;
  file_name: string;
  file_size: string | number;
  page_count: number;
  pages_processed: number;
  source_ref: string | null;
  artifact_ref: string | null;
  error: unknown;
  warnings: unknown;
  failed_block_count: number;
  clipped_block_count: number;
  credits_charged: number;
  cancel_requested: boolean;
  run_token: string | null;
  lease_expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
  expires_at: Date;
  completed_at: Date | null;
  cleaned_at: Date | null;
};

const requireLanguage = (value: string, column: string): LanguageCode => {
  const parsed = parseLanguageCode(value);
  if (!parsed) {
    throw new Error(`jobs.${column} holds unsupported language "${value}"`);
  }
  return parsed;
};

const requireStatus = (value: string): JobStatus => {
  if (!isJobStatus(value)) {
    throw new Error(`jobs.status holds unknown status "${value}"`);
  }
  return value;
};

const parseErrorDetail = (value: unknown): JobErrorDetail | null => {
  if (!value || typeof value !== "object") return null;
  const code = "code" in value ? value.code : null;
  const message = "message" in value ? value.message : null;
  if (typeof code !== "string" || typeof message !== "string") return null;
  return { code: isPipelineErrorCode(code) ? code : "internal_error", message };
};

export const mapJobRow = (row: JobRow): JobRecord => ({
  jobId: row.job_id,
  ownerId: row.owner_id,
  sourceLang: requireLanguage(row.source_lang, "source_lang"),
  targetLang: requireLanguage(row.target_lang, "target_lang"),
  status: requireStatus(row.status),
  fileName: row.file_name,
  fileSize: Number(row.file_size),
  pageCount: row.page_count,
  pagesProcessed: row.pages_processed,
  sourceRef: row.source_ref,
  artifactRef: row.artifact_ref,
  error: parseErrorDetail(row.error),
  warnings: parseWarnings(row.warnings),
  failedBlockCount: row.failed_block_count,
  clippedBlockCount: row.clipped_block_count,
  creditsCharged: row.credits_charged,
  cancelRequested: row.cancel_requested,
  runToken: row.run_token,
  leaseExpiresAt: row.lease_expires_at,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
  expiresAt: row.expires_at,
  completedAt: row.completed_at,
  cleanedAt: row.cleaned_at,
});

const PATCH_COLUMNS: ReadonlyArray<[keyof JobPatch, string]> = [
  ["pageCount", "page_count"],
  ["pagesProcessed", "pages_processed"],
  ["artifactRef", "artifact_ref"],
  ["error", "error"],
  ["warnings", "warnings"],
  ["failedBlockCount", "failed_block_count"],
  ["clippedBlockCount", "clipped_block_count"],
  ["creditsCharged", "credits_charged"],
];

const JSON_COLUMNS = new Set(["error", "warnings"]);

function buildPatchAssignments(
  patch: JobPatch,
  startIndex: number,
): { assignments: string[]; values: unknown[] } {
  const assignments: string[] = [];
  const values: unknown[] = [];
  for (const [key, column] of PATCH_COLUMNS) {
    const value = patch[key];
    if (value === undefined) continue;
    values.push(JSON_COLUMNS.has(column) && value !== null ? JSON.stringify(value) : value);
    assignments.push(`${column} = $${startIndex + values.length - 1}`);
  }
  return { assignments, values };
}

export class PgJobRepository implements JobRepository {
  constructor(private readonly db: Queryable) {}

  async create(job: NewJob): Promise<JobRecord> {
    const { rows } = await this.db.query<JobRow>(
      `INSERT INTO jobs (
         job_id, owner_id, source_lang, target_lang, status, file_name,
         file_size, source_ref, created_at, updated_at, expires_at
       )
       VALUES ($1, $2, $3, $4, 'created', $5, $6, $7, $8, $8, $9)
       RETURNING *`,
      [
        job.jobId,
        job.ownerId,
        job.sourceLang,
        job.targetLang,
        job.fileName,
        job.fileSize,
        job.sourceRef,
        job.createdAt,
        job.expiresAt,
      ],
    );
    return mapJobRow(rows[0]);
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const { rows } = await this.db.query<JobRow>(
      `SELECT * FROM jobs WHERE job_id = $1 LIMIT 1`,
      [jobId],
    );
    return rows.length ? mapJobRow(rows[0]) : null;
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
    const { assignments, values } = buildPatchAssignments(patch, 5);
    const completedClause =
      to === "completed" || to === "failed" ? ", completed_at = $4" : "";
    const tokenClause =
      runToken === undefined ? "" : ` AND run_token = $${5 + values.length}`;
    const { rows } = await this.db.query<JobRow>(
      `UPDATE jobs
          SET status = $3,
              updated_at = $4${completedClause}
              ${assignments.length ? `, ${assignments.join(", ")}` : ""}
        WHERE job_id = $1 AND status = $2${tokenClause}
        RETURNING *`,
      runToken === undefined
        ? [jobId, from, to, now, ...values]
        : [jobId, from, to, now, ...values, runToken],
    );
    if (!rows.length) {
      const current = await this.get(jobId);
      if (!current) throw new JobNotFoundError(jobId);
      if (runToken !== undefined && current.status === from && current.runToken !== runToken) {
        throw new RunLeaseLostError(jobId, runToken);
      }
      throw new InvalidTransitionError(jobId, current.status, to);
    }
    return mapJobRow(rows[0]);
  }

  async update(jobId: string, patch: JobPatch, now: Date): Promise<JobRecord> {
    const { assignments, values } = buildPatchAssignments(patch, 3);
    const { rows } = await this.db.query<JobRow>(
      `UPDATE jobs
          SET updated_at = $2
              ${assignments.length ? `, ${assignments.join(", ")}` : ""}
        WHERE job_id = $1
        RETURNING *`,
      [jobId, now, ...values],
    );
    if (!rows.length) throw new JobNotFoundError(jobId);
    return mapJobRow(rows[0]);
  }

  async acquireRun(
    jobId: string,
    runToken: string,
    leaseExpiresAt: Date,
    now: Date,
  ): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE jobs
          SET run_token = $2, lease_expires_at = $3, updated_at = $4
        WHERE job_id = $1
          AND status NOT IN ('completed', 'failed')
          AND (run_token IS NULL OR lease_expires_at IS NULL OR lease_expires_at <= $4)`,
      [jobId, runToken, leaseExpiresAt, now],
    );
    return (rowCount ?? 0) > 0;
  }

  async renewRun(
    jobId: string,
    runToken: string,
    leaseExpiresAt: Date,
    now: Date,
  ): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE jobs
          SET lease_expires_at = $3, updated_at = $4
        WHERE job_id = $1 AND run_token = $2`,
      [jobId, runToken, leaseExpiresAt, now],
    );
    return (rowCount ?? 0) > 0;
  }

  async releaseRun(jobId: string, runToken: string): Promise<void> {
    await this.db.query(
      `UPDATE jobs
          SET run_token = NULL, lease_expires_at = NULL
        WHERE job_id = $1 AND run_token = $2`,
      [jobId, runToken],
    );
  }

  async requestCancel(jobId: string, now: Date): Promise<JobRecord | null> {
    const { rows } = await this.db.query<JobRow>(
      `UPDATE jobs
          SET cancel_requested = TRUE, updated_at = $2
        WHERE job_id = $1
        RETURNING *`,
      [jobId, now],
    );
    return rows.length ? mapJobRow(rows[0]) : null;
  }

  async listStalled(now: Date, limit: number): Promise<JobRecord[]> {
    const { rows } = await this.db.query<JobRow>(
      `SELECT * FROM jobs
        WHERE status NOT IN ('completed', 'failed')
          AND (run_token IS NULL OR lease_expires_at <= $1)
        ORDER BY created_at ASC
        LIMIT $2`,
      [now, limit],
    );
    return rows.map(mapJobRow);
  }

  async listExpired(now: Date, limit: number): Promise<JobRecord[]> {
    const { rows } = await this.db.query<JobRow>(
      `SELECT * FROM jobs
        WHERE cleaned_at IS NULL AND expires_at < $1
        ORDER BY expires_at ASC
        LIMIT $2`,
      [now, limit],
    );
    return rows.map(mapJobRow);
  }

  async markCleaned(jobId: string, now: Date): Promise<void> {
    await this.db.query(
      `UPDATE jobs SET cleaned_at = $2, updated_at = $2 WHERE job_id = $1`,
      [jobId, now],
    );
  }

  async stats(): Promise<JobStats> {
    const { rows } = await this.db.query<{
      job_count: number;
      success_count: number;
      failed_count: number;
      avg_pages: string | null;
    }>(
      `SELECT COUNT(*)::INTEGER AS job_count,
              COUNT(*) FILTER (WHERE status = 'completed')::INTEGER AS success_count,
              COUNT(*) FILTER (WHERE status = 'failed')::INTEGER AS failed_count,
              AVG(page_count) AS avg_pages
         FROM jobs`,
    );
    const row = rows[0];
    return {
      jobCount: row?.job_count ?? 0,
      successCount: row?.success_count ?? 0,
      failedCount: row?.failed_count ?? 0,
      avgPages: Number(row?.avg_pages ?? 0),
    };
  }
}
