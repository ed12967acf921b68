import path from "node:path";
import type { FastifyBaseLogger } from "fastify";

import { getEnv } from "../config/env";
import { closePool, getPool } from "../db";
import { PgPipelineStore } from "../db/pgStore";
import type { JobRepository } from "../db/types";
import { describeError } from "../errors";
import { getLogger } from "../logger";
import {
  FileArtifactStorage,
  type ArtifactStorage,
} from "../services/storage/artifactStorage";

export interface CleanupOptions {
  jobs: Pick<JobRepository, "listExpired" | "markCleaned">;
  storage: ArtifactStorage;
  now: Date;
  log: FastifyBaseLogger;
  batchSize?: number;
}

export interface CleanupSummary {
  cleaned: string[];
  failed: string[];
}

/** Deletes stored source and output bytes of jobs past their retention. */
export async function cleanupExpiredJobs(options: CleanupOptions): Promise<CleanupSummary> {
  const expired = await options.jobs.listExpired(options.now, options.batchSize ?? 500);
  const summary: CleanupSummary = { cleaned: [], failed: [] };

  for (const job of expired) {
    try {
      for (const ref of [job.sourceRef, job.artifactRef]) {
        if (ref) await options.storage.remove(ref);
      }
      await options.jobs.markCleaned(job.jobId, options.now);
      summary.cleaned.push(job.jobId);
    } catch (error) {
      options.log.error(
        { jobId: job.jobId, err: describeError(error) },
        "[CLEANUP] Failed to remove artifacts",
      );
      summary.failed.push(job.jobId);
    }
  }

  options.log.info(
    { cleaned: summary.cleaned.length, failed: summary.failed.length },
    "[CLEANUP] Expired jobs processed",
  );
  return summary;
}

async function main() {
  const env = getEnv();
  const log = getLogger();
  const store = new PgPipelineStore(getPool());
  try {
    const summary = await cleanupExpiredJobs({
      jobs: store.jobs,
      storage: new FileArtifactStorage(path.resolve(env.STORAGE_DIR)),
      now: new Date(),
      log,
    });
    process.exitCode = summary.failed.length ? 1 : 0;
  } finally {
    await closePool();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    getLogger().fatal({ err: error }, "[CLEANUP] Run failed");
    process.exit(1);
  });
}
