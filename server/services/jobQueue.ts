import { Queue, Worker, type Job, type Processor } from "bullmq";
import { getLogger } from "../logger";
import { createRedisClient } from "./redis";

export interface TranslationJobData {
  jobId: string;
}

export interface TranslationJobResult {
  status: string;
}

const QUEUE_NAME = "pdf_translation_jobs";

let queue: Queue<TranslationJobData, TranslationJobResult, string> | null = null;
let worker: Worker<TranslationJobData, TranslationJobResult, string> | null = null;

function getQueue() {
  if (!queue) {
    queue = new Queue<TranslationJobData, TranslationJobResult, string>(QUEUE_NAME, {
      connection: createRedisClient("translation-job-queue"),
    });
    queue.waitUntilReady().catch((error: unknown) => {
      getLogger().error({ err: error }, "[QUEUE] Failed to initialize job queue");
    });
  }
  return queue;
}

/**
 * The queue job id is the translation job id, so enqueueing a job that is
 * already waiting or running is a no-op. Finished entries are removed so a
 * stalled job can be queued again.
 */
export async function enqueueTranslationJob(jobId: string): Promise<void> {
  await getQueue().add(
    "translate-pdf",
    { jobId },
    { jobId, removeOnComplete: true, removeOnFail: true },
  );
}

export function registerTranslationJobProcessor(
  processor: Processor<TranslationJobData, TranslationJobResult, string>,
  concurrency: number,
) {
  if (worker) {
    return worker;
  }
  const log = getLogger();
  worker = new Worker<TranslationJobData, TranslationJobResult, string>(
    QUEUE_NAME,
    processor,
    {
      connection: createRedisClient("translation-job-worker"),
      concurrency: Math.max(1, concurrency),
    },
  );
  worker.on("completed", (job: Job<TranslationJobData, TranslationJobResult, string>) => {
    log.info({ jobId: job.data.jobId, status: job.returnvalue?.status }, "[QUEUE] Run completed");
  });
  worker.on("failed", (job, error) => {
    log.error({ jobId: job?.data.jobId, err: error }, "[QUEUE] Run failed");
  });
  return worker;
}

export async function closeTranslationQueue() {
  await Promise.all([worker?.close(), queue?.close()]);
  worker = null;
  queue = null;
}
