import path from "node:path";

import { buildApp } from "./app";
import { getEnv } from "./config/env";
import { getPipelineConfig } from "./config/pipelineConfig";
import { closePool, getPool } from "./db";
import { PgPipelineStore } from "./db/pgStore";
import { getLogger } from "./logger";
import {
  closeTranslationQueue,
  enqueueTranslationJob,
  registerTranslationJobProcessor,
} from "./services/jobQueue";
import { JobOrchestrator } from "./services/jobs/jobOrchestrator";
import { PdfToPngRasterizer } from "./services/pipeline/pageRasterizer";
import { createModelProviders } from "./services/providers/openaiCompatible";
import { FileArtifactStorage } from "./services/storage/artifactStorage";

async function bootstrap() {
  const env = getEnv();
  const log = getLogger();
  const config = getPipelineConfig();
  const store = new PgPipelineStore(getPool());

  const orchestrator = new JobOrchestrator({
    store,
    storage: new FileArtifactStorage(path.resolve(env.STORAGE_DIR)),
    providers: createModelProviders(env),
    rasterizer: new PdfToPngRasterizer(),
    config,
    log,
    enqueue: enqueueTranslationJob,
  });

  registerTranslationJobProcessor(async (job) => {
    const record = await orchestrator.run(job.data.jobId);
    return { status: record.status };
  }, env.JOB_WORKER_CONCURRENCY);

  const resumed = await orchestrator.resumeStalled();
  log.info({ resumed: resumed.length }, "[STARTUP] Worker registered");

  const app = await buildApp({
    jobs: orchestrator,
    store,
    version: env.APP_VERSION,
    maxFileBytes: config.limits.maxFileBytes,
    adminToken: env.ADMIN_API_TOKEN,
    clientOrigin: env.CLIENT_ORIGIN,
    logLevel: env.LOG_LEVEL,
  });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, "[SHUTDOWN] Closing server");
    await app.close();
    await closeTranslationQueue();
    await closePool();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log.error({ err: error }, "[SHUTDOWN] Failed to close cleanly");
          process.exit(1);
        });
    });
  }

  const port = Number(env.PORT);
  await app.listen({ port, host: "0.0.0.0" });
  app.log.info(`[STARTUP] Server started on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  getLogger().fatal({ err: error }, "[FATAL] Failed to start server");
  process.exit(1);
});
