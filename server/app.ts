import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";

import type { PipelineStore } from "./db/types";
import { PipelineError, describeError } from "./errors";
import adminRoutes from "./routes/admin";
import creditRoutes from "./routes/credits";
import {
  errorCodeFor,
  errorEnvelope,
  httpStatusFor,
  okEnvelope,
} from "./routes/envelope";
import jobRoutes, { type JobService } from "./routes/jobs";

export interface BuildAppOptions {
  jobs: JobService;
  store: Pick<PipelineStore, "ledger" | "jobs">;
  version: string;
  maxFileBytes: number;
  adminToken?: string;
  clientOrigin?: string;
  logLevel?: string;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { version } = options;
  const app = Fastify({
    logger: { name: "pdf-layout-translator", level: options.logLevel ?? "info" },
  });

  await app.register(cors, {
    origin: options.clientOrigin ?? true,
    credentials: true,
  });
  // One byte over the limit so the size check reports a too_large document.
  await app.register(multipart, {
    limits: { fileSize: options.maxFileBytes + 1, files: 1 },
  });

  app.setErrorHandler((error, request, reply) => {
    const status = httpStatusFor(error);
    const code = errorCodeFor(error, status);
    if (status >= 500) {
      request.log.error({ err: error }, "[HTTP] Request failed");
    } else {
      request.log.info({ code, status }, "[HTTP] Request rejected");
    }
    const message =
      status >= 500 && !(error instanceof PipelineError)
        ? "Internal server error"
        : describeError(error);
    return reply.status(status).send(errorEnvelope(code, message, version));
  });

  app.setNotFoundHandler((request, reply) =>
    reply
      .status(404)
      .send(errorEnvelope("route_not_found", `Route ${request.method} ${request.url} not found`, version)),
  );

  app.get("/health", async () => okEnvelope({ ok: true }, version));
  app.get("/version", async () => okEnvelope({ version }, version));

  await app.register(jobRoutes, { jobs: options.jobs, version });
  await app.register(creditRoutes, { ledger: options.store.ledger, version });
  await app.register(adminRoutes, {
    ledger: options.store.ledger,
    jobs: options.store.jobs,
    adminToken: options.adminToken,
    version,
  });

  return app;
}
