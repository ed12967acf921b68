import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";

import type { JobOrchestrator } from "../services/jobs/jobOrchestrator";
import { okEnvelope, sendError } from "./envelope";

export type JobService = Pick<
  JobOrchestrator,
  "submit" | "describe" | "cancel" | "loadArtifact"
>;

export interface JobRoutesOptions {
  jobs: JobService;
  version: string;
}

interface UploadedForm {
  fields: Record<string, string>;
  file: { fileName: string; bytes: Buffer } | null;
}

const submitFieldsSchema = z.object({
  owner_id: z.string().trim().min(1).max(128),
  source_lang: z.string().trim().min(2).max(8),
  target_lang: z.string().trim().min(2).max(8),
});

const downloadQuerySchema = z.object({
  owner_id: z.string().trim().min(1).max(128),
});

async function readUpload(request: FastifyRequest): Promise<UploadedForm> {
  const form: UploadedForm = { fields: {}, file: null };
  for await (const part of request.parts()) {
    if (part.type === "file") {
      const bytes = await part.toBuffer();
      if (part.fieldname === "file" && !form.file) {
        form.file = { fileName: part.filename || "document.pdf", bytes };
      }
    } else if (typeof part.value === "string") {
      form.fields[part.fieldname] = part.value;
    }
  }
  return form;
}

const translatedFileName = (fileName: string, targetLang: string) => {
  const base = fileName.replace(/\.pdf$/i, "").replace(/["\\\r\n]/g, "_") || "document";
  return `${base}.${targetLang}.pdf`;
};

export default async function jobRoutes(
  fastify: FastifyInstance,
  options: JobRoutesOptions,
) {
  const { jobs, version } = options;

  fastify.post("/v1/jobs", async (request, reply) => {
    if (!request.isMultipart()) {
      return sendError(reply, 400, "invalid_request", "Expected multipart/form-data", version);
    }
    const form = await readUpload(request);
    if (!form.file) {
      return sendError(reply, 400, "invalid_request", "No file provided", version);
    }
    const parsed = submitFieldsSchema.safeParse(form.fields);
    if (!parsed.success) {
      return sendError(
        reply,
        400,
        "invalid_request",
        "owner_id, source_lang and target_lang are required",
        version,
      );
    }

    const job = await jobs.submit({
      ownerId: parsed.data.owner_id,
      sourceLang: parsed.data.source_lang,
      targetLang: parsed.data.target_lang,
      fileName: form.file.fileName,
      bytes: form.file.bytes,
    });
    return okEnvelope(job, version);
  });

  fastify.get<{ Params: { jobId: string } }>("/v1/jobs/:jobId", async (request) => {
    const job = await jobs.describe(request.params.jobId);
    return okEnvelope(job, version);
  });

  fastify.post<{ Params: { jobId: string } }>(
    "/v1/jobs/:jobId/cancel",
    async (request) => {
      const job = await jobs.cancel(request.params.jobId);
      return okEnvelope(job, version);
    },
  );

  fastify.get<{ Params: { jobId: string }; Querystring: { owner_id?: string } }>(
    "/v1/jobs/:jobId/download",
    async (request, reply) => {
      const query = downloadQuerySchema.safeParse(request.query);
      if (!query.success) {
        return sendError(reply, 400, "invalid_request", "owner_id is required", version);
      }
      const { job, pdf } = await jobs.loadArtifact(
        request.params.jobId,
        query.data.owner_id,
      );
      return reply
        .header("content-type", "application/pdf")
        .header(
          "content-disposition",
          `attachment; filename="${translatedFileName(job.fileName, job.targetLang)}"`,
        )
        .send(pdf);
    },
  );
}
