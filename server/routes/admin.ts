import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { CreditLedger, JobRepository } from "../db/types";
import { requireAdminToken } from "../middleware/adminToken";
import { okEnvelope, sendError } from "./envelope";

export interface AdminRoutesOptions {
  ledger: CreditLedger;
  jobs: Pick<JobRepository, "stats">;
  adminToken: string | undefined;
  version: string;
}

const grantSchema = z.object({
  owner_id: z.string().trim().min(1).max(128),
  amount: z.number().int().positive(),
  note: z.string().trim().max(500).optional(),
  external_ref: z.string().trim().max(200).optional(),
});

const round4 = (value: number) => Math.round(value * 10_000) / 10_000;

export default async function adminRoutes(
  fastify: FastifyInstance,
  options: AdminRoutesOptions,
) {
  const { ledger, jobs, version } = options;
  const preHandler = requireAdminToken(options.adminToken, version);

  fastify.post("/v1/admin/credits/grant", { preHandler }, async (request, reply) => {
    const body = grantSchema.safeParse(request.body);
    if (!body.success) {
      return sendError(
        reply,
        400,
        "invalid_request",
        "owner_id and a positive integer amount are required",
        version,
      );
    }
    const balance = await ledger.grant(
      body.data.owner_id,
      body.data.amount,
      body.data.note ?? "admin grant",
      body.data.external_ref ?? null,
    );
    request.log.info(
      { ownerId: balance.ownerId, amount: body.data.amount },
      "[ADMIN] Credits granted",
    );
    return okEnvelope(balance, version);
  });

  fastify.get("/v1/admin/jobs/stats", { preHandler }, async () => {
    const stats = await jobs.stats();
    return okEnvelope(
      {
        job_count: stats.jobCount,
        success_count: stats.successCount,
        failed_count: stats.failedCount,
        success_rate: stats.jobCount ? round4(stats.successCount / stats.jobCount) : 0,
        avg_pages: round4(stats.avgPages),
      },
      version,
    );
  });
}
