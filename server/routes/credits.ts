import type { FastifyInstance } from "fastify";

import type { CreditLedger } from "../db/types";
import { okEnvelope } from "./envelope";

export interface CreditRoutesOptions {
  ledger: CreditLedger;
  version: string;
}

const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 200;

export const parseHistoryLimit = (raw: string | undefined): number => {
  const parsed = raw ? Number(raw) : Number.NaN;
  return Number.isInteger(parsed) && parsed > 0
    ? Math.min(parsed, MAX_HISTORY_LIMIT)
    : DEFAULT_HISTORY_LIMIT;
};

export default async function creditRoutes(
  fastify: FastifyInstance,
  options: CreditRoutesOptions,
) {
  const { ledger, version } = options;

  fastify.get<{ Params: { ownerId: string }; Querystring: { limit?: string } }>(
    "/v1/credits/:ownerId",
    async (request) => {
      const { ownerId } = request.params;
      const [balance, history] = await Promise.all([
        ledger.balance(ownerId),
        ledger.history(ownerId, parseHistoryLimit(request.query.limit)),
      ]);
      return okEnvelope(
        {
          ownerId,
          availableCredits: balance.availableCredits,
          history: history.map((entry) => ({
            id: entry.id,
            type: entry.type,
            amount: entry.amount,
            jobId: entry.jobId,
            externalRef: entry.externalRef,
            note: entry.note,
            createdAt: entry.createdAt.toISOString(),
          })),
        },
        version,
      );
    },
  );
}
