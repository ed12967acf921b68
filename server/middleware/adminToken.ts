import { timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";
import { sendError } from "../routes/envelope";

const ADMIN_HEADER = "x-admin-token";

const tokensMatch = (provided: string, expected: string) => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * preHandler guarding admin routes with a shared token. With no token
 * configured the admin surface is disabled.
 */
export function requireAdminToken(expected: string | undefined, version: string) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!expected) {
      request.log.error("[ADMIN] ADMIN_API_TOKEN is not configured");
      return sendError(reply, 500, "internal_error", "Admin access is not configured", version);
    }
    const header = request.headers[ADMIN_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;
    if (!provided || !tokensMatch(provided, expected)) {
      return sendError(reply, 401, "unauthorized", "Missing or invalid admin token", version);
    }
  };
}
