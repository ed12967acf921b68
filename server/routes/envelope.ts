import type { FastifyReply } from "fastify";
import { PipelineError, UnsupportedDocumentError, ArtifactUnavailableError } from "../errors";

export interface EnvelopeError {
  code: string;
  message: string;
}

export interface Envelope<T> {
  status: "ok" | "error";
  data: T | null;
  meta: { version: string };
  error: EnvelopeError | null;
}

export const okEnvelope = <T>(data: T, version: string): Envelope<T> => ({
  status: "ok",
  data,
  meta: { version },
  error: null,
});

export const errorEnvelope = (
  code: string,
  message: string,
  version: string,
): Envelope<null> => ({
  status: "error",
  data: null,
  meta: { version },
  error: { code, message },
});

const STATUS_BY_CODE: Record<PipelineError["code"], number> = {
  unsupported_document: 400,
  insufficient_credits: 402,
  provider_error: 502,
  translation_failed: 500,
  reconstruction_failed: 500,
  cancelled: 409,
  job_already_running: 409,
  job_not_found: 404,
  invalid_transition: 409,
  access_denied: 403,
  artifact_unavailable: 409,
  internal_error: 500,
};

const statusCodeOf = (error: unknown): number | null => {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 600
  ) {
    return error.statusCode;
  }
  return null;
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof UnsupportedDocumentError && error.reason === "too_large") {
    return 413;
  }
  if (error instanceof ArtifactUnavailableError && error.reason === "expired") {
    return 410;
  }
  if (error instanceof PipelineError) {
    return STATUS_BY_CODE[error.code];
  }
  return statusCodeOf(error) ?? 500;
}

export function errorCodeFor(error: unknown, status: number): string {
  if (error instanceof PipelineError) return error.code;
  // Upload limit errors raised by the multipart parser.
  if (status === 413) return "unsupported_document";
  return status < 500 ? "invalid_request" : "internal_error";
}

export function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  version: string,
) {
  return reply.status(status).send(errorEnvelope(code, message, version));
}
