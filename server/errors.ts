export const PIPELINE_ERROR_CODES = [
  "unsupported_document",
  "insufficient_credits",
  "provider_error",
  "translation_failed",
  "reconstruction_failed",
  "cancelled",
  "job_already_running",
  "job_not_found",
  "invalid_transition",
  "access_denied",
  "artifact_unavailable",
  "internal_error",
] as const;

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number];

export const isPipelineErrorCode = (value: string): value is PipelineErrorCode =>
  PIPELINE_ERROR_CODES.some((code) => code === value);

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  /** Fatal errors end the job in `failed`. */
  readonly fatal: boolean = true;
}

export type UnsupportedDocumentReason =
  | "encrypted"
  | "unreadable"
  | "empty"
  | "too_many_pages"
  | "too_large"
  | "not_pdf"
  | "language_pair";

export class UnsupportedDocumentError extends PipelineError {
  readonly code = "unsupported_document" as const;

  constructor(
    readonly reason: UnsupportedDocumentReason,
    message: string,
  ) {
    super(message);
    this.name = "UnsupportedDocumentError";
  }
}

export class InsufficientCreditsError extends PipelineError {
  readonly code = "insufficient_credits" as const;

  constructor(
    readonly ownerId: string,
    readonly required: number,
    readonly available: number,
  ) {
    super(
      `Owner ${ownerId} needs ${required} credit(s) but has ${available}.`,
    );
    this.name = "InsufficientCreditsError";
  }
}

export type ProviderErrorKind =
  | "timeout"
  | "rate_limit"
  | "unavailable"
  | "connection"
  | "auth"
  | "invalid_request"
  | "invalid_response";

const TRANSIENT_KINDS = new Set<ProviderErrorKind>([
  "timeout",
  "rate_limit",
  "unavailable",
  "connection",
]);

export class ProviderError extends PipelineError {
  readonly code = "provider_error" as const;
  readonly transient: boolean;
  readonly status: number | null;

  constructor(
    readonly kind: ProviderErrorKind,
    message: string,
    readonly provider: string,
    options?: { cause?: unknown; status?: number | null },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.transient = TRANSIENT_KINDS.has(kind);
    this.status = options?.status ?? null;
  }
}

export class TranslationFailedError extends PipelineError {
  readonly code = "translation_failed" as const;

  constructor(readonly failedBatches: number) {
    super(`All ${failedBatches} translation batch(es) failed.`);
    this.name = "TranslationFailedError";
  }
}

export class ReconstructionError extends PipelineError {
  readonly code = "reconstruction_failed" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ReconstructionError";
  }
}

export class JobCancelledError extends PipelineError {
  readonly code = "cancelled" as const;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} was cancelled`);
    this.name = "JobCancelledError";
  }
}

export class JobAlreadyRunningError extends PipelineError {
  readonly code = "job_already_running" as const;
  override readonly fatal = false;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} already has an active run`);
    this.name = "JobAlreadyRunningError";
  }
}

/** Another worker took the job's run lease after this run's lease lapsed. */
export class RunLeaseLostError extends PipelineError {
  readonly code = "job_already_running" as const;
  override readonly fatal = false;

  constructor(
    readonly jobId: string,
    readonly runToken: string,
  ) {
    super(`Job ${jobId} run lease is now held by another worker`);
    this.name = "RunLeaseLostError";
  }
}

export class JobNotFoundError extends PipelineError {
  readonly code = "job_not_found" as const;
  override readonly fatal = false;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = "JobNotFoundError";
  }
}

export class InvalidTransitionError extends PipelineError {
  readonly code = "invalid_transition" as const;
  override readonly fatal = false;

  constructor(
    readonly jobId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class JobAccessDeniedError extends PipelineError {
  readonly code = "access_denied" as const;
  override readonly fatal = false;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} belongs to another owner`);
    this.name = "JobAccessDeniedError";
  }
}

export type ArtifactUnavailableReason = "not_completed" | "expired" | "missing";

export class ArtifactUnavailableError extends PipelineError {
  readonly code = "artifact_unavailable" as const;
  override readonly fatal = false;

  constructor(
    readonly jobId: string,
    readonly reason: ArtifactUnavailableReason,
  ) {
    super(`Translated PDF for job ${jobId} is unavailable (${reason})`);
    this.name = "ArtifactUnavailableError";
  }
}

export const isProviderError = (error: unknown): error is ProviderError =>
  error instanceof ProviderError;

export const isTransientProviderError = (error: unknown): boolean =>
  isProviderError(error) && error.transient;

export const MAX_ERROR_MESSAGE_LENGTH = 2000;

export const toErrorDetail = (
  error: unknown,
): { code: PipelineErrorCode; message: string } => {
  const code = error instanceof PipelineError ? error.code : "internal_error";
  return { code, message: describeError(error).slice(0, MAX_ERROR_MESSAGE_LENGTH) };
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
};
