import { InvalidTransitionError } from "../../errors";

export const JOB_STATUSES = [
  "created",
  "validating",
  "extracting",
  "translating",
  "reconstructing",
  "completed",
  "failed",
] as const;

/** Persisted job states. */
export type JobStatus = (typeof JOB_STATUSES)[number];

/** What a lookup reports: persisted state, or `expired` past retention. */
export type VisibleJobStatus = JobStatus | "expired";

const TERMINAL_STATUSES = new Set<JobStatus>(["completed", "failed"]);

export const JOB_TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  created: ["validating", "failed"],
  validating: ["extracting", "failed"],
  extracting: ["translating", "failed"],
  translating: ["reconstructing", "failed"],
  reconstructing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const isTerminalStatus = (status: JobStatus): boolean =>
  TERMINAL_STATUSES.has(status);

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

export function assertTransition(
  jobId: string,
  from: JobStatus,
  to: JobStatus,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(jobId, from, to);
  }
}

export function resolveVisibleStatus(
  job: { status: JobStatus; expiresAt: Date },
  now: Date,
): VisibleJobStatus {
  if (job.expiresAt.getTime() <= now.getTime()) {
    return "expired";
  }
  return job.status;
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}
