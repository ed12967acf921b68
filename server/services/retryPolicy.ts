import type { RetryPolicyOptions } from "../config/pipelineConfig";
import { ProviderError, isTransientProviderError } from "../errors";

export interface RetryPolicy extends RetryPolicyOptions {
  isRetryable(error: unknown): boolean;
}

export interface RetryHooks {
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createRetryPolicy(
  options: RetryPolicyOptions,
  isRetryable: (error: unknown) => boolean = isTransientProviderError,
): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(options.maxAttempts)),
    baseDelayMs: Math.max(0, options.baseDelayMs),
    maxDelayMs: Math.max(0, options.maxDelayMs),
    factor: Math.max(1, options.factor),
    isRetryable,
  };
}

/** Delay before retry number `attempt` (1-based), capped at maxDelayMs. */
export function backoffDelay(policy: RetryPolicyOptions, attempt: number): number {
  const raw = policy.baseDelayMs * policy.factor ** Math.max(0, attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Error thrown once a retryable failure has used every attempt. Carries the
 * attempt count so batch records can persist it.
 */
export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
      { cause: lastError },
    );
    this.name = "RetryExhaustedError";
  }
}

export async function runWithRetry<T>(
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {},
): Promise<RetryOutcome<T>> {
  const sleep = hooks.sleep ?? defaultSleep;
  let attempt = 0;
  for (;;) {
    attempt += 1;
    try {
      const value = await task(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (!policy.isRetryable(error)) {
        throw error;
      }
      if (attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = backoffDelay(policy, attempt);
      hooks.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}

/** Rejects with a transient `timeout` ProviderError when `task` outlives `timeoutMs`. */
export async function withTimeout<T>(
  provider: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ProviderError("timeout", `${provider} call exceeded ${timeoutMs}ms`, provider),
      );
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Unwraps RetryExhaustedError so callers see the provider failure itself. */
export const unwrapRetryError = (error: unknown): unknown =>
  error instanceof RetryExhaustedError ? error.lastError : error;
