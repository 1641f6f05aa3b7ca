import { SearchCancelledError } from "./errors.js";

const DEFAULT_RETRY_DELAY_MS = 150;

export class CallTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "CallTimeoutError";
  }
}

export interface CallPolicyOptions {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Extra attempts after the first one. */
  retries?: number;
  retryDelayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const readStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
};

/** Client errors other than timeouts and rate limits are not worth a second attempt. */
export const isTransientFailure = (error: unknown): boolean => {
  const status = readStatus(error);
  if (status === undefined) {
    return true;
  }
  return status >= 500 || status === 408 || status === 429;
};

const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(handle);
      reject(new SearchCancelledError());
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

const runAttempt = async <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: CallPolicyOptions
): Promise<T> => {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", forwardAbort, { once: true });
  const timeoutHandle = setTimeout(
    () => controller.abort(new CallTimeoutError(options.label, options.timeoutMs)),
    options.timeoutMs
  );

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(controller.signal.reason ?? new CallTimeoutError(options.label, options.timeoutMs)),
      { once: true }
    );
  });

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(timeoutHandle);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
};

/**
 * Runs a network call with a per-attempt timeout and at most `retries` extra
 * attempts. Caller cancellation surfaces as {@link SearchCancelledError} and is
 * never retried.
 */
export async function callWithPolicy<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: CallPolicyOptions
): Promise<T> {
  const retries = Math.max(0, options.retries ?? 1);
  const isRetryable = options.isRetryable ?? isTransientFailure;
  let lastError: unknown;

  for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
    if (options.signal?.aborted) {
      throw new SearchCancelledError();
    }

    try {
      return await runAttempt(operation, options);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new SearchCancelledError();
      }
      lastError = error;
      if (attempt > retries || !isRetryable(error)) {
        break;
      }
      options.onRetry?.(error, attempt);
      await delay((options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS) * attempt, options.signal);
    }
  }

  throw lastError;
}
