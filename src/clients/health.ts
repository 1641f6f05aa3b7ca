export interface HealthReport {
  status: "ok" | "error";
  details?: string;
}

export interface HealthCheckedClient {
  healthCheck: () => Promise<HealthReport>;
}

export interface StartupRetryOptions {
  attempts: number;
  baseDelayMs: number;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Retries a connection probe with a linear backoff; the last error is rethrown. */
export async function retryStartup<T>(operation: () => Promise<T>, options: StartupRetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < options.attempts) {
        await delay(options.baseDelayMs * attempt);
      }
    }
  }

  throw lastError;
}

/**
 * Runs a probe and folds its outcome into a report. A probe may resolve
 * with a note that becomes `details` on an ok report.
 */
export async function probeHealth(probe: () => Promise<string | void>): Promise<HealthReport> {
  try {
    const note = await probe();
    return note ? { status: "ok", details: note } : { status: "ok" };
  } catch (error) {
    return { status: "error", details: error instanceof Error ? error.message : "unknown error" };
  }
}
