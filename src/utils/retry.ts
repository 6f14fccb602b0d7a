import { getConfig } from "../config.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  signal?: AbortSignal;
};

/** Exponential delay for a 1-indexed attempt: base, 2×base, 4×base… capped at maxDelayMs. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts?: RetryOptions): Promise<T> {
  const cfg = getConfig().retry;
  const maxAttempts = opts?.maxAttempts ?? cfg.transportAttempts;
  const baseDelayMs = opts?.baseDelayMs ?? cfg.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? cfg.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      if (opts?.signal?.aborted) break;
      if (opts?.shouldRetry && !opts.shouldRetry(err, attempt)) break;
      await sleep(backoffDelay(attempt, baseDelayMs, maxDelayMs), opts?.signal);
    }
  }
  throw lastError;
}
