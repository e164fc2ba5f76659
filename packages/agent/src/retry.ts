import { isTransientVenueError, VenueTimeoutError, getErrorMessage } from "./errors.js";
import { log } from "./logger.js";

export interface RetryOptions {
  label: string;
  /** Total attempts including the first (default 3) */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Jitter factor 0-1 (default 0.2) */
  jitter?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter: number,
): number {
  const exp = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  const spread = exp * jitter;
  return Math.max(0, Math.round(exp - spread + Math.random() * spread * 2));
}

/**
 * Run fn, retrying transient venue errors with exponential backoff.
 * Anything else (rejections, fatal errors) is rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxAttempts = opts.maxAttempts ?? 3;
  const baseDelayMs = opts.baseDelayMs ?? 250;
  const maxDelayMs = opts.maxDelayMs ?? 5_000;
  const jitter = opts.jitter ?? 0.2;
  const shouldRetry = opts.shouldRetry ?? ((err: unknown) => isTransientVenueError(err));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) {
        throw err;
      }
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs, jitter);
      log.warn("Retrying after transient failure", {
        label: opts.label,
        attempt,
        maxAttempts,
        delayMs: delay,
        error: getErrorMessage(err),
      });
      await sleep(delay);
    }
  }
}

/**
 * Bound a venue call. The underlying promise keeps running; its result is
 * ignored once the deadline passes.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  venue?: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new VenueTimeoutError(label, timeoutMs, venue)), timeoutMs);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}
