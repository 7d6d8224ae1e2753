import { systemClock, type Clock } from "./clock.js";

export type BackoffOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryOptions = Partial<BackoffOptions> & {
  maxAttempts?: number;
  clock?: Clock;
  signal?: AbortSignal;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
};

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/** Delay before the attempt following `attempt` (1-based): base, 2·base, 4·base … capped. */
export function backoffDelay(attempt: number, opts: BackoffOptions): number {
  return Math.min(opts.baseDelayMs * 2 ** (attempt - 1), opts.maxDelayMs);
}

/** Timeout for the next attempt after a timeout, capped at `ceiling`. */
export function escalateTimeout(timeoutMs: number, multiplier: number, ceiling: number): number {
  return Math.min(Math.round(timeoutMs * multiplier), ceiling);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULTS.maxAttempts;
  const backoff: BackoffOptions = {
    baseDelayMs: opts?.baseDelayMs ?? DEFAULTS.baseDelayMs,
    maxDelayMs: opts?.maxDelayMs ?? DEFAULTS.maxDelayMs,
  };
  const clock = opts?.clock ?? systemClock;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      if (opts?.shouldRetry && !opts.shouldRetry(err, attempt)) break;
      await clock.sleep(backoffDelay(attempt, backoff), opts?.signal);
    }
  }
  throw lastError;
}
