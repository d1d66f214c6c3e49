import { VersionConflictError } from "./errors.js";

export interface RetryPolicy {
  /** Maximum number of attempts */
  steps: number;
  /** Delay before the second attempt */
  durationMs: number;
  /** Multiplier applied to the delay after each attempt */
  factor: number;
  /** Up to this fraction of the delay is added at random */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  steps: 5,
  durationMs: 10,
  factor: 1.0,
  jitter: 0.1,
};

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`gave up after ${attempts} attempt(s)`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

/**
 * Delay before the given retry (1-based), jitter included
 */
export function backoffDelay(policy: RetryPolicy, retry: number, random: () => number = Math.random): number {
  const base = policy.durationMs * policy.factor ** (retry - 1);
  return base + base * policy.jitter * random();
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run fn until it succeeds, retrying only on version conflicts.
 *
 * Any other error is rethrown as-is. When every attempt conflicts a
 * RetryExhaustedError is thrown with the last conflict as its cause. The
 * signal is checked before each attempt and interrupts the backoff; an
 * aborted loop rejects with the signal's reason.
 */
export async function retryOnConflict<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  let lastConflict: VersionConflictError | undefined;

  for (let attempt = 1; attempt <= policy.steps; attempt++) {
    if (attempt > 1) {
      await sleep(backoffDelay(policy, attempt - 1), signal);
    }
    signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof VersionConflictError)) {
        throw err;
      }
      lastConflict = err;
      console.log(`Conflict on attempt ${attempt}/${policy.steps}: ${err.message}`);
    }
  }

  throw new RetryExhaustedError(policy.steps, lastConflict);
}
