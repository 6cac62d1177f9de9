import { AppError, errorMessage } from "./appError";
import type { Logger } from "./logger";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
};

export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
  /** used in logs and in the exhaustion error */
  operation: string;
  isRetryable: (err: unknown) => boolean;
  /** runs after the backoff, before the next attempt */
  beforeRetry?: (err: unknown, attempt: number) => Promise<void>;
  sleep?: Sleep;
  log?: Logger;
};

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!ms || ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      return reject(new AppError({ code: "TIMED_OUT", message: "Aborted", retryable: true }));
    }

    const t = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      cleanup();
      reject(new AppError({ code: "TIMED_OUT", message: "Aborted", retryable: true }));
    };

    const cleanup = () => {
      clearTimeout(t);
      if (signal) signal.removeEventListener("abort", onAbort);
    };

    if (signal) signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** wait after failed attempt `attempt` (1-based): base, 2*base, 4*base ... */
export function backoffDelay(policy: RetryPolicy, attempt: number) {
  return policy.baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Runs `fn` up to `policy.maxAttempts` times. Every failed retryable attempt is
 * followed by its backoff, the last one included, so a caller that moves on to the
 * next item does not hit a struggling service immediately. Non-retryable errors are
 * rethrown as they are; exhaustion throws RETRY_EXHAUSTED with the last error as cause.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions
): Promise<T> {
  const wait = opts.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!opts.isRetryable(err)) throw err;
      lastError = err;

      const delayMs = backoffDelay(policy, attempt);
      opts.log?.warn(
        { operation: opts.operation, attempt, maxAttempts: policy.maxAttempts, delayMs, err: errorMessage(err) },
        `${opts.operation} failed (attempt ${attempt}/${policy.maxAttempts}), backing off`
      );
      await wait(delayMs);

      if (attempt < policy.maxAttempts && opts.beforeRetry) {
        await opts.beforeRetry(err, attempt);
      }
    }
  }

  opts.log?.error({ operation: opts.operation, attempts: policy.maxAttempts }, `${opts.operation} gave up`);
  throw new AppError({
    code: "RETRY_EXHAUSTED",
    message: `${opts.operation} failed after ${policy.maxAttempts} attempts: ${errorMessage(lastError)}`,
    retryable: false,
    details: { operation: opts.operation, attempts: policy.maxAttempts },
    cause: lastError,
  });
}
