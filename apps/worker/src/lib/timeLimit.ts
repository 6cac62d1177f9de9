import { AppError, type Logger } from "@trackprint/shared";

export const SOFT_LIMIT_MS = 25 * 60_000;
export const HARD_LIMIT_MS = 30 * 60_000;

export type TimeLimitOptions = {
  softMs?: number;
  hardMs?: number;
  log?: Logger;
};

function minutes(ms: number) {
  return Math.round(ms / 60_000);
}

/**
 * Runs `fn` with a signal that fires at the hard limit; a warning is logged at
 * the soft limit. Past the hard limit the returned promise rejects with TIMED_OUT
 * even if `fn` ignores the signal.
 */
export async function withTimeLimit<T>(fn: (signal: AbortSignal) => Promise<T>, opts: TimeLimitOptions = {}): Promise<T> {
  const softMs = opts.softMs ?? SOFT_LIMIT_MS;
  const hardMs = opts.hardMs ?? HARD_LIMIT_MS;
  const controller = new AbortController();

  const soft = setTimeout(() => {
    opts.log?.warn({ softMs, hardMs }, `job running for over ${minutes(softMs)} minutes`);
  }, softMs);

  let hard: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    hard = setTimeout(() => {
      const err = new AppError({
        code: "TIMED_OUT",
        message: `Job exceeded ${minutes(hardMs)} minutes`,
        retryable: false,
        details: { hardMs },
      });
      controller.abort(err);
      reject(err);
    }, hardMs);
  });

  try {
    return await Promise.race([fn(controller.signal), expired]);
  } finally {
    clearTimeout(soft);
    clearTimeout(hard);
  }
}
