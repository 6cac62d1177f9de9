import { AppError } from "@trackprint/shared";

/** parent signal + own timeout; call `dispose` once the guarded work is over */
export function timeoutSignal(timeoutMs: number, parent?: AbortSignal) {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(t);
      parent?.removeEventListener("abort", onAbort);
    },
  };
}

/** throws the job's abort reason as a TIMED_OUT AppError */
export function throwIfAborted(signal?: AbortSignal) {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof AppError) throw reason;
  throw new AppError({
    code: "TIMED_OUT",
    message: reason instanceof Error ? reason.message : "Job aborted",
    retryable: false,
    cause: reason,
  });
}
