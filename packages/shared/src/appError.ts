export type AppErrorCode =
  | "BAD_INPUT"
  | "NO_TRACKS"
  | "NO_VALID_TRACKS"
  | "FETCH_FAILED"
  | "TRANSCODE_FAILED"
  | "EMBEDDING_MODEL_UNAVAILABLE"
  | "EMBEDDING_MODEL_ERROR"
  | "INDEX_CONNECTION"
  | "INDEX_UNAVAILABLE"
  | "INDEX_BAD_RESPONSE"
  | "INDEX_CONNECT_FAILED"
  | "INDEX_REQUEST_FAILED"
  | "RETRY_EXHAUSTED"
  | "TIMED_OUT"
  | "RETRYABLE"
  | "PROCESSING_FAILED";

export type AppErrorShape = {
  code: AppErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class AppError extends Error {
  code: AppErrorCode;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(opts: AppErrorShape) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "AppError";
    this.code = opts.code;
    this.retryable = opts.retryable;
    this.details = opts.details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function toAppError(err: unknown, fallbackCode: AppErrorCode = "PROCESSING_FAILED"): AppError {
  if (isAppError(err)) return err;

  const msg = errorMessage(err);
  const msgLower = msg.toLowerCase();
  const stack = err instanceof Error && err.stack ? { stack: err.stack } : undefined;

  if (msgLower.includes("timed out") || msgLower.includes("timeout")) {
    return new AppError({ code: "TIMED_OUT", message: msg, retryable: true, details: stack, cause: err });
  }

  const code = errorCode(err);
  const retryable =
    code === "ECONNRESET" ||
    code === "ETIMEDOUT" ||
    code === "ENOTFOUND" ||
    msgLower.includes("too many requests") ||
    msg.includes("429");

  return new AppError({
    code: retryable ? "RETRYABLE" : fallbackCode,
    message: msg,
    retryable,
    details: stack,
    cause: err,
  });
}

/**
 * Message safe to show to API callers: first line only, no stack, capped.
 */
export function sanitizeErrorMessage(err: unknown, max = 300): string {
  const first = errorMessage(err).split("\n")[0]?.trim() ?? "";
  const msg = first || "Unknown error";
  return msg.length > max ? `${msg.slice(0, max - 1)}…` : msg;
}
