import { AppError, errorMessage, isAppError, type EmbeddingMetadata, type Scalar } from "@trackprint/shared";

export type Distance = "Cosine";

export type CollectionParams = {
  size: number;
  distance: Distance;
};

export type IndexPoint = {
  id: string;
  vector: number[];
  payload: EmbeddingMetadata;
};

export type ScoredPoint = {
  id: string;
  score: number;
  payload: EmbeddingMetadata;
};

export type StoredPoint = {
  id: string;
  payload: EmbeddingMetadata;
  vector?: number[];
};

export type SearchRequest = {
  vector: number[];
  limit: number;
  scoreThreshold: number;
};

/**
 * Wire-level operations of the vector index service. Implementations throw
 * AppErrors classified with {@link classifyIndexError}.
 */
export interface IndexTransport {
  listCollections(): Promise<string[]>;
  createCollection(name: string, params: CollectionParams): Promise<void>;
  deleteCollection(name: string): Promise<void>;
  upsert(collection: string, points: IndexPoint[]): Promise<void>;
  search(collection: string, req: SearchRequest): Promise<ScoredPoint[]>;
  retrieve(collection: string, ids: string[], withVectors: boolean): Promise<StoredPoint[]>;
  delete(collection: string, ids: string[]): Promise<void>;
}

export type TransportFactory = () => IndexTransport;

const CONNECTION_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

function field(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  return Reflect.get(err, key);
}

function hasConnectionCode(err: unknown, depth = 0): boolean {
  if (depth > 3) return false;
  const code = field(err, "code");
  if (typeof code === "string" && CONNECTION_CODES.has(code)) return true;
  return hasConnectionCode(field(err, "cause"), depth + 1);
}

function errorName(err: unknown) {
  const name = field(err, "name");
  return typeof name === "string" ? name : "";
}

/**
 * Maps whatever the service client threw onto our codes:
 * INDEX_CONNECTION (handle must be recreated), INDEX_UNAVAILABLE and INDEX_BAD_RESPONSE
 * (retry on the same handle), INDEX_REQUEST_FAILED (permanent).
 */
export function classifyIndexError(err: unknown, operation: string): AppError {
  if (isAppError(err)) return err;

  const msg = errorMessage(err);
  const details = { operation };
  const status = field(err, "status");

  if (typeof status === "number") {
    const transient = status === 429 || status >= 500;
    return new AppError({
      code: transient ? "INDEX_UNAVAILABLE" : "INDEX_REQUEST_FAILED",
      message: `Vector index ${operation}: HTTP ${status} ${msg}`.trim(),
      retryable: transient,
      details: { ...details, status },
      cause: err,
    });
  }

  const name = errorName(err);

  if (hasConnectionCode(err) || name.includes("Timeout") || msg.toLowerCase().includes("fetch failed")) {
    return new AppError({
      code: "INDEX_CONNECTION",
      message: `Vector index ${operation}: connection lost: ${msg}`,
      retryable: true,
      details,
      cause: err,
    });
  }

  if (err instanceof SyntaxError || name.includes("UnexpectedResponse")) {
    return new AppError({
      code: "INDEX_BAD_RESPONSE",
      message: `Vector index ${operation}: malformed response: ${msg}`,
      retryable: true,
      details,
      cause: err,
    });
  }

  return new AppError({
    code: "INDEX_REQUEST_FAILED",
    message: `Vector index ${operation}: ${msg}`,
    retryable: false,
    details,
    cause: err,
  });
}

export function isTransientIndexError(err: unknown) {
  return (
    isAppError(err) &&
    (err.code === "INDEX_CONNECTION" || err.code === "INDEX_UNAVAILABLE" || err.code === "INDEX_BAD_RESPONSE")
  );
}

export function isConnectionError(err: unknown) {
  return isAppError(err) && err.code === "INDEX_CONNECTION";
}

export function isScalar(v: unknown): v is Scalar {
  return v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

/** keeps only scalar payload fields */
export function toMetadata(payload: unknown): EmbeddingMetadata {
  const out: EmbeddingMetadata = {};
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) return out;
  for (const [k, v] of Object.entries(payload)) {
    if (isScalar(v)) out[k] = v;
  }
  return out;
}

export function toDenseVector(v: unknown): number[] | undefined {
  if (!Array.isArray(v)) return undefined;
  const out: number[] = [];
  for (const x of v) {
    if (typeof x !== "number") return undefined;
    out.push(x);
  }
  return out;
}
