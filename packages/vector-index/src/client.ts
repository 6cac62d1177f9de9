import { createHash } from "node:crypto";
import { Mutex } from "async-mutex";

import {
  AppError,
  componentLogger,
  DEFAULT_RETRY_POLICY,
  errorMessage,
  sleep,
  withRetry,
  type EmbeddingMetadata,
  type Logger,
  type RetryPolicy,
  type Scalar,
  type Sleep,
} from "@trackprint/shared";

import {
  isConnectionError,
  isTransientIndexError,
  type IndexTransport,
  type ScoredPoint,
  type TransportFactory,
} from "./transport";

export const DEFAULT_COLLECTION = "track_embeddings";
export const EMBEDDING_DIMENSION = 1024;

export type VectorIndexOptions = {
  createTransport: TransportFactory;
  collection?: string;
  dimension?: number;
  recreateCollection?: boolean;
  retry?: Partial<RetryPolicy>;
  sleep?: Sleep;
  log?: Logger;
};

export type SimilarTrack = {
  track_id: string;
  score: number;
  [field: string]: Scalar;
};

/**
 * Qdrant only takes UUIDs or unsigned integers as point ids, so external track ids
 * are hashed into a stable name-based UUID. The original id travels in the payload.
 */
export function pointIdFor(trackId: string): string {
  const h = createHash("sha1").update(`track:${trackId}`).digest();
  h[6] = (h[6] & 0x0f) | 0x50;
  h[8] = (h[8] & 0x3f) | 0x80;
  const hex = h.subarray(0, 16).toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function trackIdOf(point: { id: string; payload: EmbeddingMetadata }) {
  const fromPayload = point.payload.track_id;
  return typeof fromPayload === "string" && fromPayload ? fromPayload : point.id;
}

/**
 * Fault-tolerant facade over the vector index service. Owns the only transport
 * handle; a connection-class failure replaces it before the next attempt.
 */
export class VectorIndexClient {
  readonly collection: string;
  readonly dimension: number;

  private transport: IndexTransport | null = null;
  private generation = 0;
  private readonly handleLock = new Mutex();
  private readonly policy: RetryPolicy;
  private readonly createTransport: TransportFactory;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(opts: VectorIndexOptions) {
    this.collection = opts.collection ?? DEFAULT_COLLECTION;
    this.dimension = opts.dimension ?? EMBEDDING_DIMENSION;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.createTransport = opts.createTransport;
    this.sleep = opts.sleep ?? ((ms) => sleep(ms));
    this.log = opts.log ?? componentLogger("vector-index", { collection: this.collection });
  }

  /** connect + ensure collection; throws when the index cannot be reached */
  static async open(opts: VectorIndexOptions): Promise<VectorIndexClient> {
    const client = new VectorIndexClient(opts);
    await client.connect();
    await client.ensureCollection(opts.recreateCollection ?? false);
    return client;
  }

  get connected() {
    return this.transport !== null;
  }

  async connect(): Promise<void> {
    await this.handleLock.runExclusive(async () => {
      this.transport = await this.establish();
      this.generation++;
    });
  }

  /**
   * List → (delete when `recreate`) → create when absent. Retried from the top as
   * one unit, so a half-applied attempt is simply re-checked.
   */
  async ensureCollection(recreate = false): Promise<void> {
    await this.run("ensure collection", async (t) => {
      const names = await t.listCollections();
      let exists = names.includes(this.collection);

      if (recreate && exists) {
        this.log.warn("recreating collection, existing vectors are dropped");
        await t.deleteCollection(this.collection);
        exists = false;
      }

      if (!exists) {
        await t.createCollection(this.collection, { size: this.dimension, distance: "Cosine" });
        this.log.info({ dimension: this.dimension }, "collection created");
      }
    });
  }

  async storeEmbedding(trackId: string, vector: number[], metadata: EmbeddingMetadata = {}): Promise<boolean> {
    this.assertVector(vector);

    try {
      await this.run(`store embedding for track ${trackId}`, (t) =>
        t.upsert(this.collection, [
          { id: pointIdFor(trackId), vector: [...vector], payload: { ...metadata, track_id: trackId } },
        ])
      );
      this.log.debug({ trackId }, "embedding stored");
      return true;
    } catch (err) {
      this.log.error({ trackId, err: errorMessage(err) }, "failed to store embedding");
      return false;
    }
  }

  async findSimilar(vector: number[], limit = 10, minScore = 0.7): Promise<SimilarTrack[]> {
    this.assertVector(vector);

    let hits: ScoredPoint[];
    try {
      hits = await this.run(`find similar tracks (limit=${limit}, min_score=${minScore})`, (t) =>
        t.search(this.collection, { vector: [...vector], limit, scoreThreshold: minScore })
      );
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "similarity search failed");
      return [];
    }

    return hits
      .filter((h) => h.score >= minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, limit))
      .map((h) => ({ ...h.payload, track_id: trackIdOf(h), score: h.score }));
  }

  async getEmbedding(trackId: string): Promise<number[] | null> {
    try {
      const points = await this.run(`retrieve embedding for track ${trackId}`, (t) =>
        t.retrieve(this.collection, [pointIdFor(trackId)], true)
      );
      return points[0]?.vector ?? null;
    } catch (err) {
      this.log.error({ trackId, err: errorMessage(err) }, "failed to retrieve embedding");
      return null;
    }
  }

  async hasEmbedding(trackId: string): Promise<boolean> {
    try {
      const points = await this.run(`check embedding for track ${trackId}`, (t) =>
        t.retrieve(this.collection, [pointIdFor(trackId)], false)
      );
      return points.length > 0;
    } catch (err) {
      this.log.error({ trackId, err: errorMessage(err) }, "failed to check embedding");
      return false;
    }
  }

  async deleteEmbedding(trackId: string): Promise<boolean> {
    try {
      await this.run(`delete embedding for track ${trackId}`, (t) =>
        t.delete(this.collection, [pointIdFor(trackId)])
      );
      this.log.info({ trackId }, "embedding deleted");
      return true;
    } catch (err) {
      this.log.error({ trackId, err: errorMessage(err) }, "failed to delete embedding");
      return false;
    }
  }

  private assertVector(vector: number[]) {
    if (vector.length !== this.dimension) {
      throw new AppError({
        code: "BAD_INPUT",
        message: `Embedding size must be ${this.dimension}, got ${vector.length}`,
        retryable: false,
        details: { expected: this.dimension, actual: vector.length },
      });
    }
    if (!vector.every((x) => Number.isFinite(x))) {
      throw new AppError({
        code: "BAD_INPUT",
        message: "Embedding contains non-finite values",
        retryable: false,
      });
    }
  }

  private async establish(): Promise<IndexTransport> {
    try {
      return await withRetry(
        async () => {
          const t = this.createTransport();
          await t.listCollections();
          return t;
        },
        this.policy,
        { operation: "connect to vector index", isRetryable: isTransientIndexError, sleep: this.sleep, log: this.log }
      );
    } catch (err) {
      const cause = err instanceof AppError && err.cause !== undefined ? err.cause : err;
      throw new AppError({
        code: "INDEX_CONNECT_FAILED",
        message: `Failed to connect to vector index: ${errorMessage(cause)}`,
        retryable: false,
        details: { attempts: this.policy.maxAttempts },
        cause: err,
      });
    }
  }

  /** drops the handle seen by a failed call and builds a fresh one, unless another caller already did */
  private async reconnect(seenGeneration: number) {
    await this.handleLock.runExclusive(async () => {
      if (this.generation !== seenGeneration && this.transport) return;
      this.transport = null;
      this.log.warn("vector index connection lost, reconnecting");
      this.transport = await this.establish();
      this.generation++;
    });
  }

  private current() {
    return this.handleLock.runExclusive(() => {
      if (!this.transport) {
        throw new AppError({
          code: "INDEX_CONNECTION",
          message: "Vector index client is not connected",
          retryable: true,
        });
      }
      return { transport: this.transport, generation: this.generation };
    });
  }

  private run<T>(operation: string, fn: (t: IndexTransport) => Promise<T>): Promise<T> {
    let seen = this.generation;

    return withRetry(
      async () => {
        const { transport, generation } = await this.current();
        seen = generation;
        return fn(transport);
      },
      this.policy,
      {
        operation,
        isRetryable: isTransientIndexError,
        beforeRetry: async (err) => {
          if (isConnectionError(err)) await this.reconnect(seen);
        },
        sleep: this.sleep,
        log: this.log,
      }
    );
  }
}
