import { QdrantClient } from "@qdrant/js-client-rest";

import {
  classifyIndexError,
  toDenseVector,
  toMetadata,
  type CollectionParams,
  type IndexPoint,
  type IndexTransport,
  type ScoredPoint,
  type SearchRequest,
  type StoredPoint,
} from "./transport";

export type QdrantOptions = {
  url: string;
  apiKey?: string;
  timeoutMs?: number;
};

export class QdrantTransport implements IndexTransport {
  private readonly client: QdrantClient;

  constructor(opts: QdrantOptions) {
    this.client = new QdrantClient({
      url: opts.url,
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? 10_000,
    });
  }

  listCollections() {
    return this.call("list collections", async () => {
      const res = await this.client.getCollections();
      return res.collections.map((c) => c.name);
    });
  }

  createCollection(name: string, params: CollectionParams) {
    return this.call("create collection", async () => {
      await this.client.createCollection(name, {
        vectors: { size: params.size, distance: params.distance },
      });
    });
  }

  deleteCollection(name: string) {
    return this.call("delete collection", async () => {
      await this.client.deleteCollection(name);
    });
  }

  upsert(collection: string, points: IndexPoint[]) {
    return this.call("upsert", async () => {
      await this.client.upsert(collection, {
        wait: true,
        points: points.map((p) => ({ id: p.id, vector: p.vector, payload: p.payload })),
      });
    });
  }

  search(collection: string, req: SearchRequest): Promise<ScoredPoint[]> {
    return this.call("search", async () => {
      const hits = await this.client.search(collection, {
        vector: req.vector,
        limit: req.limit,
        score_threshold: req.scoreThreshold,
        with_payload: true,
        with_vector: false,
      });
      return hits.map((h) => ({ id: String(h.id), score: h.score, payload: toMetadata(h.payload) }));
    });
  }

  retrieve(collection: string, ids: string[], withVectors: boolean): Promise<StoredPoint[]> {
    return this.call("retrieve", async () => {
      const points = await this.client.retrieve(collection, {
        ids,
        with_payload: true,
        with_vector: withVectors,
      });
      return points.map((p) => ({
        id: String(p.id),
        payload: toMetadata(p.payload),
        vector: withVectors ? toDenseVector(p.vector) : undefined,
      }));
    });
  }

  delete(collection: string, ids: string[]) {
    return this.call("delete", async () => {
      await this.client.delete(collection, { wait: true, points: ids });
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw classifyIndexError(err, operation);
    }
  }
}
