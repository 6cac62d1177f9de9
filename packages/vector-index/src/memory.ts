import { AppError } from "@trackprint/shared";

import type {
  CollectionParams,
  IndexPoint,
  IndexTransport,
  ScoredPoint,
  SearchRequest,
  StoredPoint,
} from "./transport";

type MemoryCollection = {
  params: CollectionParams;
  points: Map<string, IndexPoint>;
};

/** Collections outlive transports, the way a server outlives its connections. */
export type MemoryIndexState = Map<string, MemoryCollection>;

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/**
 * In-process index with the service's semantics. Selected with `QDRANT_URL=memory://`
 * for local dry runs, and used by the tests.
 */
export class MemoryTransport implements IndexTransport {
  constructor(readonly state: MemoryIndexState = new Map()) {}

  async listCollections() {
    return [...this.state.keys()];
  }

  async createCollection(name: string, params: CollectionParams) {
    if (this.state.has(name)) {
      throw new AppError({
        code: "INDEX_REQUEST_FAILED",
        message: `Collection \`${name}\` already exists`,
        retryable: false,
      });
    }
    this.state.set(name, { params, points: new Map() });
  }

  async deleteCollection(name: string) {
    this.state.delete(name);
  }

  async upsert(collection: string, points: IndexPoint[]) {
    const c = this.get(collection);
    for (const p of points) {
      if (p.vector.length !== c.params.size) {
        throw new AppError({
          code: "INDEX_REQUEST_FAILED",
          message: `Wrong input: Vector dimension error: expected dim: ${c.params.size}, got ${p.vector.length}`,
          retryable: false,
        });
      }
      c.points.set(p.id, { id: p.id, vector: [...p.vector], payload: { ...p.payload } });
    }
  }

  async search(collection: string, req: SearchRequest): Promise<ScoredPoint[]> {
    const c = this.get(collection);
    return [...c.points.values()]
      .map((p) => ({ id: p.id, score: cosineSimilarity(req.vector, p.vector), payload: { ...p.payload } }))
      .filter((h) => h.score >= req.scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, req.limit);
  }

  async retrieve(collection: string, ids: string[], withVectors: boolean): Promise<StoredPoint[]> {
    const c = this.get(collection);
    const out: StoredPoint[] = [];
    for (const id of ids) {
      const p = c.points.get(id);
      if (!p) continue;
      out.push({ id: p.id, payload: { ...p.payload }, vector: withVectors ? [...p.vector] : undefined });
    }
    return out;
  }

  async delete(collection: string, ids: string[]) {
    const c = this.get(collection);
    for (const id of ids) c.points.delete(id);
  }

  private get(name: string): MemoryCollection {
    const c = this.state.get(name);
    if (!c) {
      throw new AppError({
        code: "INDEX_REQUEST_FAILED",
        message: `Not found: Collection \`${name}\` doesn't exist!`,
        retryable: false,
        details: { status: 404 },
      });
    }
    return c;
  }
}
