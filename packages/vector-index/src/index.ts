import { MemoryTransport, type MemoryIndexState } from "./memory";
import { QdrantTransport } from "./qdrant";
import type { TransportFactory } from "./transport";

export * from "./client";
export * from "./transport";
export { MemoryTransport, cosineSimilarity } from "./memory";
export type { MemoryIndexState } from "./memory";
export { QdrantTransport } from "./qdrant";
export type { QdrantOptions } from "./qdrant";

/** `memory://` keeps the index in process; anything else is a Qdrant REST url */
export function transportFactoryFor(url: string, apiKey?: string): TransportFactory {
  if (url.startsWith("memory://")) {
    const state: MemoryIndexState = new Map();
    return () => new MemoryTransport(state);
  }
  return () => new QdrantTransport({ url, apiKey });
}
