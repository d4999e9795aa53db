import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";

export type {
  IVectorStore,
  VectorPoint,
  VectorMatch,
  VectorQueryFilter,
} from "./vector-store.interface.js";
export { QdrantVectorStore, pointIdFor, namespaceFilter } from "./qdrant-adapter.js";
export type { QdrantVectorStoreOptions } from "./qdrant-adapter.js";
export { VectorIndexWriter, assertValidNamespace } from "./index-writer.js";
export type { VectorIndexWriterOptions, StoreOutcome } from "./index-writer.js";

export type VectorStoreType = "qdrant";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collection: string;
  dimensions: number;
  timeoutMs?: number;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collection: config.collection,
        dimensions: config.dimensions,
        timeoutMs: config.timeoutMs,
      });
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
