import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./in-memory-adapter.js";

export type { IVectorStore } from "./vector-store.interface.js";
export { QdrantVectorStore, pointIdFor, toQdrantFilter, toStoreError } from "./qdrant-adapter.js";
export type { QdrantStoreConfig } from "./qdrant-adapter.js";
export { InMemoryVectorStore } from "./in-memory-adapter.js";

export type VectorStoreType = "qdrant" | "memory";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collection?: string;
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
        collection: config.collection ?? "documents",
      });
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
