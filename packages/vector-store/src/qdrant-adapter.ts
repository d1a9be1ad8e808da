import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { AppError, StoreError, StoreTransientError, messageOf, statusOf } from "@ragsync/errors";
import type { DedupFilter, VectorRecord } from "@ragsync/types";
import type { IVectorStore } from "./vector-store.interface.js";

const BATCH_SIZE = 100;

const FILTER_FIELDS = ["sourceService", "userId", "sourceId"] as const;

export interface QdrantStoreConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

/**
 * Qdrant only accepts unsigned integers or UUIDs as point ids, so chunk ids
 * are hashed into a UUID-shaped string. The chunk id itself rides in the payload.
 */
export function pointIdFor(chunkId: string): string {
  const hex = createHash("sha256").update(chunkId).digest("hex");
  return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20, 32)].join("-");
}

export function toQdrantFilter(filter: DedupFilter): {
  must: Array<{ key: string; match: { value: string } }>;
} {
  return {
    must: FILTER_FIELDS.map((key) => ({ key, match: { value: filter[key] } })),
  };
}

/** Timeouts, throttling, 5xx and connection failures are transient; other 4xx are not. */
export function toStoreError(error: unknown, operation: string): AppError {
  if (error instanceof StoreError || error instanceof StoreTransientError) return error;
  const status = statusOf(error);
  const message = `Qdrant ${operation} failed: ${messageOf(error)}`;
  const details = { operation, status };

  if (status === undefined || status >= 500 || status === 408 || status === 429) {
    return new StoreTransientError(message, { cause: error, details });
  }
  return new StoreError(message, { cause: error, details });
}

export class QdrantVectorStore implements IVectorStore {
  private readonly client: QdrantClient;
  private readonly collection: string;

  constructor(config: QdrantStoreConfig) {
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey });
    this.collection = config.collection;
  }

  async ensureCollection(dimensions: number): Promise<void> {
    try {
      const collections = await this.client.getCollections();
      const exists = collections.collections.some((c) => c.name === this.collection);
      if (exists) return;

      await this.client.createCollection(this.collection, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
        optimizers_config: {
          indexing_threshold: 20000,
        },
      });

      for (const field of FILTER_FIELDS) {
        await this.client.createPayloadIndex(this.collection, {
          field_name: field,
          field_schema: "keyword",
        });
      }
    } catch (error: unknown) {
      throw toStoreError(error, "ensureCollection");
    }
  }

  async deleteByFilter(filter: DedupFilter): Promise<number> {
    const qdrantFilter = toQdrantFilter(filter);
    try {
      const { count } = await this.client.count(this.collection, { filter: qdrantFilter, exact: true });
      if (count === 0) return 0;

      await this.client.delete(this.collection, { filter: qdrantFilter, wait: true });
      return count;
    } catch (error: unknown) {
      throw toStoreError(error, "delete");
    }
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      try {
        await this.client.upsert(this.collection, {
          wait: true,
          points: batch.map((r) => ({
            id: pointIdFor(r.id),
            vector: r.vector,
            payload: {
              ...r.metadata,
              chunkId: r.id,
              content: r.content,
            },
          })),
        });
      } catch (error: unknown) {
        throw toStoreError(error, "upsert");
      }
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
