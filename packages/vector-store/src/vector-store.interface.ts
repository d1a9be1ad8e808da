import type { DedupFilter, VectorRecord } from "@ragsync/types";

/**
 * Write side of a vector index. Adapters raise StoreTransientError for
 * failures worth retrying and StoreError for everything else.
 */
export interface IVectorStore {
  ensureCollection(dimensions: number): Promise<void>;
  /** Removes every record of one source; resolves to the number removed. */
  deleteByFilter(filter: DedupFilter): Promise<number>;
  /** Inserts or overwrites by record id. */
  upsert(records: VectorRecord[]): Promise<void>;
  healthCheck(): Promise<boolean>;
}
