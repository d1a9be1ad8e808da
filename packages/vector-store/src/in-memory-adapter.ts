import { StoreError } from "@ragsync/errors";
import type { DedupFilter, VectorRecord } from "@ragsync/types";
import type { IVectorStore } from "./vector-store.interface.js";

/** Process-local store for tests and `VECTOR_STORE=memory`. */
export class InMemoryVectorStore implements IVectorStore {
  private readonly records = new Map<string, VectorRecord>();
  private dimensions: number | undefined;

  async ensureCollection(dimensions: number): Promise<void> {
    this.dimensions = dimensions;
  }

  async deleteByFilter(filter: DedupFilter): Promise<number> {
    let removed = 0;
    for (const [id, record] of this.records) {
      const { sourceService, userId, sourceId } = record.metadata;
      if (
        sourceService === filter.sourceService &&
        userId === filter.userId &&
        sourceId === filter.sourceId
      ) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      if (this.dimensions !== undefined && record.vector.length !== this.dimensions) {
        throw new StoreError(
          `Vector for ${record.id} has ${record.vector.length} dimensions, expected ${this.dimensions}`,
        );
      }
    }
    for (const record of records) {
      this.records.set(record.id, structuredClone(record));
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.records.size;
  }

  get(id: string): VectorRecord | undefined {
    return this.records.get(id);
  }

  ids(): string[] {
    return [...this.records.keys()].sort();
  }

  find(filter: DedupFilter): VectorRecord[] {
    return [...this.records.values()].filter(
      (r) =>
        r.metadata.sourceService === filter.sourceService &&
        r.metadata.userId === filter.userId &&
        r.metadata.sourceId === filter.sourceId,
    );
  }
}
