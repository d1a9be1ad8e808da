import { describe, it, expect } from "vitest";
import { StoreError, StoreTransientError } from "@ragsync/errors";
import type { VectorRecord } from "@ragsync/types";
import {
  InMemoryVectorStore,
  QdrantVectorStore,
  createVectorStore,
  pointIdFor,
  toQdrantFilter,
  toStoreError,
} from "./index.js";

function record(id: string, sourceId: string, vector: number[] = [0.1, 0.2]): VectorRecord {
  return {
    id,
    vector,
    content: `content of ${id}`,
    metadata: { sourceService: "gmail", userId: "user-1", sourceId, chunkIndex: 0 },
  };
}

describe("Vector Store", () => {
  describe("createVectorStore factory", () => {
    it("creates QdrantVectorStore for type 'qdrant'", () => {
      const store = createVectorStore({ type: "qdrant", qdrantUrl: "http://localhost:6333" });
      expect(store).toBeInstanceOf(QdrantVectorStore);
    });

    it("creates InMemoryVectorStore for type 'memory'", () => {
      expect(createVectorStore({ type: "memory" })).toBeInstanceOf(InMemoryVectorStore);
    });

    it("throws for missing qdrantUrl", () => {
      expect(() => createVectorStore({ type: "qdrant" })).toThrow("qdrantUrl is required");
    });
  });

  describe("Qdrant mapping", () => {
    it("derives a stable UUID-shaped point id", () => {
      const id = pointIdFor("abc-0");
      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(pointIdFor("abc-0")).toBe(id);
      expect(pointIdFor("abc-1")).not.toBe(id);
    });

    it("matches on service, user and source id", () => {
      expect(toQdrantFilter({ sourceService: "drive", userId: "u", sourceId: "f1" })).toEqual({
        must: [
          { key: "sourceService", match: { value: "drive" } },
          { key: "userId", match: { value: "u" } },
          { key: "sourceId", match: { value: "f1" } },
        ],
      });
    });

    it.each([[500], [503], [408], [429]])("treats status %i as transient", (status) => {
      expect(toStoreError({ status, message: "x" }, "upsert")).toBeInstanceOf(StoreTransientError);
    });

    it("treats connection failures as transient", () => {
      const error = toStoreError(new TypeError("fetch failed"), "delete");
      expect(error).toBeInstanceOf(StoreTransientError);
      expect(error.message).toBe("Qdrant delete failed: fetch failed");
    });

    it("does not retry client errors", () => {
      const error = toStoreError({ status: 400, message: "Bad Request" }, "upsert");
      expect(error).toBeInstanceOf(StoreError);
      expect(error.details).toEqual({ operation: "upsert", status: 400 });
    });
  });

  describe("InMemoryVectorStore", () => {
    it("overwrites records by id", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([record("a-0", "t1")]);
      await store.upsert([{ ...record("a-0", "t1"), content: "updated" }]);

      expect(store.size).toBe(1);
      expect(store.get("a-0")?.content).toBe("updated");
    });

    it("deletes only the matching source and reports the count", async () => {
      const store = new InMemoryVectorStore();
      await store.upsert([record("a-0", "t1"), record("a-1", "t1"), record("b-0", "t2")]);

      const removed = await store.deleteByFilter({ sourceService: "gmail", userId: "user-1", sourceId: "t1" });

      expect(removed).toBe(2);
      expect(store.ids()).toEqual(["b-0"]);
    });

    it("rejects vectors of the wrong size once the collection exists", async () => {
      const store = new InMemoryVectorStore();
      await store.ensureCollection(3);

      await expect(store.upsert([record("a-0", "t1", [1, 2])])).rejects.toBeInstanceOf(StoreError);
      expect(store.size).toBe(0);
    });
  });
});
