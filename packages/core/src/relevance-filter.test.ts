import { describe, it, expect, vi } from "vitest";
import { ClassificationError, RateLimitedError } from "@ragsync/errors";
import { createLogger, createMemoryDestination } from "@ragsync/logger";
import type { ChunkDraft, IRelevanceClassifier } from "@ragsync/types";
import { RelevanceFilter } from "./relevance-filter.js";

function draft(index: number, content: string): ChunkDraft {
  return {
    content,
    index,
    tokenCount: 1,
    metadata: { sourceService: "gmail", userId: "user-1", sourceId: "thread-1", chunkIndex: index },
    partKey: "body",
  };
}

function setup(classify: IRelevanceClassifier["classify"]) {
  const sink = createMemoryDestination();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const classifier = { classify: vi.fn(classify) };
  const filter = new RelevanceFilter(classifier, createLogger({ destination: sink }), { sleep });
  return { filter, classifier, sleep, sink };
}

describe("RelevanceFilter", () => {
  it("is a no-op without topics", async () => {
    const { filter, classifier } = setup(async () => false);
    const chunks = [draft(0, "a")];

    await expect(filter.filter(chunks, [])).resolves.toBe(chunks);
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it("keeps only chunks judged relevant", async () => {
    const { filter } = setup(async (text) => text.includes("invoice"));
    const kept = await filter.filter([draft(0, "invoice due"), draft(1, "lunch plans")], ["billing"]);

    expect(kept.map((c) => c.index)).toEqual([0]);
  });

  it("retries throttled calls with a fixed window and then fails open", async () => {
    const { filter, classifier, sleep, sink } = setup(async () => {
      throw new RateLimitedError("throttled", 60);
    });

    const kept = await filter.filter([draft(0, "anything")], ["billing"]);

    expect(kept).toHaveLength(1);
    expect(classifier.classify).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[60_000], [60_000]]);
    expect(sink.records.at(-1)?.msg).toBe("Relevance check failed, keeping chunk");
  });

  it("recovers when a retry succeeds", async () => {
    let calls = 0;
    const { filter, sleep } = setup(async () => {
      calls++;
      if (calls === 1) throw new RateLimitedError("throttled", 60);
      return false;
    });

    await expect(filter.filter([draft(0, "x")], ["billing"])).resolves.toEqual([]);
    expect(sleep).toHaveBeenCalledOnce();
  });

  it("fails open immediately on classification errors", async () => {
    const { filter, classifier, sleep } = setup(async () => {
      throw new ClassificationError("bad json");
    });

    await expect(filter.filter([draft(0, "x")], ["billing"])).resolves.toHaveLength(1);
    expect(classifier.classify).toHaveBeenCalledOnce();
    expect(sleep).not.toHaveBeenCalled();
  });
});
