import { describe, it, expect } from "vitest";
import { InvalidTaskTransitionError, NotFoundError } from "@ragsync/errors";
import { legalSources, type NewTask } from "@ragsync/types";
import { InMemorySourceAccountStore, InMemoryTaskStore } from "./in-memory-stores.js";
import { getSchemaStatements } from "./migrate.js";

const newTask: NewTask = { ownerId: "owner-1", service: "gmail", kind: "manual", sourceQuery: { after: "2024-01-01" } };

function clock(start = Date.parse("2024-05-01T00:00:00Z")): { now: () => Date; advance(ms: number): void } {
  let t = start;
  return {
    now: () => new Date(t),
    advance(ms: number) {
      t += ms;
    },
  };
}

describe("InMemoryTaskStore", () => {
  it("inserts pending tasks with zero counters", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.insert(newTask);

    expect(task.status).toBe("pending");
    expect(task.processedCount).toBe(0);
    expect(task.error).toBeNull();
    await expect(store.get(task.id)).resolves.toEqual(task);
  });

  it("returns copies that callers cannot mutate", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.insert(newTask);
    task.sourceQuery["after"] = "changed";

    expect((await store.get(task.id))?.sourceQuery).toEqual({ after: "2024-01-01" });
  });

  it("applies a transition only from the allowed statuses", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.insert(newTask);

    const started = await store.transition(task.id, ["pending"], { status: "in_progress" });
    expect(started.status).toBe("in_progress");

    await expect(store.transition(task.id, ["pending"], { status: "in_progress" })).rejects.toThrow(
      `Task ${task.id} cannot move from in_progress to in_progress`,
    );
  });

  it("refuses to reopen a finished task even when the caller allows its status", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.insert(newTask);
    await store.transition(task.id, ["pending"], { status: "in_progress" });
    await store.transition(task.id, ["in_progress"], { status: "completed" });

    await expect(store.transition(task.id, ["completed"], { status: "pending" })).rejects.toBeInstanceOf(
      InvalidTaskTransitionError,
    );
    await expect(store.transition(task.id, ["completed"], { error: "late" })).rejects.toBeInstanceOf(
      InvalidTaskTransitionError,
    );
    expect(await store.get(task.id)).toMatchObject({ status: "completed", error: null });
  });

  it("refuses to skip from pending straight to completed", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.insert(newTask);

    await expect(store.transition(task.id, ["pending"], { status: "completed" })).rejects.toThrow(
      `Task ${task.id} cannot move from pending to completed`,
    );
  });

  it("rejects unknown ids with NotFoundError", async () => {
    const store = new InMemoryTaskStore();
    await expect(store.transition("missing", ["pending"], { status: "failed" })).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(store.get("missing")).resolves.toBeNull();
  });

  it("increments counters only while in progress", async () => {
    const store = new InMemoryTaskStore();
    const task = await store.insert(newTask);

    await expect(store.incrementCounters(task.id, { processed: 1, failed: 0 })).rejects.toBeInstanceOf(
      InvalidTaskTransitionError,
    );

    await store.transition(task.id, ["pending"], { status: "in_progress" });
    await store.incrementCounters(task.id, { processed: 1, failed: 0 });
    const updated = await store.incrementCounters(task.id, { processed: 1, failed: 1 });

    expect(updated.processedCount).toBe(2);
    expect(updated.failedItemCount).toBe(1);
  });

  it("evicts the oldest finished tasks beyond the history size", async () => {
    const time = clock();
    const store = new InMemoryTaskStore({ historySize: 2, now: time.now });

    const first = await store.insert(newTask);
    await store.transition(first.id, ["pending"], { status: "failed", error: "boom" });
    time.advance(1000);
    const second = await store.insert(newTask);
    time.advance(1000);
    const third = await store.insert(newTask);
    time.advance(1000);
    await store.insert({ ...newTask, service: "drive" });

    await expect(store.get(first.id)).resolves.toBeNull();
    expect((await store.get(second.id))?.id).toBe(second.id);
    expect((await store.get(third.id))?.id).toBe(third.id);
    expect(store.size).toBe(3);
  });

  it("keeps live tasks even when they fall outside the history", async () => {
    const store = new InMemoryTaskStore({ historySize: 1 });
    const live = await store.insert(newTask);
    await store.insert(newTask);

    expect((await store.get(live.id))?.status).toBe("pending");
  });

  it("lists tasks by status updated before a cutoff", async () => {
    const time = clock();
    const store = new InMemoryTaskStore({ now: time.now });
    const stale = await store.insert(newTask);
    await store.transition(stale.id, ["pending"], { status: "in_progress" });
    time.advance(7 * 3_600_000);
    const fresh = await store.insert(newTask);
    await store.transition(fresh.id, ["pending"], { status: "in_progress" });

    const cutoff = new Date(time.now().getTime() - 6 * 3_600_000);
    const listed = await store.listByStatus("in_progress", cutoff);

    expect(listed.map((t) => t.id)).toEqual([stale.id]);
  });
});

describe("legalSources", () => {
  it("keeps only the statuses the state machine lets reach the target", () => {
    expect(legalSources(["pending", "in_progress", "completed", "failed"], "failed")).toEqual(["pending", "in_progress"]);
    expect(legalSources(["completed", "failed"], "pending")).toEqual([]);
    expect(legalSources(["pending", "completed"], undefined)).toEqual(["pending"]);
  });
});

describe("InMemorySourceAccountStore", () => {
  it("lists enabled accounts and records collections", async () => {
    const store = new InMemorySourceAccountStore([
      { id: "a1", service: "gmail", userId: "u1", sourceQuery: {}, enabled: true, lastCollectedAt: null, lastTaskId: null },
      { id: "a2", service: "drive", userId: "u1", sourceQuery: {}, enabled: true, lastCollectedAt: null, lastTaskId: null },
      { id: "a3", service: "gmail", userId: "u2", sourceQuery: {}, enabled: false, lastCollectedAt: null, lastTaskId: null },
    ]);

    expect((await store.listEnabled("gmail")).map((a) => a.id)).toEqual(["a1"]);
    expect(await store.listEnabled()).toHaveLength(2);

    const at = new Date("2024-05-01T03:00:00Z");
    await store.recordCollection("a1", { sourceQuery: { after: "2024-05-01" }, lastCollectedAt: at, lastTaskId: "t1" });

    expect(store.get("a1")).toMatchObject({ sourceQuery: { after: "2024-05-01" }, lastCollectedAt: at, lastTaskId: "t1" });
  });
});

describe("getSchemaStatements", () => {
  it("splits the DDL into individual statements", () => {
    const statements = getSchemaStatements();
    expect(statements).toHaveLength(7);
    expect(statements[3]?.startsWith("CREATE TABLE IF NOT EXISTS tasks")).toBe(true);
    expect(statements.every((s) => !s.endsWith(";"))).toBe(true);
  });
});
