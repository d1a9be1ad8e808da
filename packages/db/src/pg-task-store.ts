import { and, asc, desc, eq, inArray, lt, notInArray, sql } from "drizzle-orm";
import { InvalidTaskTransitionError, NotFoundError } from "@ragsync/errors";
import {
  TERMINAL_TASK_STATUSES,
  legalSources,
  type ITaskStore,
  type NewTask,
  type Task,
  type TaskCounters,
  type TaskPatch,
  type TaskStatus,
} from "@ragsync/types";
import type { DbClient } from "./client.js";
import { tasks, type TaskRow } from "./schema/index.js";

export const DEFAULT_TASK_HISTORY_SIZE = 10;

export interface TaskStoreOptions {
  /** Tasks kept per owner and service. Live tasks are never evicted. */
  historySize?: number;
}

export function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    ownerId: row.ownerId,
    status: row.status,
    service: row.service,
    kind: row.kind,
    sourceQuery: row.sourceQuery,
    processedCount: row.processedCount,
    failedItemCount: row.failedItemCount,
    error: row.error,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export class PgTaskStore implements ITaskStore {
  private readonly historySize: number;

  constructor(
    private readonly db: DbClient,
    options?: TaskStoreOptions,
  ) {
    this.historySize = options?.historySize ?? DEFAULT_TASK_HISTORY_SIZE;
  }

  async insert(task: NewTask): Promise<Task> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(tasks)
        .values({
          ownerId: task.ownerId,
          service: task.service,
          kind: task.kind,
          sourceQuery: task.sourceQuery,
        })
        .returning();
      if (!row) throw new Error("Task insert returned no row");

      const newest = tx
        .select({ id: tasks.id })
        .from(tasks)
        .where(and(eq(tasks.ownerId, task.ownerId), eq(tasks.service, task.service)))
        .orderBy(desc(tasks.createdAt), desc(tasks.id))
        .limit(this.historySize);

      await tx
        .delete(tasks)
        .where(
          and(
            eq(tasks.ownerId, task.ownerId),
            eq(tasks.service, task.service),
            inArray(tasks.status, [...TERMINAL_TASK_STATUSES]),
            notInArray(tasks.id, newest),
          ),
        );

      return toTask(row);
    });
  }

  async get(taskId: string): Promise<Task | null> {
    const [row] = await this.db.select().from(tasks).where(eq(tasks.id, taskId)).limit(1);
    return row ? toTask(row) : null;
  }

  async transition(taskId: string, from: readonly TaskStatus[], patch: TaskPatch): Promise<Task> {
    const sources = legalSources(from, patch.status);
    if (sources.length === 0) throw await this.rejection(taskId, patch.status);

    const [row] = await this.db
      .update(tasks)
      .set({
        ...(patch.status !== undefined ? { status: patch.status } : {}),
        ...(patch.sourceQuery !== undefined ? { sourceQuery: patch.sourceQuery } : {}),
        ...(patch.error !== undefined ? { error: patch.error } : {}),
        updatedAt: new Date(),
      })
      .where(and(eq(tasks.id, taskId), inArray(tasks.status, sources)))
      .returning();

    if (row) return toTask(row);
    throw await this.rejection(taskId, patch.status);
  }

  async incrementCounters(taskId: string, counters: TaskCounters): Promise<Task> {
    const [row] = await this.db
      .update(tasks)
      .set({
        processedCount: sql`${tasks.processedCount} + ${counters.processed}`,
        failedItemCount: sql`${tasks.failedItemCount} + ${counters.failed}`,
        updatedAt: new Date(),
      })
      .where(and(eq(tasks.id, taskId), eq(tasks.status, "in_progress")))
      .returning();

    if (row) return toTask(row);
    throw await this.rejection(taskId, undefined);
  }

  async listByStatus(status: TaskStatus, updatedBefore: Date): Promise<Task[]> {
    const rows = await this.db
      .select()
      .from(tasks)
      .where(and(eq(tasks.status, status), lt(tasks.updatedAt, updatedBefore)))
      .orderBy(asc(tasks.updatedAt));
    return rows.map(toTask);
  }

  private async rejection(taskId: string, to: TaskStatus | undefined): Promise<Error> {
    const current = await this.get(taskId);
    if (!current) return new NotFoundError(`Task ${taskId} not found`);
    return new InvalidTaskTransitionError(taskId, current.status, to);
  }
}
