import { LRUCache } from "lru-cache";
import type { Logger } from "@ragsync/logger";
import {
  TERMINAL_TASK_STATUSES,
  type ITaskStore,
  type NewTask,
  type SourceQuery,
  type Task,
  type TaskStatus,
  type TaskStatusResult,
} from "@ragsync/types";

export interface StatusCacheOptions {
  max?: number;
  terminalTtlMs?: number;
  liveTtlMs?: number;
}

export interface TaskLifecycleOptions {
  /** Read-through cache for `getStatus`; omitted means every read hits the store. */
  cache?: StatusCacheOptions;
  now?: () => Date;
}

/**
 * pending -> in_progress -> completed | failed. The store enforces the
 * transitions; this class names them and keeps the status cache in step.
 */
export class TaskLifecycleManager {
  private readonly cache: LRUCache<string, TaskStatus> | undefined;
  private readonly terminalTtlMs: number;
  private readonly liveTtlMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: ITaskStore,
    private readonly logger: Logger,
    options: TaskLifecycleOptions = {},
  ) {
    this.terminalTtlMs = options.cache?.terminalTtlMs ?? 10 * 60_000;
    this.liveTtlMs = options.cache?.liveTtlMs ?? 2_000;
    this.cache = options.cache
      ? new LRUCache<string, TaskStatus>({ max: options.cache.max ?? 10_000, ttl: this.liveTtlMs })
      : undefined;
    this.now = options.now ?? (() => new Date());
  }

  async create(input: NewTask): Promise<Task> {
    const task = await this.store.insert(input);
    this.remember(task);
    this.logger.info({ taskId: task.id, service: task.service, kind: task.kind }, "Task created");
    return task;
  }

  async start(taskId: string, sourceQuery: SourceQuery): Promise<Task> {
    const task = await this.store.transition(taskId, ["pending"], {
      status: "in_progress",
      sourceQuery: structuredClone(sourceQuery),
    });
    this.remember(task);
    return task;
  }

  async recordItem(taskId: string, outcome: { failed: boolean }): Promise<Task> {
    return this.store.incrementCounters(taskId, { processed: 1, failed: outcome.failed ? 1 : 0 });
  }

  async complete(taskId: string): Promise<Task> {
    const task = await this.store.transition(taskId, ["in_progress"], { status: "completed", error: null });
    this.remember(task);
    this.logger.info(
      { taskId, processedCount: task.processedCount, failedItemCount: task.failedItemCount },
      "Task completed",
    );
    return task;
  }

  async fail(taskId: string, error: string): Promise<Task> {
    const task = await this.store.transition(taskId, ["pending", "in_progress"], { status: "failed", error });
    this.remember(task);
    this.logger.error({ taskId, error }, "Task failed");
    return task;
  }

  async getStatus(taskId: string): Promise<TaskStatusResult> {
    const cached = this.cache?.get(taskId);
    if (cached) return cached;

    const task = await this.store.get(taskId);
    if (!task) return "not_found";
    this.remember(task);
    return task.status;
  }

  get(taskId: string): Promise<Task | null> {
    return this.store.get(taskId);
  }

  /** In-progress tasks that have not been touched for `olderThanMs`. */
  findStale(olderThanMs: number): Promise<Task[]> {
    return this.store.listByStatus("in_progress", new Date(this.now().getTime() - olderThanMs));
  }

  private remember(task: Task): void {
    if (!this.cache) return;
    const terminal = TERMINAL_TASK_STATUSES.includes(task.status);
    this.cache.set(task.id, task.status, { ttl: terminal ? this.terminalTtlMs : this.liveTtlMs });
  }
}
