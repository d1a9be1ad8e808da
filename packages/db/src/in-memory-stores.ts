import { randomUUID } from "node:crypto";
import { InvalidTaskTransitionError, NotFoundError } from "@ragsync/errors";
import {
  TERMINAL_TASK_STATUSES,
  legalSources,
  type ISourceAccountStore,
  type ITaskStore,
  type NewTask,
  type SourceAccount,
  type SourceQuery,
  type SourceService,
  type Task,
  type TaskCounters,
  type TaskPatch,
  type TaskStatus,
} from "@ragsync/types";
import { DEFAULT_TASK_HISTORY_SIZE, type TaskStoreOptions } from "./pg-task-store.js";

export interface InMemoryTaskStoreOptions extends TaskStoreOptions {
  now?: () => Date;
}

/** Same contract as PgTaskStore, held in a Map. Returned tasks are copies. */
export class InMemoryTaskStore implements ITaskStore {
  private readonly tasks = new Map<string, { task: Task; seq: number }>();
  private readonly historySize: number;
  private readonly now: () => Date;
  private seq = 0;

  constructor(options?: InMemoryTaskStoreOptions) {
    this.historySize = options?.historySize ?? DEFAULT_TASK_HISTORY_SIZE;
    this.now = options?.now ?? (() => new Date());
  }

  async insert(input: NewTask): Promise<Task> {
    const at = this.now();
    const task: Task = {
      id: randomUUID(),
      ownerId: input.ownerId,
      status: "pending",
      service: input.service,
      kind: input.kind,
      sourceQuery: structuredClone(input.sourceQuery),
      processedCount: 0,
      failedItemCount: 0,
      error: null,
      createdAt: at,
      updatedAt: at,
    };
    this.tasks.set(task.id, { task, seq: this.seq++ });
    this.prune(input.ownerId, input.service);
    return structuredClone(task);
  }

  async get(taskId: string): Promise<Task | null> {
    const entry = this.tasks.get(taskId);
    return entry ? structuredClone(entry.task) : null;
  }

  async transition(taskId: string, from: readonly TaskStatus[], patch: TaskPatch): Promise<Task> {
    const task = this.require(taskId);
    if (!legalSources(from, patch.status).includes(task.status)) {
      throw new InvalidTaskTransitionError(taskId, task.status, patch.status);
    }
    if (patch.status !== undefined) task.status = patch.status;
    if (patch.sourceQuery !== undefined) task.sourceQuery = structuredClone(patch.sourceQuery);
    if (patch.error !== undefined) task.error = patch.error;
    task.updatedAt = this.now();
    return structuredClone(task);
  }

  async incrementCounters(taskId: string, counters: TaskCounters): Promise<Task> {
    const task = this.require(taskId);
    if (task.status !== "in_progress") {
      throw new InvalidTaskTransitionError(taskId, task.status, undefined);
    }
    task.processedCount += counters.processed;
    task.failedItemCount += counters.failed;
    task.updatedAt = this.now();
    return structuredClone(task);
  }

  async listByStatus(status: TaskStatus, updatedBefore: Date): Promise<Task[]> {
    return [...this.tasks.values()]
      .map((entry) => entry.task)
      .filter((task) => task.status === status && task.updatedAt.getTime() < updatedBefore.getTime())
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .map((task) => structuredClone(task));
  }

  get size(): number {
    return this.tasks.size;
  }

  private require(taskId: string): Task {
    const entry = this.tasks.get(taskId);
    if (!entry) throw new NotFoundError(`Task ${taskId} not found`);
    return entry.task;
  }

  private prune(ownerId: string, service: SourceService): void {
    const history = [...this.tasks.values()]
      .filter((entry) => entry.task.ownerId === ownerId && entry.task.service === service)
      .sort((a, b) => b.task.createdAt.getTime() - a.task.createdAt.getTime() || b.seq - a.seq);

    for (const entry of history.slice(this.historySize)) {
      if (TERMINAL_TASK_STATUSES.includes(entry.task.status)) {
        this.tasks.delete(entry.task.id);
      }
    }
  }
}

export class InMemorySourceAccountStore implements ISourceAccountStore {
  private readonly accounts = new Map<string, SourceAccount>();

  constructor(accounts: SourceAccount[] = []) {
    for (const account of accounts) this.accounts.set(account.id, structuredClone(account));
  }

  async listEnabled(service?: SourceService): Promise<SourceAccount[]> {
    return [...this.accounts.values()]
      .filter((account) => account.enabled && (service === undefined || account.service === service))
      .map((account) => structuredClone(account));
  }

  async recordCollection(
    accountId: string,
    update: { sourceQuery: SourceQuery; lastCollectedAt: Date; lastTaskId: string },
  ): Promise<void> {
    const account = this.accounts.get(accountId);
    if (!account) throw new NotFoundError(`Source account ${accountId} not found`);
    account.sourceQuery = structuredClone(update.sourceQuery);
    account.lastCollectedAt = update.lastCollectedAt;
    account.lastTaskId = update.lastTaskId;
  }

  get(accountId: string): SourceAccount | undefined {
    const account = this.accounts.get(accountId);
    return account ? structuredClone(account) : undefined;
  }
}
