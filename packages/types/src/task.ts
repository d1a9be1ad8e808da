import type { SourceService } from "./source.js";

export type TaskStatus = "pending" | "in_progress" | "completed" | "failed";

export type TaskKind = "manual" | "scheduled";

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ["completed", "failed"];

/** Forward-only task state machine: the statuses each status may move to. */
export const LEGAL_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ["in_progress", "failed"],
  in_progress: ["completed", "failed"],
  completed: [],
  failed: [],
};

/**
 * The statuses among `from` that a task may leave for `to`. Without a target
 * status the update keeps the status, which only live tasks allow.
 */
export function legalSources(from: readonly TaskStatus[], to: TaskStatus | undefined): TaskStatus[] {
  return from.filter((status) =>
    to === undefined ? !TERMINAL_TASK_STATUSES.includes(status) : LEGAL_TRANSITIONS[status].includes(to),
  );
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Opaque request parameters. `after`, `before` and `topics` are read by the pipeline. */
export type SourceQuery = { [key: string]: JsonValue };

export interface Task {
  id: string;
  ownerId: string;
  status: TaskStatus;
  service: SourceService;
  kind: TaskKind;
  sourceQuery: SourceQuery;
  processedCount: number;
  failedItemCount: number;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type TaskStatusResult = TaskStatus | "not_found";

export interface NewTask {
  ownerId: string;
  service: SourceService;
  kind: TaskKind;
  sourceQuery: SourceQuery;
}

export interface TaskPatch {
  status?: TaskStatus;
  sourceQuery?: SourceQuery;
  error?: string | null;
}

export interface TaskCounters {
  processed: number;
  failed: number;
}

/**
 * Persistence for task records. Every mutation targets a single id and is
 * atomic with respect to it.
 */
export interface ITaskStore {
  /** Inserts a task and evicts the owner's oldest tasks beyond the history size. */
  insert(task: NewTask): Promise<Task>;
  get(taskId: string): Promise<Task | null>;
  /**
   * Applies `patch` only while the task's status is one of `from`.
   * Throws NotFoundError for an unknown id and InvalidTaskTransitionError otherwise.
   */
  transition(taskId: string, from: readonly TaskStatus[], patch: TaskPatch): Promise<Task>;
  incrementCounters(taskId: string, counters: TaskCounters): Promise<Task>;
  listByStatus(status: TaskStatus, updatedBefore: Date): Promise<Task[]>;
}
