import type { TaskLifecycleManager } from "@ragsync/core";
import type { Logger } from "@ragsync/logger";
import type { ISourceAccountStore, ScheduleSweepJobData, SourceQuery, Task } from "@ragsync/types";

export interface ScheduleSweepDeps {
  accounts: ISourceAccountStore;
  lifecycle: Pick<TaskLifecycleManager, "create" | "findStale">;
  enqueue: (task: Task) => Promise<void>;
  staleAfterMs: number;
  logger: Logger;
  now?: () => Date;
}

export interface SweepResult {
  scheduled: string[];
  skipped: string[];
  stale: string[];
}

/** YYYY/MM/DD, the date form mailbox search queries take. */
export function queryDate(date: Date): string {
  return date.toISOString().slice(0, 10).replaceAll("-", "/");
}

/**
 * Queues a scheduled task for every enabled account whose collection window is
 * still open, moving its `after` cursor to today.
 */
export async function runScheduleSweep(
  data: ScheduleSweepJobData,
  deps: ScheduleSweepDeps,
): Promise<SweepResult> {
  const now = deps.now?.() ?? new Date();
  const today = queryDate(now);
  const result: SweepResult = { scheduled: [], skipped: [], stale: [] };

  for (const account of await deps.accounts.listEnabled(data.service)) {
    const before = account.sourceQuery["before"];
    if (typeof before === "string" && before.replaceAll("-", "/") <= today) {
      result.skipped.push(account.id);
      continue;
    }

    const sourceQuery: SourceQuery = { ...account.sourceQuery, after: today };
    const task = await deps.lifecycle.create({
      ownerId: account.userId,
      service: account.service,
      kind: "scheduled",
      sourceQuery,
    });
    await deps.accounts.recordCollection(account.id, { sourceQuery, lastCollectedAt: now, lastTaskId: task.id });
    await deps.enqueue(task);
    result.scheduled.push(task.id);
  }

  for (const task of await deps.lifecycle.findStale(deps.staleAfterMs)) {
    result.stale.push(task.id);
    deps.logger.warn(
      { taskId: task.id, service: task.service, updatedAt: task.updatedAt.toISOString() },
      "Task has not progressed within the staleness window",
    );
  }

  deps.logger.info(
    { scheduled: result.scheduled.length, skipped: result.skipped.length, stale: result.stale.length },
    "Schedule sweep finished",
  );
  return result;
}
