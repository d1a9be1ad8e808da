import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData, ScheduleSweepJobData, Task, TaskKind } from "@ragsync/types";

export const QUEUE_NAMES = {
  MANUAL: "ragsync:ingest:manual",
  SCHEDULED: "ragsync:ingest:scheduled",
  SCHEDULE: "ragsync:schedule",
} as const;

export const SWEEP_JOB_NAME = "schedule-sweep";

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      // the pipeline retries internally; a failed task is resubmitted as a new task
      attempts: 1,
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const manualQueue = new Queue<IngestJobData>(QUEUE_NAMES.MANUAL, defaultOpts);
  const scheduledQueue = new Queue<IngestJobData>(QUEUE_NAMES.SCHEDULED, defaultOpts);
  const scheduleQueue = new Queue<ScheduleSweepJobData>(QUEUE_NAMES.SCHEDULE, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      removeOnComplete: { count: 30 },
    },
  });

  return { manualQueue, scheduledQueue, scheduleQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export function queueNameFor(kind: TaskKind): string {
  return kind === "scheduled" ? QUEUE_NAMES.SCHEDULED : QUEUE_NAMES.MANUAL;
}

export function toIngestJob(task: Task): IngestJobData {
  return {
    type: "ingest",
    taskId: task.id,
    ownerId: task.ownerId,
    service: task.service,
    kind: task.kind,
    sourceQuery: task.sourceQuery,
  };
}

/** Enqueues a task on the pool matching its kind; the task id doubles as the job id. */
export async function enqueueTask(queues: Queues, task: Task): Promise<void> {
  const queue = task.kind === "scheduled" ? queues.scheduledQueue : queues.manualQueue;
  await queue.add(`ingest:${task.service}`, toIngestJob(task), { jobId: task.id });
}

export async function registerScheduleSweep(queues: Queues, cron: string): Promise<void> {
  await queues.scheduleQueue.add(
    SWEEP_JOB_NAME,
    { type: "schedule-sweep" },
    { repeat: { pattern: cron }, jobId: SWEEP_JOB_NAME },
  );
}

export interface JobCountSource {
  getJobCounts(...types: string[]): Promise<Record<string, number>>;
}

/** Waiting + active + delayed jobs. */
export async function getQueueDepth(queue: JobCountSource): Promise<number> {
  const counts = await queue.getJobCounts("waiting", "active", "delayed");
  return (counts["waiting"] ?? 0) + (counts["active"] ?? 0) + (counts["delayed"] ?? 0);
}
