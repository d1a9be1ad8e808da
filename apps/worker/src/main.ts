import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import { parseEnv } from "@ragsync/config";
import { createLogger, type Logger } from "@ragsync/logger";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  createQueues,
  enqueueTask,
  getQueueDepth,
  parseRedisConnection,
  registerScheduleSweep,
  toDeadLetter,
  type DeadLetterQueue,
  type Queues,
} from "@ragsync/queue";
import type { AnyJobData, AppConfig, IngestJobData, JobResult, ScheduleSweepJobData } from "@ragsync/types";
import { createContainer, type Container } from "./container.js";
import { processIngest } from "./processors/ingest.js";
import { runScheduleSweep, type SweepResult } from "./processors/schedule.js";

const DEPTH_LOG_INTERVAL_MS = 60_000;

async function moveToDeadLetter(
  dlq: DeadLetterQueue,
  queueName: string,
  job: Job<AnyJobData> | undefined,
  error: Error,
  logger: Logger,
): Promise<void> {
  if (!job) return;
  try {
    await dlq.add(`dead:${job.name}`, toDeadLetter(job.data, queueName, error));
  } catch (dlqError: unknown) {
    logger.error({ jobId: job.id, err: dlqError }, "Failed to move job to the dead-letter queue");
  }
}

function createWorkers(
  connection: ConnectionOptions,
  config: AppConfig,
  container: Container,
  queues: Queues,
  logger: Logger,
): Worker[] {
  const ingestDeps = {
    orchestrator: container.orchestrator,
    lifecycle: container.lifecycle,
    connectors: container.connectors,
    logger,
  };

  const manualWorker = new Worker<IngestJobData, JobResult>(
    QUEUE_NAMES.MANUAL,
    (job) => processIngest(job.data, ingestDeps),
    { connection, concurrency: config.workers.manualConcurrency },
  );

  const scheduledWorker = new Worker<IngestJobData, JobResult>(
    QUEUE_NAMES.SCHEDULED,
    (job) => processIngest(job.data, ingestDeps),
    { connection, concurrency: config.workers.scheduledConcurrency },
  );

  const sweepWorker = new Worker<ScheduleSweepJobData, SweepResult>(
    QUEUE_NAMES.SCHEDULE,
    (job) =>
      runScheduleSweep(job.data, {
        accounts: container.sourceAccounts,
        lifecycle: container.lifecycle,
        enqueue: (task) => enqueueTask(queues, task),
        staleAfterMs: config.tasks.staleAfterMs,
        logger,
      }),
    { connection, concurrency: 1 },
  );

  return [manualWorker, scheduledWorker, sweepWorker];
}

async function logQueueDepths(queues: Queues, logger: Logger): Promise<void> {
  try {
    const [manual, scheduled] = await Promise.all([
      getQueueDepth(queues.manualQueue),
      getQueueDepth(queues.scheduledQueue),
    ]);
    logger.info({ manual, scheduled }, "Queue depth");
  } catch (error: unknown) {
    logger.warn({ err: error }, "Could not read queue depth");
  }
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "ragsync-worker" });

  const container = await createContainer(config, logger);
  const connection = parseRedisConnection(config.redis.url);
  const queues = createQueues({ connection });
  const dlq = createDeadLetterQueue(connection);
  const workers = createWorkers(connection, config, container, queues, logger);

  for (const worker of workers) {
    worker.on("failed", (job, error) => {
      logger.error({ queue: worker.name, jobId: job?.id, err: error }, "Job failed");
      void moveToDeadLetter(dlq, worker.name, job, error, logger);
    });
  }

  await registerScheduleSweep(queues, config.workers.scheduleCron);
  const depthTimer = setInterval(() => void logQueueDepths(queues, logger), DEPTH_LOG_INTERVAL_MS);

  logger.info({ queues: Object.values(QUEUE_NAMES), workers: workers.length }, "Worker started");

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    clearInterval(depthTimer);
    await Promise.all(workers.map((w) => w.close()));
    await Promise.all([queues.manualQueue.close(), queues.scheduledQueue.close(), queues.scheduleQueue.close(), dlq.close()]);
    await container.close();
    logger.info("All workers closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  createLogger({ service: "ragsync-worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
