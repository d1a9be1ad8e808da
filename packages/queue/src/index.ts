export { parseRedisConnection } from "./connection.js";
export {
  QUEUE_NAMES,
  SWEEP_JOB_NAME,
  createQueues,
  queueNameFor,
  toIngestJob,
  enqueueTask,
  registerScheduleSweep,
  getQueueDepth,
} from "./queues.js";
export type { QueueConfig, Queues, JobCountSource } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, toDeadLetter } from "./dlq.js";
export type { DeadLetterQueue, DeadLetterJobData } from "./dlq.js";
export { ingestJobSchema, parseIngestJob } from "./job-schema.js";
