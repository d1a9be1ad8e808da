import type { SourceService } from "./source.js";
import type { SourceQuery, TaskKind } from "./task.js";

export type JobType = "ingest" | "schedule-sweep";

export interface JobMeta {
  taskId: string;
  ownerId: string;
  service: SourceService;
  kind: TaskKind;
  sourceQuery: SourceQuery;
}

export interface IngestJobData extends JobMeta {
  type: "ingest";
}

export interface ScheduleSweepJobData {
  type: "schedule-sweep";
  service?: SourceService;
}

export type AnyJobData = IngestJobData | ScheduleSweepJobData;

export interface JobResult {
  success: boolean;
  processedAt: Date;
  duration: number;
  error?: string;
  metrics?: Record<string, number>;
}
