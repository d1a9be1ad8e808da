import { messageOf } from "@ragsync/errors";
import type { IngestionOrchestrator, TaskLifecycleManager } from "@ragsync/core";
import type { Logger } from "@ragsync/logger";
import { parseIngestJob } from "@ragsync/queue";
import type { ISourceConnector, IngestJobData, JobResult } from "@ragsync/types";
import type { ConnectorRegistry } from "../connectors/connector-registry.js";

export interface IngestProcessorDeps {
  orchestrator: Pick<IngestionOrchestrator, "runIngestionTask">;
  lifecycle: Pick<TaskLifecycleManager, "fail">;
  connectors: ConnectorRegistry;
  logger: Logger;
}

async function connectorFor(job: IngestJobData, deps: IngestProcessorDeps): Promise<ISourceConnector> {
  try {
    return deps.connectors.get(job.service);
  } catch (error: unknown) {
    deps.logger.error({ taskId: job.taskId, service: job.service, err: error }, "No connector for task");
    await deps.lifecycle.fail(job.taskId, messageOf(error));
    throw error;
  }
}

/**
 * Runs one ingestion task from a queue job.
 *
 * Workflow:
 * 1. Validate the payload
 * 2. Look up the connector for the task's service (unknown service fails the task)
 * 3. Hand over to the orchestrator, which owns the task's status from here on
 */
export async function processIngest(data: unknown, deps: IngestProcessorDeps): Promise<JobResult> {
  const job = parseIngestJob(data);
  const startedAt = Date.now();

  const connector = await connectorFor(job, deps);
  const task = await deps.orchestrator.runIngestionTask(job, connector);

  return {
    success: true,
    processedAt: new Date(),
    duration: Date.now() - startedAt,
    metrics: {
      processed: task.processedCount,
      failed: task.failedItemCount,
    },
  };
}
