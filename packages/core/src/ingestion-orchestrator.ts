import { messageOf } from "@ragsync/errors";
import type { IChunker } from "@ragsync/chunker";
import type { Logger } from "@ragsync/logger";
import type { ExtractionInput, ExtractionResult } from "@ragsync/parser";
import type {
  ChunkDraft,
  ConnectorPolicy,
  ISourceConnector,
  JobMeta,
  MetadataRecord,
  SourceDocument,
  SourceItem,
  SourceKey,
  SourceMetadata,
  SourceQuery,
  SourceService,
  Task,
} from "@ragsync/types";
import { dedupFilter, resolveChunks } from "./identity.js";
import type { RelevanceFilter } from "./relevance-filter.js";
import type { TaskLifecycleManager } from "./task-lifecycle.js";
import type { VectorUpsertClient } from "./vector-upsert-client.js";

export interface ExtractionDispatcher {
  extract(input: ExtractionInput): Promise<ExtractionResult>;
}

export interface OrchestratorDependencies {
  extractor: ExtractionDispatcher;
  chunker: IChunker;
  relevanceFilter: RelevanceFilter;
  upsertClient: VectorUpsertClient;
  lifecycle: TaskLifecycleManager;
  policyFor: (service: SourceService) => ConnectorPolicy;
  logger: Logger;
}

export interface ItemOutcome {
  sourceId: string;
  documents: number;
  chunks: number;
  deleted: number;
  written: number;
  failures: number;
}

const KEY_FIELDS = new Set(["sourceService", "userId", "sourceId"]);

export function topicsOf(query: SourceQuery): string[] {
  const topics = query["topics"];
  if (!Array.isArray(topics)) return [];
  return topics.filter((topic): topic is string => typeof topic === "string" && topic.trim().length > 0);
}

/** Later layers win; the source key fields always come from `key`. */
export function layerMetadata(key: SourceKey, ...layers: MetadataRecord[]): SourceMetadata {
  const metadata: SourceMetadata = {
    sourceService: key.service,
    userId: key.userId,
    sourceId: key.sourceId,
  };
  for (const layer of layers) {
    for (const [name, value] of Object.entries(layer)) {
      if (!KEY_FIELDS.has(name)) metadata[name] = value;
    }
  }
  return metadata;
}

/**
 * Extract -> chunk -> filter -> replace, one source item at a time.
 * Extraction problems are recorded against the item and skipped; vector
 * store failures end the task.
 */
export class IngestionOrchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  async ingestSource(item: SourceItem, job: JobMeta, logger: Logger = this.deps.logger): Promise<ItemOutcome> {
    const { key } = item;
    const documents: SourceDocument[] = [];
    let failures = 0;

    for (const part of item.parts) {
      const result = await this.deps.extractor.extract({
        content: part.content,
        mediaType: part.mediaType,
        fileName: part.fileName,
      });

      for (const failure of result.failures) {
        failures++;
        logger.warn(
          {
            sourceId: key.sourceId,
            partKey: part.partKey,
            fileName: failure.fileName,
            code: failure.error.code,
            err: failure.error,
          },
          "Skipping content that could not be extracted",
        );
      }

      const partDefaults: MetadataRecord = part.fileName ? { title: part.fileName } : {};
      for (const extracted of result.items) {
        documents.push({
          rawText: extracted.text,
          metadata: layerMetadata(key, item.metadata, partDefaults, part.metadata, extracted.metadata),
          identity: extracted.identity,
          partKey: part.partKey,
        });
      }
    }

    let drafts: ChunkDraft[] = documents.flatMap((document) => this.deps.chunker.split(document));

    const policy = this.deps.policyFor(key.service);
    const topics = topicsOf(job.sourceQuery);
    if (policy.relevanceFilter && topics.length > 0) {
      const before = drafts.length;
      drafts = await this.deps.relevanceFilter.filter(drafts, topics);
      logger.debug({ sourceId: key.sourceId, before, after: drafts.length }, "Relevance filter applied");
    }

    const outcome: ItemOutcome = {
      sourceId: key.sourceId,
      documents: documents.length,
      chunks: drafts.length,
      deleted: 0,
      written: 0,
      failures,
    };
    if (drafts.length === 0) return outcome;

    const chunks = resolveChunks(key, drafts);
    const result = await this.deps.upsertClient.replace(
      policy.dedupDelete ? dedupFilter(key) : null,
      chunks,
      { taskId: job.taskId },
    );
    return { ...outcome, deleted: result.deleted, written: result.written };
  }

  /** Runs a whole task: start, every connector item in order, then complete or fail. */
  async runIngestionTask(job: JobMeta, connector: ISourceConnector): Promise<Task> {
    const { lifecycle } = this.deps;
    const logger = this.deps.logger.child({ taskId: job.taskId, service: job.service });

    await lifecycle.start(job.taskId, job.sourceQuery);
    logger.info({ kind: job.kind }, "Task started");

    try {
      for await (const item of connector.items(job)) {
        const outcome = await this.ingestSource(item, job, logger);
        logger.info({ ...outcome }, "Source item ingested");
        await lifecycle.recordItem(job.taskId, { failed: outcome.failures > 0 });
      }
    } catch (error: unknown) {
      logger.error({ err: error }, "Ingestion aborted");
      await lifecycle.fail(job.taskId, messageOf(error)).catch((failError: unknown) => {
        logger.error({ err: failError }, "Could not mark task failed");
      });
      throw error;
    }

    return lifecycle.complete(job.taskId);
  }
}
