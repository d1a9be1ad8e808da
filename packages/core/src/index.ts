export { baseHash, chunkId, dedupFilter, resolveChunks } from "./identity.js";
export { redactUrls } from "./sanitize.js";
export { RelevanceFilter } from "./relevance-filter.js";
export type { RelevanceFilterOptions } from "./relevance-filter.js";
export { VectorUpsertClient, isTransientWriteError } from "./vector-upsert-client.js";
export type { UpsertClientOptions, UpsertTask } from "./vector-upsert-client.js";
export { TaskLifecycleManager } from "./task-lifecycle.js";
export type { TaskLifecycleOptions, StatusCacheOptions } from "./task-lifecycle.js";
export { IngestionOrchestrator, layerMetadata, topicsOf } from "./ingestion-orchestrator.js";
export type {
  ExtractionDispatcher,
  ItemOutcome,
  OrchestratorDependencies,
} from "./ingestion-orchestrator.js";
