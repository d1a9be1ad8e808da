import type { SourceService } from "./source.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  vectorStore: VectorStoreConfig;
  cohere: CohereConfig;
  openai: OpenAIConfig;
  chunking: ChunkingSettings;
  extraction: ExtractionConfig;
  retry: RetryConfig;
  workers: WorkerConfig;
  tasks: TaskConfig;
  connectors: ConnectorPolicyOverrides;
  files: FileConnectorConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface VectorStoreConfig {
  provider: "qdrant" | "memory";
  url: string;
  apiKey?: string;
  collection: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  dimensions: number;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  ocrModel: string;
  classifierModel: string;
}

export interface ChunkingSettings {
  maxTokens: number;
  overlap: number;
}

export interface ExtractionConfig {
  imageAreaThreshold: number;
}

export interface RetryConfig {
  storeMaxAttempts: number;
  storeDelayMs: number;
  classifierMaxAttempts: number;
  classifierBackoffMs: number;
}

export interface WorkerConfig {
  manualConcurrency: number;
  scheduledConcurrency: number;
  scheduleCron: string;
}

export interface TaskConfig {
  historySize: number;
  staleAfterMs: number;
}

export interface FileConnectorConfig {
  /** Directory the local file connector may read from. */
  rootDir: string;
}

export interface ConnectorPolicy {
  /** Delete the source's previous chunks before writing new ones. */
  dedupDelete: boolean;
  /** Run the relevance filter when the task carries topics. */
  relevanceFilter: boolean;
}

export interface ConnectorPolicyOverrides {
  dedupDeleteDisabled: SourceService[];
  relevanceFilterServices: SourceService[];
}
