import { RecursiveChunker } from "@ragsync/chunker";
import { getConnectorPolicy } from "@ragsync/config";
import { IngestionOrchestrator, RelevanceFilter, TaskLifecycleManager, VectorUpsertClient } from "@ragsync/core";
import { PgSourceAccountStore, PgTaskStore, applySchema, createDbClient } from "@ragsync/db";
import { CohereEmbeddingProvider } from "@ragsync/embeddings";
import { OpenAIOcrService, OpenAIRelevanceClassifier, OpenAIStructuredChat, createOpenAIClient } from "@ragsync/llm";
import { createChildLogger, type Logger } from "@ragsync/logger";
import { createExtractorRegistry } from "@ragsync/parser";
import type { AppConfig, ISourceAccountStore } from "@ragsync/types";
import { createVectorStore } from "@ragsync/vector-store";
import { ConnectorRegistry } from "./connectors/connector-registry.js";
import { FileConnector } from "./connectors/file-connector.js";
import { checkDependencies } from "./health.js";

export interface Container {
  orchestrator: IngestionOrchestrator;
  lifecycle: TaskLifecycleManager;
  connectors: ConnectorRegistry;
  sourceAccounts: ISourceAccountStore;
  close(): Promise<void>;
}

/** Builds the production object graph from validated configuration. */
export async function createContainer(config: AppConfig, logger: Logger): Promise<Container> {
  const { db, close: closeDb } = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  await applySchema(db);

  const lifecycle = new TaskLifecycleManager(
    new PgTaskStore(db, { historySize: config.tasks.historySize }),
    createChildLogger(logger, { component: "lifecycle" }),
    { cache: {} },
  );

  const chat = new OpenAIStructuredChat(
    createOpenAIClient({ apiKey: config.openai.apiKey, baseUrl: config.openai.baseUrl }),
  );
  const ocr = new OpenAIOcrService(chat, config.openai.ocrModel, createChildLogger(logger, { component: "ocr" }));
  const classifier = new OpenAIRelevanceClassifier(chat, config.openai.classifierModel);

  const vectorStore = createVectorStore({
    type: config.vectorStore.provider,
    qdrantUrl: config.vectorStore.url,
    qdrantApiKey: config.vectorStore.apiKey,
    collection: config.vectorStore.collection,
  });
  await vectorStore.ensureCollection(config.cohere.dimensions);

  const embeddings = new CohereEmbeddingProvider({
    apiKey: config.cohere.apiKey,
    model: config.cohere.embedModel,
    dimensions: config.cohere.dimensions,
  });
  await checkDependencies({ vectorStore, embeddings }, createChildLogger(logger, { component: "health" }));

  const pipelineLogger = createChildLogger(logger, { component: "pipeline" });
  const orchestrator = new IngestionOrchestrator({
    extractor: createExtractorRegistry({ ocr, imageAreaThreshold: config.extraction.imageAreaThreshold }),
    chunker: new RecursiveChunker({ maxTokens: config.chunking.maxTokens, overlap: config.chunking.overlap }),
    relevanceFilter: new RelevanceFilter(classifier, pipelineLogger, {
      maxAttempts: config.retry.classifierMaxAttempts,
      backoffMs: config.retry.classifierBackoffMs,
    }),
    upsertClient: new VectorUpsertClient(vectorStore, embeddings, pipelineLogger, {
      maxAttempts: config.retry.storeMaxAttempts,
      delayMs: config.retry.storeDelayMs,
    }),
    lifecycle,
    policyFor: (service) => getConnectorPolicy(service, config.connectors),
    logger: pipelineLogger,
  });

  const connectors = new ConnectorRegistry().register(new FileConnector({ rootDir: config.files.rootDir }));

  return {
    orchestrator,
    lifecycle,
    connectors,
    sourceAccounts: new PgSourceAccountStore(db),
    async close() {
      ocr.shutdown();
      await closeDb();
    },
  };
}
