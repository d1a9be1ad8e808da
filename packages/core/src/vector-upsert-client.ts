import {
  ExternalServiceError,
  RateLimitedError,
  StoreTransientError,
  withRetry,
} from "@ragsync/errors";
import type { IEmbeddingProvider } from "@ragsync/embeddings";
import type { Logger } from "@ragsync/logger";
import type { Chunk, DedupFilter, UploadResult, VectorRecord } from "@ragsync/types";
import type { IVectorStore } from "@ragsync/vector-store";
import { redactUrls } from "./sanitize.js";

export interface UpsertClientOptions {
  maxAttempts?: number;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface UpsertTask {
  taskId: string;
}

export function isTransientWriteError(error: unknown): boolean {
  return (
    error instanceof StoreTransientError ||
    error instanceof RateLimitedError ||
    error instanceof ExternalServiceError
  );
}

/**
 * Delete-then-write against the vector store. Writes are retried with a
 * fixed delay; each retry strips URLs from the chunk text and re-embeds it.
 * Not transactional: a crash between delete and write leaves the source
 * empty until the next run.
 */
export class VectorUpsertClient {
  private readonly maxAttempts: number;
  private readonly delayMs: number;

  constructor(
    private readonly store: IVectorStore,
    private readonly embeddings: IEmbeddingProvider,
    private readonly logger: Logger,
    private readonly options: UpsertClientOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.delayMs = options.delayMs ?? 60_000;
  }

  async replace(filter: DedupFilter | null, chunks: Chunk[], task: UpsertTask): Promise<UploadResult> {
    let deleted = 0;
    if (filter) {
      deleted = await withRetry(() => this.store.deleteByFilter(filter), {
        maxAttempts: this.maxAttempts,
        backoff: "fixed",
        baseDelayMs: this.delayMs,
        isRetryable: (error) => error instanceof StoreTransientError,
        sleep: this.options.sleep,
        onRetry: (error, attempt) => {
          this.logger.warn({ taskId: task.taskId, ...filter, attempt, err: error }, "Dedup delete failed, retrying");
        },
      });
    }

    const result = await this.upload(chunks, task);
    return { ...result, deleted };
  }

  async upload(chunks: Chunk[], task: UpsertTask): Promise<UploadResult> {
    if (chunks.length === 0) return { deleted: 0, written: 0, attempts: 0 };

    const ids = chunks.map((chunk) => chunk.id);
    let contents = chunks.map((chunk) => chunk.content);
    let attempts = 0;

    try {
      await withRetry(
        async () => {
          attempts++;
          const { embeddings } = await this.embeddings.embedDocuments(contents);
          const records: VectorRecord[] = chunks.map((chunk, i) => ({
            id: chunk.id,
            vector: embeddings[i] ?? [],
            content: contents[i] ?? chunk.content,
            metadata: chunk.metadata,
          }));
          await this.store.upsert(records);
        },
        {
          maxAttempts: this.maxAttempts,
          backoff: "fixed",
          baseDelayMs: this.delayMs,
          isRetryable: isTransientWriteError,
          sleep: this.options.sleep,
          onRetry: (error, attempt, delayMs) => {
            contents = contents.map(redactUrls);
            this.logger.info(
              { taskId: task.taskId, attempt, delayMs, chunkCount: ids.length, err: error },
              "Vector write failed, retrying with sanitized content",
            );
          },
        },
      );
    } catch (error: unknown) {
      this.logger.error({ taskId: task.taskId, ids, attempts, err: error }, "Vector write failed");
      throw error;
    }

    return { deleted: 0, written: chunks.length, attempts };
  }
}
