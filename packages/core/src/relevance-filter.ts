import { RateLimitedError, withRetry } from "@ragsync/errors";
import type { Logger } from "@ragsync/logger";
import type { ChunkDraft, IRelevanceClassifier } from "@ragsync/types";

export interface RelevanceFilterOptions {
  maxAttempts?: number;
  /** Fixed wait after a throttled call. */
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Drops chunks the classifier judges off-topic. Classifier failures keep the
 * chunk (fail open); throttling is retried first.
 */
export class RelevanceFilter {
  private readonly maxAttempts: number;
  private readonly backoffMs: number;

  constructor(
    private readonly classifier: IRelevanceClassifier,
    private readonly logger: Logger,
    private readonly options: RelevanceFilterOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffMs = options.backoffMs ?? 60_000;
  }

  async filter<T extends ChunkDraft>(chunks: T[], topics: readonly string[]): Promise<T[]> {
    if (topics.length === 0) return chunks;

    const kept: T[] = [];
    for (const chunk of chunks) {
      if (await this.isRelevant(chunk, topics)) kept.push(chunk);
    }
    return kept;
  }

  private async isRelevant(chunk: ChunkDraft, topics: readonly string[]): Promise<boolean> {
    const context = { sourceId: chunk.metadata.sourceId, chunkIndex: chunk.index };
    try {
      return await withRetry(() => this.classifier.classify(chunk.content, topics), {
        maxAttempts: this.maxAttempts,
        backoff: "fixed",
        baseDelayMs: this.backoffMs,
        isRetryable: (error) => error instanceof RateLimitedError,
        sleep: this.options.sleep,
        onRetry: (_error, attempt, delayMs) => {
          this.logger.warn({ ...context, attempt, delayMs }, "Classifier rate limited, backing off");
        },
      });
    } catch (error: unknown) {
      this.logger.warn({ ...context, err: error }, "Relevance check failed, keeping chunk");
      return true;
    }
  }
}
