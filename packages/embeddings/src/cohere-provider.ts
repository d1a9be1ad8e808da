import { CohereClient } from "cohere-ai";
import { AppError, ExternalServiceError, RateLimitedError, messageOf, statusOf } from "@ragsync/errors";
import type { EmbeddingResult } from "@ragsync/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit
const DEFAULT_RETRY_AFTER_SECONDS = 60;

/** The slice of the Cohere v2 API this provider calls. */
export interface CohereEmbedApi {
  embed(request: {
    texts: string[];
    model: string;
    inputType: "search_document";
    embeddingTypes: Array<"float">;
  }): Promise<{
    embeddings: { float?: number[][] };
    meta?: { billedUnits?: { inputTokens?: number } };
  }>;
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Replaces the SDK client (tests). */
  api?: CohereEmbedApi;
}

export function toEmbeddingError(error: unknown): AppError {
  if (AppError.isAppError(error)) return error;
  const status = statusOf(error);
  if (status === 429) {
    return new RateLimitedError(messageOf(error), DEFAULT_RETRY_AFTER_SECONDS, { cause: error });
  }
  return new ExternalServiceError(`Embedding request failed: ${messageOf(error)}`, "cohere", {
    cause: error,
    details: { status },
  });
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private readonly api: CohereEmbedApi;
  private readonly model: string;

  constructor(config: CohereProviderConfig) {
    this.api = config.api ?? new CohereClient({ token: config.apiKey }).v2;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embedDocuments(texts: string[]): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: Awaited<ReturnType<CohereEmbedApi["embed"]>>;
      try {
        response = await this.api.embed({
          texts: batch,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
        });
      } catch (error: unknown) {
        throw toEmbeddingError(error);
      }

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw new ExternalServiceError(
          `Expected ${batch.length} embeddings, received ${vectors.length}`,
          "cohere",
        );
      }
      allEmbeddings.push(...vectors);
      totalTokens += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embedDocuments(["health check"]);
      return true;
    } catch {
      return false;
    }
  }
}
