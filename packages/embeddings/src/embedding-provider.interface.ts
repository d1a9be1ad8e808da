import type { EmbeddingResult } from "@ragsync/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** One vector per text, in input order. */
  embedDocuments(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
