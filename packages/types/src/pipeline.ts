import type { ChunkMetadata } from "./chunk.js";
import type { SourceService } from "./source.js";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

/** Metadata match used to remove every chunk of one source before a rewrite. */
export interface DedupFilter {
  sourceService: SourceService;
  userId: string;
  sourceId: string;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  content: string;
  metadata: ChunkMetadata;
}

export interface UploadResult {
  deleted: number;
  written: number;
  attempts: number;
}
