import type { SourceMetadata } from "./source.js";

export interface ChunkMetadata extends SourceMetadata {
  chunkIndex: number;
}

/** Chunker output, before identity resolution. */
export interface ChunkDraft {
  content: string;
  index: number;
  tokenCount: number;
  metadata: ChunkMetadata;
  identity?: string;
  partKey: string;
}

export interface Chunk {
  id: string;
  content: string;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkingConfig {
  maxTokens: number;
  overlap: number;
  separators?: string[];
}
