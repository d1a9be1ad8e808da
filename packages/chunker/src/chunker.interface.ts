import type { ChunkDraft, SourceDocument } from "@ragsync/types";

export interface IChunker {
  split(document: SourceDocument): ChunkDraft[];
}
