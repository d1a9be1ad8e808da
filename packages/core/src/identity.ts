import { createHash } from "node:crypto";
import type { Chunk, ChunkDraft, DedupFilter, SourceKey } from "@ragsync/types";

/**
 * Hash of the fields that name one document of a source item. The same
 * source re-ingested yields the same hash, so ids overwrite instead of piling up.
 */
export function baseHash(key: SourceKey, partKey: string, identity?: string): string {
  const fields = [key.service, key.userId, key.sourceId, partKey];
  if (identity) fields.push(identity);
  return createHash("sha256").update(fields.join(":")).digest("hex");
}

/** `base-index`, or `base-page-index` for paged documents. */
export function chunkId(key: SourceKey, draft: ChunkDraft): string {
  const base = baseHash(key, draft.partKey, draft.identity);
  const page = draft.metadata.page;
  return page === undefined ? `${base}-${draft.index}` : `${base}-${page}-${draft.index}`;
}

export function dedupFilter(key: SourceKey): DedupFilter {
  return { sourceService: key.service, userId: key.userId, sourceId: key.sourceId };
}

export function resolveChunks(key: SourceKey, drafts: ChunkDraft[]): Chunk[] {
  return drafts.map((draft) => ({
    id: chunkId(key, draft),
    content: draft.content,
    tokenCount: draft.tokenCount,
    metadata: draft.metadata,
  }));
}
