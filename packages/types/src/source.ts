import type { JobMeta } from "./job.js";
import type { SourceQuery } from "./task.js";

export type SourceService = "gmail" | "drive" | "file";

export const SOURCE_SERVICES: readonly SourceService[] = ["gmail", "drive", "file"];

export type MetadataValue = string | number | boolean | null;

export type MetadataRecord = Record<string, MetadataValue>;

export interface SourceKey {
  service: SourceService;
  userId: string;
  /** Thread id for email, file name for uploads, file id for drive files. */
  sourceId: string;
}

export interface SourceMetadata {
  [key: string]: MetadataValue | undefined;
  sourceService: SourceService;
  userId: string;
  sourceId: string;
  page?: number;
  attachmentName?: string;
  title?: string;
  ext?: string;
  mimeType?: string;
  createdAt?: string;
  lastModified?: string;
}

/** One attachment, message body or file belonging to a source item. */
export interface SourcePart {
  partKey: string;
  content: Uint8Array;
  mediaType: string;
  fileName?: string;
  metadata: MetadataRecord;
}

/** One logical source: every part shares a single dedup key. */
export interface SourceItem {
  key: SourceKey;
  parts: SourcePart[];
  metadata: MetadataRecord;
}

export interface SourceDocument {
  rawText: string;
  metadata: SourceMetadata;
  /** Extractor-provided discriminator folded into chunk identity. */
  identity?: string;
  partKey: string;
}

export interface ISourceConnector {
  readonly service: SourceService;
  items(job: JobMeta): AsyncIterable<SourceItem>;
}

export interface SourceAccount {
  id: string;
  service: SourceService;
  userId: string;
  sourceQuery: SourceQuery;
  enabled: boolean;
  lastCollectedAt: Date | null;
  lastTaskId: string | null;
}

export interface ISourceAccountStore {
  listEnabled(service?: SourceService): Promise<SourceAccount[]>;
  recordCollection(
    accountId: string,
    update: { sourceQuery: SourceQuery; lastCollectedAt: Date; lastTaskId: string },
  ): Promise<void>;
}
