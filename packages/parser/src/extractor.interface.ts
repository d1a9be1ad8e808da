import type { ExtractionError, UnsupportedMediaTypeError } from "@ragsync/errors";
import type { MetadataRecord } from "@ragsync/types";

export type MediaKind =
  | "pdf"
  | "docx"
  | "image"
  | "csv"
  | "spreadsheet"
  | "text"
  | "html"
  | "calendar"
  | "email";

export interface ExtractionInput {
  content: Uint8Array;
  mediaType: string;
  fileName?: string;
}

export interface ExtractedItem {
  text: string;
  metadata: MetadataRecord;
  /** Distinguishes items of one input in chunk identity (sheet, event, attachment). */
  identity?: string;
}

export interface ExtractionFailure {
  error: UnsupportedMediaTypeError | ExtractionError;
  fileName?: string;
  page?: number;
}

export interface ExtractionResult {
  items: ExtractedItem[];
  failures: ExtractionFailure[];
}

export interface ExtractionContext {
  /** Re-enters the registry, e.g. for email attachments. */
  dispatch(input: ExtractionInput): Promise<ExtractionResult>;
}

export interface IExtractor {
  readonly kind: MediaKind;
  extract(input: ExtractionInput, context: ExtractionContext): Promise<ExtractionResult>;
}

export function single(text: string, metadata: MetadataRecord = {}): ExtractionResult {
  return { items: [{ text, metadata }], failures: [] };
}
