import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { z } from "zod";
import type { MediaKind } from "./extractor.interface.js";

const mediaKind = z.enum(["pdf", "docx", "image", "csv", "spreadsheet", "text", "html", "calendar", "email"]);

const tableSchema = z.object({
  mediaTypes: z.record(mediaKind),
  extensions: z.record(mediaKind),
});

const table = tableSchema.parse(
  JSON.parse(readFileSync(new URL("./media-types.json", import.meta.url), "utf8")),
);

/** Declared types too vague to dispatch on; the file extension decides instead. */
const GENERIC_MEDIA_TYPES = new Set(["", "application/octet-stream", "binary/octet-stream"]);

export function normalizeMediaType(mediaType: string): string {
  return (mediaType.split(";")[0] ?? "").trim().toLowerCase();
}

export function extensionOf(fileName: string | undefined): string {
  return fileName ? extname(fileName).toLowerCase() : "";
}

/**
 * Declared media type first, then the file extension.
 */
export function resolveMediaKind(mediaType: string, fileName?: string): MediaKind | null {
  const normalized = normalizeMediaType(mediaType);
  const byType = GENERIC_MEDIA_TYPES.has(normalized) ? undefined : table.mediaTypes[normalized];
  return byType ?? table.extensions[extensionOf(fileName)] ?? null;
}
