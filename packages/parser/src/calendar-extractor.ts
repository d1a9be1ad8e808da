import { createHash } from "node:crypto";
import ical from "node-ical";
import type { MetadataRecord } from "@ragsync/types";
import type { ExtractedItem, ExtractionInput, ExtractionResult, IExtractor } from "./extractor.interface.js";
import { decodeText } from "./text-extractor.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** node-ical yields either a string or `{ params, val }` for text properties. */
function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (isRecord(value) && typeof value["val"] === "string") return value["val"];
  return "";
}

function dateOf(value: unknown): string | null {
  return value instanceof Date && !Number.isNaN(value.getTime()) ? value.toISOString() : null;
}

/**
 * One item per VEVENT. Identity is seeded by the file's hash and name, so
 * re-ingesting the same file yields the same chunk ids.
 */
export class CalendarExtractor implements IExtractor {
  readonly kind = "calendar";

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const components: unknown[] = Object.values(ical.sync.parseICS(decodeText(input.content)));
    const seed = `${createHash("sha256").update(input.content).digest("hex")}-${input.fileName ?? "calendar.ics"}`;

    const items: ExtractedItem[] = components
      .filter(isRecord)
      .filter((component) => component["type"] === "VEVENT")
      .map((event, index) => {
        const start = dateOf(event["start"]);
        const end = dateOf(event["end"]);
        const text = [
          `Event: ${textOf(event["summary"])}`,
          `Description: ${textOf(event["description"])}`,
          `Start: ${start ?? ""}`,
          `End: ${end ?? ""}`,
        ].join("\n");

        const metadata: MetadataRecord = {
          location: textOf(event["location"]) || null,
          start,
          end,
          created: dateOf(event["created"]),
          lastModified: dateOf(event["lastmodified"]),
        };

        const uid = textOf(event["uid"]);
        return { text, metadata, identity: `${seed}-${uid || String(index)}` };
      });

    return { items, failures: [] };
  }
}
