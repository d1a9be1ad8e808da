import { z } from "zod";
import { ValidationError } from "@ragsync/errors";
import type { IngestJobData, JsonValue } from "@ragsync/types";

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

export const ingestJobSchema = z.object({
  type: z.literal("ingest"),
  taskId: z.string().min(1),
  ownerId: z.string().min(1),
  service: z.enum(["gmail", "drive", "file"]),
  kind: z.enum(["manual", "scheduled"]),
  sourceQuery: z.record(jsonValue),
});

export function parseIngestJob(data: unknown): IngestJobData {
  const result = ingestJobSchema.safeParse(data);
  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fields[issue.path.join(".") || "job"] = issue.message;
    }
    throw new ValidationError("Malformed ingest job", fields);
  }
  return result.data;
}
