import type OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type { z } from "zod";
import { AppError, ExternalServiceError, RateLimitedError, messageOf, statusOf } from "@ragsync/errors";

export type UserContent =
  | string
  | Array<{ type: "text"; text: string } | { type: "image_url"; image_url: { url: string } }>;

export interface StructuredRequest<T> {
  model: string;
  system?: string;
  user: UserContent;
  schema: z.ZodType<T>;
  schemaName: string;
}

/** One chat completion whose reply is validated against a zod schema. */
export interface IStructuredChat {
  complete<T>(request: StructuredRequest<T>): Promise<T>;
}

const DEFAULT_RETRY_AFTER_SECONDS = 60;

function retryAfterOf(error: unknown): number {
  if (typeof error !== "object" || error === null || !("headers" in error)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const headers = error.headers;
  const raw =
    typeof headers === "object" && headers !== null && "retry-after" in headers ? headers["retry-after"] : undefined;
  const seconds = typeof raw === "string" ? Number(raw) : Number.NaN;
  return Number.isFinite(seconds) && seconds > 0 ? seconds : DEFAULT_RETRY_AFTER_SECONDS;
}

/** 429 becomes RateLimitedError; anything else an ExternalServiceError. */
export function toLlmError(error: unknown): AppError {
  if (AppError.isAppError(error)) return error;
  const status = statusOf(error);
  if (status === 429) {
    return new RateLimitedError(messageOf(error), retryAfterOf(error), { cause: error });
  }
  return new ExternalServiceError(messageOf(error), "openai", { cause: error, details: { status } });
}

export class OpenAIStructuredChat implements IStructuredChat {
  constructor(private readonly client: OpenAI) {}

  async complete<T>(request: StructuredRequest<T>): Promise<T> {
    let parsed: T | null | undefined;
    try {
      const completion = await this.client.beta.chat.completions.parse({
        model: request.model,
        messages: [
          ...(request.system ? [{ role: "system" as const, content: request.system }] : []),
          { role: "user" as const, content: request.user },
        ],
        response_format: zodResponseFormat(request.schema, request.schemaName),
      });
      parsed = completion.choices[0]?.message.parsed;
    } catch (error: unknown) {
      throw toLlmError(error);
    }

    if (parsed === null || parsed === undefined) {
      throw new ExternalServiceError(`Empty ${request.schemaName} response`, "openai");
    }
    return parsed;
  }
}
