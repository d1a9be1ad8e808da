import { z } from "zod";
import { ClassificationError, RateLimitedError, messageOf } from "@ragsync/errors";
import type { IRelevanceClassifier } from "@ragsync/types";
import type { IStructuredChat } from "./structured-chat.js";

const verdictSchema = z.object({
  verdict: z.boolean().describe("True if the content is related to the topics, False otherwise."),
});

export function buildRelevancePrompt(text: string, topics: readonly string[]): string {
  return [
    `You are a professional document labeling assistant. Check whether the content below is related to any of these topics: ${topics.join(", ")}.`,
    "",
    "Content:",
    text,
  ].join("\n");
}

/**
 * Yes/no topical relevance via a structured completion.
 * Throttling surfaces as RateLimitedError, every other failure as ClassificationError.
 */
export class OpenAIRelevanceClassifier implements IRelevanceClassifier {
  constructor(
    private readonly chat: IStructuredChat,
    private readonly model: string,
  ) {}

  async classify(text: string, topics: readonly string[]): Promise<boolean> {
    try {
      const result = await this.chat.complete({
        model: this.model,
        user: buildRelevancePrompt(text, topics),
        schema: verdictSchema,
        schemaName: "relevance_verdict",
      });
      return result.verdict;
    } catch (error: unknown) {
      if (error instanceof RateLimitedError) throw error;
      throw new ClassificationError(`Relevance check failed: ${messageOf(error)}`, { cause: error });
    }
  }
}
