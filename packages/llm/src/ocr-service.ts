import type CircuitBreaker from "opossum";
import { z } from "zod";
import { ExtractionError, createCircuitBreaker, messageOf } from "@ragsync/errors";
import type { Logger } from "@ragsync/logger";
import type { IOcrService } from "@ragsync/types";
import type { IStructuredChat } from "./structured-chat.js";

const transcriptionSchema = z.object({
  content: z.string().describe("Plain text content of the page"),
});

const OCR_PROMPT = [
  "You are an assistant that extracts data from documents and returns it as structured JSON.",
  "Analyze the provided image of a document page and extract the content of the page as plain text.",
].join("\n");

/**
 * Vision-model OCR behind a circuit breaker, so a failing upstream stops
 * being called for every remaining page.
 */
export class OpenAIOcrService implements IOcrService {
  private readonly breaker: CircuitBreaker<[Uint8Array, string], string>;

  constructor(
    private readonly chat: IStructuredChat,
    private readonly model: string,
    logger: Logger,
  ) {
    this.breaker = createCircuitBreaker(
      "ocr",
      (image: Uint8Array, mediaType: string) => this.transcribe(image, mediaType),
      logger,
      { timeout: 120_000 },
    );
  }

  async extractText(image: Uint8Array, mediaType: string): Promise<string> {
    try {
      return await this.breaker.fire(image, mediaType);
    } catch (error: unknown) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(`OCR failed: ${messageOf(error)}`, { cause: error });
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async transcribe(image: Uint8Array, mediaType: string): Promise<string> {
    const result = await this.chat.complete({
      model: this.model,
      user: [
        { type: "text", text: OCR_PROMPT },
        {
          type: "image_url",
          image_url: { url: `data:${mediaType};base64,${Buffer.from(image).toString("base64")}` },
        },
      ],
      schema: transcriptionSchema,
      schemaName: "page_transcription",
    });
    return result.content;
  }
}
