import OpenAI from "openai";

export interface OpenAIClientOptions {
  apiKey: string;
  /** OpenAI-compatible gateway; defaults to the public API. */
  baseUrl?: string;
  timeoutMs?: number;
}

export function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    timeout: options.timeoutMs ?? 120_000,
    // retries are owned by the pipeline
    maxRetries: 0,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });
}
