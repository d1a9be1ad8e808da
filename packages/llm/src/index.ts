export { createOpenAIClient } from "./openai-client.js";
export type { OpenAIClientOptions } from "./openai-client.js";
export { OpenAIStructuredChat, toLlmError } from "./structured-chat.js";
export type { IStructuredChat, StructuredRequest, UserContent } from "./structured-chat.js";
export { OpenAIRelevanceClassifier, buildRelevancePrompt } from "./relevance-classifier.js";
export { OpenAIOcrService } from "./ocr-service.js";
