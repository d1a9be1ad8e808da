export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider, toEmbeddingError } from "./cohere-provider.js";
export type { CohereProviderConfig, CohereEmbedApi } from "./cohere-provider.js";
