export interface IOcrService {
  extractText(image: Uint8Array, mediaType: string): Promise<string>;
}

/** Throws RateLimitedError when throttled and ClassificationError otherwise. */
export interface IRelevanceClassifier {
  classify(text: string, topics: readonly string[]): Promise<boolean>;
}
