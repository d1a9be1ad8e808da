import { ExtractionError, UnsupportedMediaTypeError, messageOf } from "@ragsync/errors";
import type {
  ExtractionInput,
  ExtractionResult,
  IExtractor,
  MediaKind,
} from "./extractor.interface.js";
import { resolveMediaKind } from "./media-types.js";

const MAX_NESTING = 3;

export function toExtractionError(error: unknown, input: Pick<ExtractionInput, "fileName" | "mediaType">) {
  if (error instanceof ExtractionError) return error;
  return new ExtractionError(`Failed to extract ${input.fileName ?? input.mediaType}: ${messageOf(error)}`, {
    cause: error,
    details: { fileName: input.fileName, mediaType: input.mediaType },
  });
}

/**
 * Media-kind → extractor table. Unknown types and extractor failures come back
 * as `failures`; `extract` never throws.
 */
export class ExtractorRegistry {
  private readonly extractors = new Map<MediaKind, IExtractor>();

  register(extractor: IExtractor): this {
    this.extractors.set(extractor.kind, extractor);
    return this;
  }

  kinds(): MediaKind[] {
    return [...this.extractors.keys()];
  }

  resolve(mediaType: string, fileName?: string): IExtractor | undefined {
    const kind = resolveMediaKind(mediaType, fileName);
    return kind ? this.extractors.get(kind) : undefined;
  }

  extract(input: ExtractionInput): Promise<ExtractionResult> {
    return this.extractAt(input, 0);
  }

  private async extractAt(input: ExtractionInput, depth: number): Promise<ExtractionResult> {
    const extractor = this.resolve(input.mediaType, input.fileName);
    if (!extractor) {
      const error = new UnsupportedMediaTypeError(input.mediaType || input.fileName || "unknown");
      return { items: [], failures: [{ error, fileName: input.fileName }] };
    }

    if (depth > MAX_NESTING) {
      const error = new ExtractionError(`Nested content too deep in ${input.fileName ?? input.mediaType}`);
      return { items: [], failures: [{ error, fileName: input.fileName }] };
    }

    try {
      const result = await extractor.extract(input, {
        dispatch: (nested) => this.extractAt(nested, depth + 1),
      });
      return {
        items: result.items.map((item) => ({
          ...item,
          metadata: { mimeType: input.mediaType, ...item.metadata },
        })),
        failures: result.failures,
      };
    } catch (error: unknown) {
      return { items: [], failures: [{ error: toExtractionError(error, input), fileName: input.fileName }] };
    }
  }
}
