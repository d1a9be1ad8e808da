import type { IOcrService } from "@ragsync/types";
import type { ExtractionInput, ExtractionResult, IExtractor } from "./extractor.interface.js";
import { extensionOf, normalizeMediaType } from "./media-types.js";

const IMAGE_TYPES_BY_EXTENSION: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
  ".gif": "image/gif",
};

export class ImageExtractor implements IExtractor {
  readonly kind = "image";

  constructor(private readonly ocr: IOcrService) {}

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const declared = normalizeMediaType(input.mediaType);
    const mediaType = declared.startsWith("image/")
      ? declared
      : (IMAGE_TYPES_BY_EXTENSION[extensionOf(input.fileName)] ?? "image/png");
    const text = await this.ocr.extractText(input.content, mediaType);
    return { items: [{ text, metadata: { extraction: "ocr" } }], failures: [] };
  }
}
