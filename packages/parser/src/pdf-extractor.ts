import type { IOcrService } from "@ragsync/types";
import type { ExtractionFailure, ExtractionInput, ExtractedItem, ExtractionResult, IExtractor } from "./extractor.interface.js";
import type { PdfPage, PdfReader } from "./pdf-reader.js";
import { toExtractionError } from "./registry.js";

export const DEFAULT_IMAGE_AREA_THRESHOLD = 0.7;

/** A page is image-dominant when one embedded image covers `threshold` of the page area. */
export function isImageDominant(page: PdfPage, threshold: number): boolean {
  const pageArea = page.width * page.height;
  if (pageArea <= 0) return false;
  return page.imageAreas.some((area) => area >= threshold * pageArea);
}

export interface PdfExtractorOptions {
  reader: PdfReader;
  ocr: IOcrService;
  imageAreaThreshold?: number;
}

/**
 * One item per page. Scanned pages go through OCR, the rest use the embedded
 * text layer. A failed page is reported and skipped.
 */
export class PdfExtractor implements IExtractor {
  readonly kind = "pdf";
  private readonly threshold: number;

  constructor(private readonly options: PdfExtractorOptions) {
    this.threshold = options.imageAreaThreshold ?? DEFAULT_IMAGE_AREA_THRESHOLD;
  }

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const document = await this.options.reader.open(input.content);
    const items: ExtractedItem[] = [];
    const failures: ExtractionFailure[] = [];

    try {
      for (const page of document.pages) {
        try {
          if (isImageDominant(page, this.threshold)) {
            const image = await document.renderPage(page.pageNumber);
            const text = await this.options.ocr.extractText(image, "image/png");
            items.push({ text, metadata: { page: page.pageNumber, extraction: "ocr" } });
          } else {
            items.push({ text: page.text, metadata: { page: page.pageNumber, extraction: "text" } });
          }
        } catch (error: unknown) {
          failures.push({
            error: toExtractionError(error, { ...input, fileName: `${input.fileName ?? "document.pdf"}#${page.pageNumber}` }),
            fileName: input.fileName,
            page: page.pageNumber,
          });
        }
      }
    } finally {
      await document.close();
    }

    return { items, failures };
  }
}
