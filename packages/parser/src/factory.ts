import type { IOcrService } from "@ragsync/types";
import { ExtractorRegistry } from "./registry.js";
import { TextExtractor, HtmlExtractor, CsvExtractor } from "./text-extractor.js";
import { DocxExtractor, SpreadsheetExtractor } from "./office-extractors.js";
import { PdfExtractor } from "./pdf-extractor.js";
import { PdfParseReader, type PdfReader } from "./pdf-reader.js";
import { ImageExtractor } from "./image-extractor.js";
import { CalendarExtractor } from "./calendar-extractor.js";
import { EmailExtractor } from "./email-extractor.js";

export interface ExtractorRegistryOptions {
  ocr: IOcrService;
  imageAreaThreshold?: number;
  pdfReader?: PdfReader;
}

/**
 * Registry with every built-in extractor.
 */
export function createExtractorRegistry(options: ExtractorRegistryOptions): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(new TextExtractor())
    .register(new HtmlExtractor())
    .register(new CsvExtractor())
    .register(new DocxExtractor())
    .register(new SpreadsheetExtractor())
    .register(
      new PdfExtractor({
        reader: options.pdfReader ?? new PdfParseReader(),
        ocr: options.ocr,
        imageAreaThreshold: options.imageAreaThreshold,
      }),
    )
    .register(new ImageExtractor(options.ocr))
    .register(new CalendarExtractor())
    .register(new EmailExtractor());
}
