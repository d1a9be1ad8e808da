export type {
  MediaKind,
  ExtractionInput,
  ExtractedItem,
  ExtractionFailure,
  ExtractionResult,
  ExtractionContext,
  IExtractor,
} from "./extractor.interface.js";
export { ExtractorRegistry, toExtractionError } from "./registry.js";
export { createExtractorRegistry } from "./factory.js";
export type { ExtractorRegistryOptions } from "./factory.js";
export { resolveMediaKind, normalizeMediaType } from "./media-types.js";
export { TextExtractor, HtmlExtractor, CsvExtractor } from "./text-extractor.js";
export { DocxExtractor, SpreadsheetExtractor } from "./office-extractors.js";
export { PdfExtractor, isImageDominant, DEFAULT_IMAGE_AREA_THRESHOLD } from "./pdf-extractor.js";
export { PdfParseReader } from "./pdf-reader.js";
export type { PdfReader, PdfDocument, PdfPage } from "./pdf-reader.js";
export { ImageExtractor } from "./image-extractor.js";
export { CalendarExtractor } from "./calendar-extractor.js";
export { EmailExtractor } from "./email-extractor.js";
export { htmlToText } from "./html.js";
export { csvToMarkdownTable, rowsToMarkdownTable } from "./csv.js";
