import type { ExtractionInput, ExtractionResult, IExtractor } from "./extractor.interface.js";
import { single } from "./extractor.interface.js";
import { csvToMarkdownTable } from "./csv.js";
import { htmlToText } from "./html.js";

export function decodeText(content: Uint8Array): string {
  return new TextDecoder("utf-8").decode(content);
}

/** Plain text, markdown and JSON, decoded as UTF-8. */
export class TextExtractor implements IExtractor {
  readonly kind = "text";

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    return single(decodeText(input.content));
  }
}

export class HtmlExtractor implements IExtractor {
  readonly kind = "html";

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    return single(htmlToText(decodeText(input.content)));
  }
}

export class CsvExtractor implements IExtractor {
  readonly kind = "csv";

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    return single(csvToMarkdownTable(decodeText(input.content)));
  }
}
