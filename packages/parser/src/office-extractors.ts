import mammoth from "mammoth";
import { read as readWorkbook, utils as xlsxUtils } from "xlsx";
import type { ExtractionInput, ExtractionResult, IExtractor } from "./extractor.interface.js";
import { single } from "./extractor.interface.js";
import { rowsToMarkdownTable } from "./csv.js";

export class DocxExtractor implements IExtractor {
  readonly kind = "docx";

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const result = await mammoth.extractRawText({ buffer: Buffer.from(input.content) });
    return single(result.value);
  }
}

/** One item per non-empty sheet, rendered as a Markdown table. */
export class SpreadsheetExtractor implements IExtractor {
  readonly kind = "spreadsheet";

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const workbook = readWorkbook(input.content, { type: "array" });
    const items = workbook.SheetNames.flatMap((name) => {
      const sheet = workbook.Sheets[name];
      const rows = sheet
        ? xlsxUtils
            .sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false, defval: "", raw: false })
            .map((row) => row.map((cell) => String(cell ?? "")))
        : [];
      const table = rowsToMarkdownTable(rows);
      return table ? [{ text: `## Sheet: ${name}\n\n${table}`, metadata: { sheet: name }, identity: `sheet-${name}` }] : [];
    });
    return { items, failures: [] };
  }
}
