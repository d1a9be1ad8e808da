import { PDFParse } from "pdf-parse";

export interface PdfPage {
  /** 1-based. */
  pageNumber: number;
  text: string;
  width: number;
  height: number;
  /** Pixel area of each embedded image. */
  imageAreas: number[];
}

export interface PdfDocument {
  readonly pages: PdfPage[];
  /** Rasterizes one page to PNG. */
  renderPage(pageNumber: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface PdfReader {
  open(content: Uint8Array): Promise<PdfDocument>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function listOf(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function numberOf(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function pageNumberOf(page: Record<string, unknown>): number {
  return numberOf(page["pageNumber"] ?? page["num"]);
}

/** Result pages keyed by page number. */
function pagesOf(result: unknown): Map<number, Record<string, unknown>> {
  const pages = new Map<number, Record<string, unknown>>();
  if (!isRecord(result)) return pages;
  for (const page of listOf(result["pages"])) {
    if (isRecord(page)) pages.set(pageNumberOf(page), page);
  }
  return pages;
}

/**
 * pdf-parse backed reader. Text, page geometry and embedded images are read
 * up front; pages are rendered on demand until `close`.
 */
export class PdfParseReader implements PdfReader {
  async open(content: Uint8Array): Promise<PdfDocument> {
    const parser = new PDFParse({ data: content });

    try {
      const texts = pagesOf(await parser.getText());
      const infos = pagesOf(await parser.getInfo({ parsePageInfo: true }));
      const images = pagesOf(await parser.getImage());

      const pages: PdfPage[] = [...texts.entries()]
        .sort(([a], [b]) => a - b)
        .map(([pageNumber, page]) => {
          const info = infos.get(pageNumber);
          return {
            pageNumber,
            text: typeof page["text"] === "string" ? page["text"] : "",
            width: numberOf(info?.["width"]),
            height: numberOf(info?.["height"]),
            imageAreas: listOf(images.get(pageNumber)?.["images"])
              .filter(isRecord)
              .map((image) => numberOf(image["width"]) * numberOf(image["height"])),
          };
        });

      return {
        pages,
        async renderPage(pageNumber: number): Promise<Uint8Array> {
          const shot = pagesOf(await parser.getScreenshot({ partial: [pageNumber], scale: 2 })).get(pageNumber);
          const data = shot?.["data"];
          if (!(data instanceof Uint8Array)) {
            throw new Error(`Page ${pageNumber} could not be rendered`);
          }
          return data;
        },
        close: () => parser.destroy(),
      };
    } catch (error: unknown) {
      await parser.destroy();
      throw error;
    }
  }
}
