import { describe, it, expect, vi } from "vitest";
import { ExtractionError } from "@ragsync/errors";
import { PdfExtractor, isImageDominant } from "./pdf-extractor.js";
import { createExtractorRegistry } from "./factory.js";
import type { PdfPage, PdfReader } from "./pdf-reader.js";

const LETTER = { width: 612, height: 792 };
const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

function page(pageNumber: number, text: string, imageAreas: number[]): PdfPage {
  return { pageNumber, text, ...LETTER, imageAreas };
}

function fakeReader(pages: PdfPage[]) {
  const document = {
    pages,
    renderPage: vi.fn().mockResolvedValue(PNG),
    close: vi.fn().mockResolvedValue(undefined),
  };
  const reader: PdfReader = { open: vi.fn().mockResolvedValue(document) };
  return { reader, document };
}

const scannedThenNative = () => [page(1, "", [612 * 792]), page(2, "Native text", [100 * 100])];

describe("isImageDominant", () => {
  it("compares the largest image with the page area", () => {
    const pageArea = 612 * 792;
    expect(isImageDominant(page(1, "", [pageArea * 0.7]), 0.7)).toBe(true);
    expect(isImageDominant(page(1, "", [pageArea * 0.69]), 0.7)).toBe(false);
    expect(isImageDominant(page(1, "", []), 0.7)).toBe(false);
  });

  it("never flags pages without geometry", () => {
    expect(isImageDominant({ pageNumber: 1, text: "", width: 0, height: 0, imageAreas: [10] }, 0.7)).toBe(false);
  });
});

describe("PdfExtractor", () => {
  it("sends image-dominant pages to OCR and keeps native text elsewhere", async () => {
    const { reader, document } = fakeReader(scannedThenNative());
    const ocr = { extractText: vi.fn().mockResolvedValue("Scanned text") };

    const result = await new PdfExtractor({ reader, ocr }).extract({
      content: new Uint8Array([1]),
      mediaType: "application/pdf",
    });

    expect(result.items).toEqual([
      { text: "Scanned text", metadata: { page: 1, extraction: "ocr" } },
      { text: "Native text", metadata: { page: 2, extraction: "text" } },
    ]);
    expect(result.failures).toEqual([]);
    expect(ocr.extractText).toHaveBeenCalledOnce();
    expect(ocr.extractText).toHaveBeenCalledWith(PNG, "image/png");
    expect(document.renderPage).toHaveBeenCalledWith(1);
    expect(document.close).toHaveBeenCalledOnce();
  });

  it("honours a custom threshold", async () => {
    const { reader } = fakeReader([page(1, "Mostly text", [612 * 792 * 0.5])]);
    const ocr = { extractText: vi.fn().mockResolvedValue("ocr") };

    const result = await new PdfExtractor({ reader, ocr, imageAreaThreshold: 0.4 }).extract({
      content: new Uint8Array([1]),
      mediaType: "application/pdf",
    });

    expect(result.items[0]?.text).toBe("ocr");
  });

  it("reports a failed page and continues with the rest", async () => {
    const { reader, document } = fakeReader(scannedThenNative());
    const ocr = { extractText: vi.fn().mockRejectedValue(new Error("vision timeout")) };

    const result = await new PdfExtractor({ reader, ocr }).extract({
      content: new Uint8Array([1]),
      mediaType: "application/pdf",
      fileName: "scan.pdf",
    });

    expect(result.items).toEqual([{ text: "Native text", metadata: { page: 2, extraction: "text" } }]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.page).toBe(1);
    expect(result.failures[0]?.fileName).toBe("scan.pdf");
    expect(result.failures[0]?.error).toBeInstanceOf(ExtractionError);
    expect(result.failures[0]?.error.message).toBe("Failed to extract scan.pdf#1: vision timeout");
    expect(document.close).toHaveBeenCalledOnce();
  });

  it("is reachable through the default registry", async () => {
    const { reader } = fakeReader(scannedThenNative());
    const ocr = { extractText: vi.fn().mockResolvedValue("Scanned text") };
    const registry = createExtractorRegistry({ ocr, pdfReader: reader });

    const result = await registry.extract({
      content: new Uint8Array([1]),
      mediaType: "application/octet-stream",
      fileName: "scan.pdf",
    });

    expect(result.items.map((item) => item.metadata)).toEqual([
      { mimeType: "application/octet-stream", page: 1, extraction: "ocr" },
      { mimeType: "application/octet-stream", page: 2, extraction: "text" },
    ]);
  });
});
