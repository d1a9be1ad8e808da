import { describe, it, expect } from "vitest";
import type { SourceDocument } from "@ragsync/types";
import { RecursiveChunker, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
import { Cl100kTokenizer } from "./tokenizer.js";

const tokenizer = new Cl100kTokenizer();

function doc(rawText: string, extra: Partial<SourceDocument["metadata"]> = {}): SourceDocument {
  return {
    rawText,
    partKey: "body",
    metadata: { sourceService: "file", userId: "owner-1", sourceId: "notes.txt", ...extra },
  };
}

/** Longest suffix of `a` (in words) that is also a prefix of `b`. */
function sharedWords(a: string, b: string): string {
  const left = a.split(" ");
  const right = b.split(" ");
  for (let size = Math.min(left.length, right.length); size > 0; size--) {
    const suffix = left.slice(left.length - size).join(" ");
    if (suffix === right.slice(0, size).join(" ")) return suffix;
  }
  return "";
}

/** Longest suffix of `a` that is also a prefix of `b`. */
function sharedText(a: string, b: string): string {
  for (let size = Math.min(a.length, b.length); size > 0; size--) {
    const prefix = b.slice(0, size);
    if (a.endsWith(prefix)) return prefix;
  }
  return "";
}

describe("Cl100kTokenizer", () => {
  it("counts tokens", () => {
    expect(tokenizer.count("hello world")).toBe(2);
    expect(tokenizer.count("")).toBe(0);
  });

  it("treats special-token markers as text", () => {
    expect(tokenizer.count("<|endoftext|>")).toBeGreaterThan(1);
  });
});

describe("RecursiveChunker", () => {
  it("uses the ingestion separator order", () => {
    expect(DEFAULT_SEPARATORS).toEqual(["\n\n", "\n", "\t", "\\n", "\r\n\r\n", " ", ".", ","]);
  });

  it("rejects an overlap as large as the chunk size", () => {
    expect(() => new RecursiveChunker({ maxTokens: 10, overlap: 10 })).toThrow(RangeError);
  });

  it("returns short text as a single chunk with inherited metadata", () => {
    const chunker = new RecursiveChunker({ maxTokens: 100, overlap: 10 });

    const chunks = chunker.split(doc("  Short text  ", { page: 2 }));

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toEqual({
      content: "Short text",
      index: 0,
      tokenCount: 2,
      metadata: {
        sourceService: "file",
        userId: "owner-1",
        sourceId: "notes.txt",
        page: 2,
        chunkIndex: 0,
      },
      identity: undefined,
      partKey: "body",
    });
  });

  it("returns nothing for empty or blank text", () => {
    const chunker = new RecursiveChunker({ maxTokens: 100, overlap: 10 });
    expect(chunker.split(doc(""))).toEqual([]);
    expect(chunker.split(doc(" \n\n "))).toEqual([]);
  });

  it("keeps paragraphs whole and opens each chunk with the previous chunk's tail", () => {
    const paragraphs = [
      "The quick brown fox jumps over the lazy dog",
      "A second paragraph talks about the weather today",
      "Finally the third paragraph closes the short note",
    ];
    const chunker = new RecursiveChunker({ maxTokens: 15, overlap: 3 });

    const chunks = chunker.split(doc(paragraphs.join("\n\n")));

    expect(chunks).toHaveLength(3);
    expect(chunks[0]?.content).toBe(paragraphs[0]);
    expect(chunks[1]?.content.endsWith(`\n\n${paragraphs[1]}`)).toBe(true);
    expect(chunks[2]?.content.endsWith(`\n\n${paragraphs[2]}`)).toBe(true);
    for (let i = 0; i + 1 < chunks.length; i++) {
      const shared = sharedText(chunks[i]?.content ?? "", chunks[i + 1]?.content ?? "");
      expect(tokenizer.count(shared)).toBeGreaterThanOrEqual(3);
    }
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(chunks.map((c) => c.metadata.chunkIndex)).toEqual([0, 1, 2]);
  });

  describe("paragraph boundaries", () => {
    const paragraph = (p: number, words: number) =>
      Array.from({ length: words }, (_, i) => `p${p}w${i}`).join(" ");
    const chunker = new RecursiveChunker({ maxTokens: 60, overlap: 10 });

    function expectOverlapping(chunks: string[]) {
      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(tokenizer.count(chunk)).toBeLessThanOrEqual(60);
      }
      for (let i = 0; i + 1 < chunks.length; i++) {
        expect(tokenizer.count(sharedText(chunks[i] ?? "", chunks[i + 1] ?? ""))).toBeGreaterThanOrEqual(10);
      }
    }

    it("carries the overlap into a paragraph too large to share a chunk", () => {
      const text = [paragraph(0, 10), paragraph(1, 10), paragraph(2, 10)].join("\n\n");
      const chunks = chunker.splitText(text);

      expectOverlapping(chunks);
      expect(chunks[0]?.startsWith("p0w0 ")).toBe(true);
      expect(chunks[chunks.length - 1]?.endsWith(" p2w9")).toBe(true);
    });

    it("carries the overlap across a paragraph that had to be split further", () => {
      const text = [paragraph(0, 6), paragraph(1, 80), paragraph(2, 6)].join("\n\n");
      const chunks = chunker.splitText(text);

      expectOverlapping(chunks);
      for (const word of text.split(/\s+/)) {
        expect(chunks.some((chunk) => chunk.split(/\s+/).includes(word))).toBe(true);
      }
    });
  });

  it("splits on the literal backslash-n escape before spaces", () => {
    const chunker = new RecursiveChunker({ maxTokens: 4, overlap: 0 });

    expect(chunker.splitText("first part\\nsecond part")).toEqual(["first part", "second part"]);
  });

  describe("long text", () => {
    const words = Array.from({ length: 400 }, (_, i) => `w${i}`);
    const chunker = new RecursiveChunker({ maxTokens: 50, overlap: 10 });
    const chunks = chunker.split(doc(words.join(" ")));

    it("produces several chunks within the token bound", () => {
      expect(chunks.length).toBeGreaterThan(1);
      for (const chunk of chunks) {
        expect(tokenizer.count(chunk.content)).toBeLessThanOrEqual(50);
        expect(chunk.tokenCount).toBe(tokenizer.count(chunk.content));
      }
    });

    it("covers the text from first to last word", () => {
      expect(chunks[0]?.content.startsWith("w0 w1 ")).toBe(true);
      expect(chunks[chunks.length - 1]?.content.endsWith(" w398 w399")).toBe(true);
    });

    it("overlaps adjacent chunks by at least the configured tokens", () => {
      for (let i = 0; i + 1 < chunks.length; i++) {
        const shared = sharedWords(chunks[i]?.content ?? "", chunks[i + 1]?.content ?? "");
        expect(tokenizer.count(shared)).toBeGreaterThanOrEqual(10);
      }
    });

    it("numbers chunks from zero", () => {
      expect(chunks.map((c) => c.index)).toEqual(chunks.map((_, i) => i));
    });
  });

  it("splits unbroken text on code points without breaking characters", () => {
    const chunker = new RecursiveChunker({ maxTokens: 20, overlap: 0 });

    const chunks = chunker.splitText("😀".repeat(300));

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(tokenizer.count(chunk)).toBeLessThanOrEqual(20);
      expect(Array.from(chunk).every((ch) => ch === "😀")).toBe(true);
    }
    expect(chunks.join("")).toBe("😀".repeat(300));
  });
});
