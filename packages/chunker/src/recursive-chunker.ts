import type { ChunkDraft, ChunkingConfig, SourceDocument } from "@ragsync/types";
import type { IChunker } from "./chunker.interface.js";
import { Cl100kTokenizer, type ITokenizer } from "./tokenizer.js";

/** `"\\n"` matches the literal two-character escape left in exported text. */
export const DEFAULT_SEPARATORS = ["\n\n", "\n", "\t", "\\n", "\r\n\r\n", " ", ".", ","];

/** Room kept beside the carried tail for the joining separator. */
const TAIL_SLACK = 3;

interface Piece {
  text: string;
  /** Separator that preceded the piece in the source text. */
  sep: string;
  /** Tokens when the piece opens a chunk. */
  bare: number;
  /** Tokens when the piece follows its separator. */
  joined: number;
}

interface Fill {
  text: string;
  next: number;
}

/**
 * Recursive splitting with a separator hierarchy, measured in tokens.
 *
 * The text is cut into pieces small enough to sit beside an overlap tail,
 * using the first separator present and recursing into finer ones; text with
 * no separator left is cut on code points. Pieces are then packed greedily
 * across the whole document, and every chunk after the first opens with the
 * previous chunk's trailing `overlap` tokens.
 */
export class RecursiveChunker implements IChunker {
  private readonly maxTokens: number;
  private readonly overlap: number;
  private readonly pieceBudget: number;
  private readonly separators: string[];

  constructor(
    config: ChunkingConfig,
    private readonly tokenizer: ITokenizer = new Cl100kTokenizer(),
  ) {
    if (config.overlap >= config.maxTokens) {
      throw new RangeError("Chunk overlap must be smaller than the chunk size");
    }
    this.maxTokens = config.maxTokens;
    this.overlap = config.overlap;
    this.pieceBudget =
      config.overlap > 0 ? Math.max(1, config.maxTokens - config.overlap - TAIL_SLACK) : config.maxTokens;
    this.separators = config.separators ?? DEFAULT_SEPARATORS;
  }

  split(document: SourceDocument): ChunkDraft[] {
    return this.splitText(document.rawText).map((content, index) => ({
      content,
      index,
      tokenCount: this.tokenizer.count(content),
      metadata: { ...document.metadata, chunkIndex: index },
      identity: document.identity,
      partKey: document.partKey,
    }));
  }

  splitText(text: string): string[] {
    if (this.tokenizer.count(text) <= this.maxTokens) {
      const trimmed = text.trim();
      return trimmed.length > 0 ? [trimmed] : [];
    }
    return this.pack(this.cut(text, this.separators, ""));
  }

  private cut(text: string, separators: string[], lead: string): Piece[] {
    if (this.tokenizer.count(text) <= this.pieceBudget) {
      return [this.measure(text, lead)];
    }

    const index = separators.findIndex((candidate) => candidate.length > 0 && text.includes(candidate));
    const separator = separators[index];
    if (separator === undefined) {
      return this.cutCodePoints(text, lead);
    }

    const finer = separators.slice(index + 1);
    const pieces: Piece[] = [];
    text
      .split(separator)
      .filter((part) => part.length > 0)
      .forEach((part, i) => {
        pieces.push(...this.cut(part, finer, i === 0 ? lead : separator));
      });
    return pieces;
  }

  /** Longest runs of whole code points that fit the piece budget. */
  private cutCodePoints(text: string, lead: string): Piece[] {
    const points = Array.from(text);
    const pieces: Piece[] = [];
    let start = 0;

    while (start < points.length) {
      let lo = start + 1;
      let hi = points.length;
      while (lo < hi) {
        const mid = Math.ceil((lo + hi) / 2);
        if (this.tokenizer.count(points.slice(start, mid).join("")) <= this.pieceBudget) {
          lo = mid;
        } else {
          hi = mid - 1;
        }
      }
      pieces.push(this.measure(points.slice(start, lo).join(""), start === 0 ? lead : ""));
      start = lo;
    }
    return pieces;
  }

  private pack(pieces: Piece[]): string[] {
    const chunks: string[] = [];
    let start = 0;

    while (start < pieces.length) {
      const previous = chunks[chunks.length - 1];
      const { text, next } = this.fill(pieces, start, previous);
      if (text.length > 0) chunks.push(text);
      start = next;
    }
    return chunks;
  }

  private fill(pieces: Piece[], start: number, previous: string | undefined): Fill {
    const tails = previous !== undefined && this.overlap > 0 ? this.tails(previous) : [];
    for (const tail of [...tails, ""]) {
      const filled = this.fillFrom(pieces, start, tail);
      if (filled.next > start) return filled;
    }
    // a single code point wider than the bound
    const piece = pieces[start];
    return { text: piece ? piece.text.trim() : "", next: start + 1 };
  }

  /**
   * Packs pieces after `tail` while the estimate fits, then drops trailing
   * pieces until the exact count does. `next === start` means nothing fit.
   */
  private fillFrom(pieces: Piece[], start: number, tail: string): Fill {
    const parts: string[] = [];
    let cost = tail.length > 0 ? this.tokenizer.count(tail) : 0;
    let end = start;

    for (; end < pieces.length; end++) {
      const piece = pieces[end];
      if (!piece) break;
      const opening = tail.length === 0 && parts.length === 0;
      const add = opening ? piece.bare : piece.joined;
      if (cost + add > this.maxTokens) break;
      parts.push(opening ? piece.text : piece.sep + piece.text);
      cost += add;
    }

    while (parts.length > 0 && this.tokenizer.count((tail + parts.join("")).trim()) > this.maxTokens) {
      parts.pop();
      end--;
    }
    if (parts.length === 0) return { text: "", next: start };

    const body = parts.join("");
    // whitespace-only remainder adds nothing beyond the carried tail
    return { text: body.trim().length > 0 ? (tail + body).trim() : "", next: end };
  }

  /**
   * Candidate openings for the next chunk: the previous chunk's shortest
   * suffix worth at least `overlap` tokens, widened to a word boundary when
   * that stays within twice the overlap.
   */
  private tails(previous: string): string[] {
    if (this.tokenizer.count(previous) <= this.overlap) return [previous];

    const offsets: number[] = [];
    let offset = 0;
    for (const point of previous) {
      offsets.push(offset);
      offset += point.length;
    }

    const suffix = (at: number) => previous.slice(at).trimStart();
    let lo = 0;
    let hi = offsets.length;
    while (hi - lo > 1) {
      const mid = Math.floor((lo + hi) / 2);
      if (this.tokenizer.count(suffix(offsets[mid] ?? 0)) >= this.overlap) {
        lo = mid;
      } else {
        hi = mid;
      }
    }

    const cutAt = offsets[lo] ?? 0;
    const exact = suffix(cutAt);
    let wordStart = cutAt;
    while (wordStart > 0 && !/\s/.test(previous.charAt(wordStart - 1))) wordStart--;
    const word = suffix(wordStart);

    if (word === exact || this.tokenizer.count(word) > 2 * this.overlap) return [exact];
    return [word, exact];
  }

  private measure(text: string, sep: string): Piece {
    const bare = this.tokenizer.count(text);
    return { text, sep, bare, joined: sep === "" ? bare : this.tokenizer.count(sep + text) };
  }
}
