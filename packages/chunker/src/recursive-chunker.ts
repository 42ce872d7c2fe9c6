import type { ChunkResult } from "@hybridrag/types";
import { ValidationError } from "@hybridrag/errors";
import type { IChunker } from "./chunker.interface.js";
import { coveringSpan, spanLength, toChunkResults, type Span } from "./offsets.js";

/** Paragraph, line, sentence, word. Add "" to allow a hard character cut. */
export const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " "];

export interface RecursiveChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

/**
 * Fixed-size character windows with overlap, split along a separator hierarchy.
 * Tries larger separators first, falling back to smaller ones. Every piece
 * keeps its trailing separator, so joining the chunks loses only whitespace.
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly separators: string[];

  constructor(options: RecursiveChunkerOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ValidationError("chunkSize must be a positive integer", {
        chunkSize: String(options.chunkSize),
      });
    }
    if (options.chunkOverlap < 0 || options.chunkOverlap >= options.chunkSize) {
      throw new ValidationError("chunkOverlap must be between 0 and chunkSize - 1", {
        chunkOverlap: String(options.chunkOverlap),
      });
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
  }

  chunk(content: string): ChunkResult[] {
    if (content.trim().length === 0) return [];

    const spans = this.splitRecursive(content, { start: 0, end: content.length }, this.separators);
    return toChunkResults(content, spans);
  }

  private splitRecursive(content: string, span: Span, separators: string[]): Span[] {
    const text = content.slice(span.start, span.end);
    const separatorIndex = separators.findIndex((sep) => sep === "" || text.includes(sep));
    if (separatorIndex < 0) {
      // No separator left: keep the run whole, even when it exceeds the window
      return [span];
    }

    const separator = separators[separatorIndex] ?? "";
    const remaining = separators.slice(separatorIndex + 1);
    const splits = splitKeepingSeparator(content, span, separator);

    const results: Span[] = [];
    let pending: Span[] = [];

    for (const split of splits) {
      if (spanLength(split) <= this.chunkSize) {
        pending.push(split);
        continue;
      }

      if (pending.length > 0) {
        results.push(...this.mergeSplits(pending));
        pending = [];
      }

      if (remaining.length === 0) {
        results.push(split);
      } else {
        results.push(...this.splitRecursive(content, split, remaining));
      }
    }

    if (pending.length > 0) {
      results.push(...this.mergeSplits(pending));
    }

    return results;
  }

  /**
   * Pack consecutive splits into windows of at most chunkSize characters,
   * carrying trailing splits of up to chunkOverlap characters into the next window.
   * Splits are contiguous, so each window is a single source range.
   */
  private mergeSplits(splits: Span[]): Span[] {
    const windows: Span[] = [];
    const current: Span[] = [];
    let total = 0;

    const flush = () => {
      const window = coveringSpan(current);
      if (window) windows.push(window);
    };

    for (const split of splits) {
      const length = spanLength(split);

      if (total + length > this.chunkSize && current.length > 0) {
        flush();

        while (
          current.length > 0 &&
          (total > this.chunkOverlap || total + length > this.chunkSize)
        ) {
          const dropped = current.shift();
          total -= dropped ? spanLength(dropped) : 0;
        }
      }

      current.push(split);
      total += length;
    }

    flush();
    return windows;
  }
}

/**
 * Cuts `span` after every occurrence of `separator`, so each piece keeps its
 * trailing separator. The empty separator cuts between code points.
 */
function splitKeepingSeparator(content: string, span: Span, separator: string): Span[] {
  const pieces: Span[] = [];

  if (separator === "") {
    let position = span.start;
    for (const codePoint of content.slice(span.start, span.end)) {
      pieces.push({ start: position, end: position + codePoint.length });
      position += codePoint.length;
    }
    return pieces;
  }

  let position = span.start;
  while (position < span.end) {
    const found = content.indexOf(separator, position);
    if (found < 0 || found + separator.length > span.end) {
      pieces.push({ start: position, end: span.end });
      break;
    }
    const cut = found + separator.length;
    pieces.push({ start: position, end: cut });
    position = cut;
  }

  return pieces;
}
