import type { ChunkResult } from "@hybridrag/types";
import { ValidationError } from "@hybridrag/errors";
import type { IChunker } from "./chunker.interface.js";
import { spanLength, toChunkResults, trimSpan, type Span } from "./offsets.js";

const PARAGRAPH_REGEX = /\n\s*\n/g;
const SENTENCE_REGEX = /(?<=[.!?])\s+(?=[A-Z])/g;

export const DEFAULT_MIN_LENGTH = 50;
export const DEFAULT_MAX_LENGTH = 500;

export interface ParagraphChunkerOptions {
  minLength?: number;
  maxLength?: number;
}

/**
 * Structural splitting on blank lines.
 * Paragraphs shorter than minLength are dropped as noise; paragraphs longer
 * than maxLength are re-split by packing whole sentences up to maxLength.
 * Chunk content is always the exact source text between its offsets.
 */
export class ParagraphChunker implements IChunker {
  readonly strategy = "paragraph";
  private readonly minLength: number;
  private readonly maxLength: number;

  constructor(options: ParagraphChunkerOptions = {}) {
    this.minLength = options.minLength ?? DEFAULT_MIN_LENGTH;
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;

    if (this.maxLength <= 0 || this.minLength > this.maxLength) {
      throw new ValidationError("minLength must not exceed a positive maxLength", {
        minLength: String(this.minLength),
        maxLength: String(this.maxLength),
      });
    }
  }

  chunk(content: string): ChunkResult[] {
    const spans: Span[] = [];

    for (const raw of splitOn(content, { start: 0, end: content.length }, PARAGRAPH_REGEX)) {
      const paragraph = trimSpan(content, raw);
      if (!paragraph || spanLength(paragraph) < this.minLength) continue;

      if (spanLength(paragraph) <= this.maxLength) {
        spans.push(paragraph);
      } else {
        spans.push(...this.packSentences(content, paragraph));
      }
    }

    return toChunkResults(content, spans);
  }

  private packSentences(content: string, paragraph: Span): Span[] {
    const packed: Span[] = [];
    let current: Span | null = null;

    for (const raw of splitOn(content, paragraph, SENTENCE_REGEX)) {
      const sentence = trimSpan(content, raw);
      if (!sentence) continue;

      if (!current) {
        current = sentence;
      } else if (sentence.end - current.start > this.maxLength) {
        packed.push(current);
        current = sentence;
      } else {
        current = { start: current.start, end: sentence.end };
      }
    }

    if (current) {
      packed.push(current);
    }

    return packed;
  }
}

/** Spans between the matches of a global `pattern` inside `span`. */
function splitOn(content: string, span: Span, pattern: RegExp): Span[] {
  const text = content.slice(span.start, span.end);
  const spans: Span[] = [];
  let position = 0;

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    spans.push({ start: span.start + position, end: span.start + index });
    position = index + match[0].length;
  }

  spans.push({ start: span.start + position, end: span.end });
  return spans;
}
