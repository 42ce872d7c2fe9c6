import type { ChunkResult } from "@hybridrag/types";

/** Half-open character range into the source text. */
export interface Span {
  start: number;
  end: number;
}

const WHITESPACE = /\s/;

export function spanLength(span: Span): number {
  return span.end - span.start;
}

/** Narrows a span past leading and trailing whitespace; null when nothing is left. */
export function trimSpan(content: string, span: Span): Span | null {
  let { start, end } = span;
  while (start < end && WHITESPACE.test(content.charAt(start))) start++;
  while (end > start && WHITESPACE.test(content.charAt(end - 1))) end--;
  return start < end ? { start, end } : null;
}

/** The range from the first span's start to the last span's end. */
export function coveringSpan(spans: readonly Span[]): Span | null {
  const first = spans[0];
  const last = spans[spans.length - 1];
  return first && last ? { start: first.start, end: last.end } : null;
}

/**
 * Trimmed, non-empty spans become chunks whose content is exactly the
 * source text between their offsets.
 */
export function toChunkResults(content: string, spans: readonly Span[]): ChunkResult[] {
  const results: ChunkResult[] = [];

  for (const span of spans) {
    const trimmed = trimSpan(content, span);
    if (!trimmed) continue;

    results.push({
      content: content.slice(trimmed.start, trimmed.end),
      index: results.length,
      metadata: { startChar: trimmed.start, endChar: trimmed.end },
    });
  }

  return results;
}
