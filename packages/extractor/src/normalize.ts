import type { Triple } from "@hybridrag/types";

const QUOTES = /["']/g;

function clean(value: string): string {
  return value.replace(QUOTES, "").trim();
}

/**
 * Trim and strip quotes from every part; the predicate is also uppercased
 * with whitespace runs collapsed to "_". Returns null when any part ends up empty.
 */
export function normalizeTriple(subject: string, predicate: string, object: string): Triple | null {
  const normalized: Triple = {
    subject: clean(subject),
    predicate: clean(predicate).replace(/\s+/g, "_").toUpperCase(),
    object: clean(object),
  };

  if (!normalized.subject || !normalized.predicate || !normalized.object) {
    return null;
  }
  return normalized;
}
