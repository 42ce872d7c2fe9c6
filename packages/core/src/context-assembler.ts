import type { RetrievalResult, Triple } from "@hybridrag/types";

/** Passage texts in rank order, separated by blank lines. */
export function assemblePassages(results: readonly RetrievalResult[]): string {
  return [...results]
    .sort((a, b) => a.rank - b.rank)
    .map((result) => result.content)
    .join("\n\n");
}

/** `• FastAPI has component routers` for (FastAPI, HAS_COMPONENT, routers). */
export function formatFact(triple: Triple): string {
  const predicate = triple.predicate.replace(/_/g, " ").toLowerCase();
  return `• ${triple.subject} ${predicate} ${triple.object}`;
}

/** At most `limit` facts, one bullet per line, in rank order. */
export function assembleFacts(results: readonly RetrievalResult[], limit: number): string {
  return [...results]
    .sort((a, b) => a.rank - b.rank)
    .slice(0, limit)
    .map((result) => result.content)
    .join("\n");
}
