export type ExtractionStrategy = "pattern" | "generative";

/** A normalized (subject, predicate, object) fact. */
export interface Triple {
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
}

export const CANONICAL_PREDICATES = [
  "IS_A",
  "HAS",
  "USES",
  "PROVIDES",
  "INCLUDES",
  "SUPPORTS",
  "RELATES_TO",
] as const;

export type CanonicalPredicate = (typeof CANONICAL_PREDICATES)[number];
