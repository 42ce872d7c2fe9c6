import type { ExtractionStrategy, Triple } from "@hybridrag/types";

export interface IRelationExtractor {
  readonly strategy: ExtractionStrategy;

  /**
   * Never rejects: a failure inside one chunk yields no triples for that chunk.
   * Order is not significant and duplicates are allowed.
   */
  extract(text: string): Promise<Triple[]>;
}
