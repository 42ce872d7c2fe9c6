import type { RelationshipIndexStats, Triple } from "@hybridrag/types";

/**
 * Entity graph. Nodes are unique by name, edges by (subject, predicate, object),
 * so merging the same fact twice leaves the graph unchanged.
 */
export interface IRelationshipIndex {
  readonly backend: string;

  mergeNode(name: string): Promise<void>;
  /** Both endpoints are created when missing. */
  mergeEdge(subject: string, predicate: string, object: string): Promise<void>;
  /**
   * Edges whose subject or object shares at least one token with `keywords`
   * (see `tokenize`). An empty keyword list matches nothing.
   */
  match(keywords: readonly string[]): Promise<Triple[]>;
  stats(): Promise<RelationshipIndexStats>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
