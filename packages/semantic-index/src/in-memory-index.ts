import { tokenize } from "@hybridrag/chunker";
import type { ISemanticIndex, PassageMetadata, SemanticHit } from "./semantic-index.interface.js";

interface StoredPassage {
  id: string;
  text: string;
  metadata: PassageMetadata;
  tokens: ReadonlySet<string>;
}

/**
 * Process-local index scored by lexical overlap: the share of distinct
 * question tokens that occur in the passage. Passages sharing no token are
 * never returned.
 */
export class InMemorySemanticIndex implements ISemanticIndex {
  readonly backend = "memory";
  private readonly passages = new Map<string, StoredPassage>();

  async initialize(): Promise<void> {
    // nothing to provision
  }

  async add(id: string, text: string, metadata: PassageMetadata): Promise<void> {
    this.passages.set(id, { id, text, metadata: { ...metadata }, tokens: new Set(tokenize(text)) });
  }

  async query(text: string, k: number): Promise<SemanticHit[]> {
    const queryTokens = new Set(tokenize(text));
    if (queryTokens.size === 0 || k <= 0) return [];

    const hits: SemanticHit[] = [];
    for (const passage of this.passages.values()) {
      let shared = 0;
      for (const token of queryTokens) {
        if (passage.tokens.has(token)) shared++;
      }
      if (shared === 0) continue;

      hits.push({
        id: passage.id,
        text: passage.text,
        metadata: { ...passage.metadata },
        score: shared / queryTokens.size,
      });
    }

    return hits.sort((a, b) => b.score - a.score).slice(0, k);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.passages.size;
  }
}
