import type { RelationshipIndexStats, Triple } from "@hybridrag/types";
import { tokenize } from "@hybridrag/chunker";
import type { IRelationshipIndex } from "./relationship-index.interface.js";

function edgeKey(subject: string, predicate: string, object: string): string {
  return JSON.stringify([subject, predicate, object]);
}

export class InMemoryRelationshipIndex implements IRelationshipIndex {
  readonly backend = "memory";
  private readonly nodes = new Map<string, ReadonlySet<string>>();
  private readonly edges = new Map<string, Triple>();

  async mergeNode(name: string): Promise<void> {
    this.addNode(name);
  }

  async mergeEdge(subject: string, predicate: string, object: string): Promise<void> {
    this.addNode(subject);
    this.addNode(object);

    const key = edgeKey(subject, predicate, object);
    if (!this.edges.has(key)) {
      this.edges.set(key, { subject, predicate, object });
    }
  }

  private addNode(name: string): void {
    if (!this.nodes.has(name)) {
      this.nodes.set(name, new Set(tokenize(name)));
    }
  }

  async match(keywords: readonly string[]): Promise<Triple[]> {
    const wanted = new Set(keywords);
    if (wanted.size === 0) return [];

    const mentions = (name: string): boolean => {
      const tokens = this.nodes.get(name);
      if (!tokens) return false;
      for (const token of tokens) {
        if (wanted.has(token)) return true;
      }
      return false;
    };

    return [...this.edges.values()].filter(
      (edge) => mentions(edge.subject) || mentions(edge.object),
    );
  }

  async stats(): Promise<RelationshipIndexStats> {
    return { nodes: this.nodes.size, edges: this.edges.size };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.nodes.clear();
    this.edges.clear();
  }
}
