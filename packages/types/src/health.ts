export type StoreHealth = "connected" | "disconnected";

export type GeneratorHealth = "loaded" | "not_configured" | "unreachable";

export interface RelationshipIndexStats {
  nodes: number;
  edges: number;
}

export interface HealthStatus {
  status: "healthy" | "degraded";
  components: {
    semanticIndex: StoreHealth;
    relationshipIndex: StoreHealth;
    generator: GeneratorHealth;
  };
  relationshipIndexStats?: RelationshipIndexStats;
}
