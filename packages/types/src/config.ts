import type { ChunkingConfig } from "./chunk.js";
import type { ExtractionStrategy } from "./triple.js";
import type { RoutingStrategy } from "./retrieval.js";

export type SemanticIndexBackend = "memory" | "qdrant";

export type RelationshipIndexBackend = "memory" | "neo4j";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  chunking: ChunkingConfig;
  extraction: ExtractionConfig;
  routing: RoutingConfig;
  answering: AnsweringConfig;
  semanticIndex: SemanticIndexConfig;
  relationshipIndex: RelationshipIndexConfig;
  cohere: CohereConfig;
}

export interface ExtractionConfig {
  strategy: ExtractionStrategy;
}

export interface RoutingConfig {
  strategy: RoutingStrategy;
}

export interface AnsweringConfig {
  topK: number;
  factLimit: number;
}

export interface SemanticIndexConfig {
  backend: SemanticIndexBackend;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collectionName: string;
}

export interface RelationshipIndexConfig {
  backend: RelationshipIndexBackend;
  neo4jUri: string;
  neo4jUser: string;
  neo4jPassword?: string;
}

export interface CohereConfig {
  /** Empty when no generator is configured. */
  apiKey: string;
  chatModel: string;
  embedModel: string;
  maxRetries: number;
}
