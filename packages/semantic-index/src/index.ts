export type {
  ISemanticIndex,
  PassageMetadata,
  SemanticHit,
} from "./semantic-index.interface.js";
export { InMemorySemanticIndex } from "./in-memory-index.js";
export { QdrantSemanticIndex } from "./qdrant-index.js";
export type { QdrantSemanticIndexOptions } from "./qdrant-index.js";
export { createSemanticIndex } from "./factory.js";
export type { SemanticIndexDependencies } from "./factory.js";
