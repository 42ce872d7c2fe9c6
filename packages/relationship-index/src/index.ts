export type { IRelationshipIndex } from "./relationship-index.interface.js";
export { InMemoryRelationshipIndex } from "./in-memory-index.js";
export { Neo4jRelationshipIndex, quoteRelationshipType } from "./neo4j-index.js";
export type { Neo4jRelationshipIndexOptions } from "./neo4j-index.js";
export { createRelationshipIndex } from "./factory.js";
