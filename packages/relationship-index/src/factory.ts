import type { RelationshipIndexConfig } from "@hybridrag/types";
import { ValidationError } from "@hybridrag/errors";
import type { Logger } from "@hybridrag/logger";
import type { IRelationshipIndex } from "./relationship-index.interface.js";
import { InMemoryRelationshipIndex } from "./in-memory-index.js";
import { Neo4jRelationshipIndex } from "./neo4j-index.js";

export function createRelationshipIndex(
  config: RelationshipIndexConfig,
  logger?: Logger,
): IRelationshipIndex {
  switch (config.backend) {
    case "memory":
      return new InMemoryRelationshipIndex();
    case "neo4j":
      if (!config.neo4jPassword) {
        throw new ValidationError("neo4jPassword is required for the Neo4j relationship index", {
          neo4jPassword: "required",
        });
      }
      return new Neo4jRelationshipIndex({
        uri: config.neo4jUri,
        user: config.neo4jUser,
        password: config.neo4jPassword,
        logger,
      });
    default:
      throw new Error(`Unknown relationship index backend: ${String(config.backend)}`);
  }
}
