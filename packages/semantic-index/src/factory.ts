import type { SemanticIndexConfig } from "@hybridrag/types";
import type { IEmbeddingProvider } from "@hybridrag/embeddings";
import { ValidationError } from "@hybridrag/errors";
import type { Logger } from "@hybridrag/logger";
import type { ISemanticIndex } from "./semantic-index.interface.js";
import { InMemorySemanticIndex } from "./in-memory-index.js";
import { QdrantSemanticIndex } from "./qdrant-index.js";

export interface SemanticIndexDependencies {
  embeddings: IEmbeddingProvider | null;
  logger?: Logger;
}

export function createSemanticIndex(
  config: SemanticIndexConfig,
  deps: SemanticIndexDependencies,
): ISemanticIndex {
  switch (config.backend) {
    case "memory":
      return new InMemorySemanticIndex();
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ValidationError("qdrantUrl is required for the Qdrant semantic index", {
          qdrantUrl: "required",
        });
      }
      if (!deps.embeddings) {
        throw new ValidationError("An embedding provider is required for the Qdrant semantic index", {
          embeddings: "required",
        });
      }
      return new QdrantSemanticIndex({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collectionName: config.collectionName,
        embeddings: deps.embeddings,
        logger: deps.logger,
      });
    default:
      throw new Error(`Unknown semantic index backend: ${String(config.backend)}`);
  }
}
