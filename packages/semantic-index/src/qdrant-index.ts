import { QdrantClient } from "@qdrant/js-client-rest";
import type { IEmbeddingProvider } from "@hybridrag/embeddings";
import { ExternalServiceError, StoreWriteError, errorMessage } from "@hybridrag/errors";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { ISemanticIndex, PassageMetadata, SemanticHit } from "./semantic-index.interface.js";

const DIMENSION_PROBE = "dimension probe";

export interface QdrantSemanticIndexOptions {
  url: string;
  apiKey?: string;
  collectionName: string;
  embeddings: IEmbeddingProvider;
  logger?: Logger;
}

type Payload = Record<string, unknown> | null | undefined;

function toHit(id: string | number, score: number, payload: Payload): SemanticHit | null {
  const text = payload?.["text"];
  const source = payload?.["source"];
  const sequenceIndex = payload?.["sequenceIndex"];

  if (typeof text !== "string" || typeof source !== "string" || typeof sequenceIndex !== "number") {
    return null;
  }
  return { id: String(id), text, metadata: { source, sequenceIndex }, score };
}

/**
 * Passages embedded with Cohere and stored in a Qdrant collection under
 * cosine distance. Point ids must be UUIDs.
 */
export class QdrantSemanticIndex implements ISemanticIndex {
  readonly backend = "qdrant";
  private readonly client: QdrantClient;
  private readonly collectionName: string;
  private readonly embeddings: IEmbeddingProvider;
  private readonly logger: Logger;

  constructor(options: QdrantSemanticIndexOptions) {
    this.client = new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.collectionName = options.collectionName;
    this.embeddings = options.embeddings;
    this.logger = options.logger ?? createSilentLogger();
  }

  async initialize(): Promise<void> {
    const { collections } = await this.client.getCollections();
    if (collections.some((c) => c.name === this.collectionName)) {
      this.logger.debug({ collection: this.collectionName }, "collection already exists");
      return;
    }

    const probe = await this.embeddings.embed(DIMENSION_PROBE, "search_document");
    const size = probe.embeddings[0]?.length;
    if (!size) {
      throw new ExternalServiceError("Embedding provider returned an empty vector", this.embeddings.name);
    }

    await this.client.createCollection(this.collectionName, {
      vectors: { size, distance: "Cosine" },
    });
    await this.client.createPayloadIndex(this.collectionName, {
      field_name: "source",
      field_schema: "keyword",
    });

    this.logger.info({ collection: this.collectionName, dimensions: size }, "created collection");
  }

  async add(id: string, text: string, metadata: PassageMetadata): Promise<void> {
    const { embeddings } = await this.embeddings.embed(text, "search_document");
    const vector = embeddings[0];
    if (!vector) {
      throw new ExternalServiceError("Embedding provider returned no vector", this.embeddings.name);
    }

    try {
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: [
          {
            id,
            vector,
            payload: { text, source: metadata.source, sequenceIndex: metadata.sequenceIndex },
          },
        ],
      });
    } catch (error: unknown) {
      throw new StoreWriteError(`Qdrant upsert failed: ${errorMessage(error)}`, "semantic-index", {
        cause: error,
        details: { collection: this.collectionName, id },
      });
    }
  }

  async query(text: string, k: number): Promise<SemanticHit[]> {
    if (k <= 0) return [];

    const { embeddings } = await this.embeddings.embed(text, "search_query");
    const vector = embeddings[0];
    if (!vector) return [];

    const results = await this.client.search(this.collectionName, {
      vector,
      limit: k,
      with_payload: true,
    });

    const hits: SemanticHit[] = [];
    for (const result of results) {
      const hit = toHit(result.id, result.score, result.payload);
      if (hit) {
        hits.push(hit);
      } else {
        this.logger.warn({ id: result.id }, "skipping point with malformed payload");
      }
    }
    return hits;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch (error: unknown) {
      this.logger.debug({ err: errorMessage(error) }, "qdrant health check failed");
      return false;
    }
  }
}
