import { CohereClient } from "cohere-ai";
import { ExternalServiceError, errorMessage } from "@hybridrag/errors";
import type {
  EmbeddingInputType,
  EmbeddingResult,
  IEmbeddingProvider,
} from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async embed(text: string, inputType: EmbeddingInputType): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(texts: string[], inputType: EmbeddingInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.embedBatch(batch, inputType);

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    if (allEmbeddings.length !== texts.length) {
      throw new ExternalServiceError(
        `Cohere returned ${String(allEmbeddings.length)} embeddings for ${String(texts.length)} texts`,
        "cohere",
      );
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
    };
  }

  private async embedBatch(batch: string[], inputType: EmbeddingInputType) {
    try {
      return await this.client.v2.embed({
        texts: batch,
        model: this.model,
        inputType,
        embeddingTypes: ["float"],
      });
    } catch (error: unknown) {
      throw new ExternalServiceError(`Cohere embedding failed: ${errorMessage(error)}`, "cohere", {
        cause: error,
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check", "search_query");
      return true;
    } catch {
      return false;
    }
  }
}
