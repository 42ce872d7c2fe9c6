/** Passages are embedded as documents, questions as queries. */
export type EmbeddingInputType = "search_document" | "search_query";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
}

export interface IEmbeddingProvider {
  readonly name: string;

  embed(text: string, inputType: EmbeddingInputType): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], inputType: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
