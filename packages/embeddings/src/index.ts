export type {
  IEmbeddingProvider,
  EmbeddingInputType,
  EmbeddingResult,
} from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
