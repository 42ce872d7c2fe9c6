export type {
  ChunkStrategy,
  Chunk,
  ChunkMetadata,
  ChunkResult,
  ChunkingConfig,
  RecursiveChunkingConfig,
  ParagraphChunkingConfig,
} from "./chunk.js";

export type { ExtractionStrategy, Triple, CanonicalPredicate } from "./triple.js";
export { CANONICAL_PREDICATES } from "./triple.js";

export type {
  RoutingDecision,
  RoutingStrategy,
  SemanticSource,
  RelationalSource,
  SourceDescriptor,
  RetrievalResult,
  SemanticEvidence,
  RelationalEvidence,
  Evidence,
  ComposedAnswer,
  QuerySuccess,
  QueryFailure,
  QueryResponse,
} from "./retrieval.js";

export type { DocumentRef, LoadedDocument, IngestionStatus, IngestionReport } from "./ingestion.js";

export type {
  StoreHealth,
  GeneratorHealth,
  RelationshipIndexStats,
  HealthStatus,
} from "./health.js";

export type {
  AppConfig,
  SemanticIndexBackend,
  RelationshipIndexBackend,
  ExtractionConfig,
  RoutingConfig,
  AnsweringConfig,
  SemanticIndexConfig,
  RelationshipIndexConfig,
  CohereConfig,
} from "./config.js";
