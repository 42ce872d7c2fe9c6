export { FileDocumentSource } from "./document-source.js";
export type { IDocumentSource } from "./document-source.js";

export { ingest, INGESTION_SUCCESS_MESSAGE } from "./ingestion-orchestrator.js";
export type { IngestionDependencies, IngestionHooks } from "./ingestion-orchestrator.js";

export {
  KeywordQueryRouter,
  GenerativeQueryRouter,
  createQueryRouter,
  buildRoutingPrompt,
  parseRoutingReply,
  DEFAULT_RELATIONAL_INDICATORS,
  DEFAULT_SEMANTIC_INDICATORS,
} from "./query-router.js";
export type {
  IQueryRouter,
  KeywordRouterOptions,
  GenerativeRouterOptions,
  RouterFactoryOptions,
} from "./query-router.js";

export { retrieveSemantic, retrieveRelational } from "./retrieval.js";
export { assemblePassages, assembleFacts, formatFact } from "./context-assembler.js";

export {
  composeAnswer,
  buildSemanticPrompt,
  buildRelationalPrompt,
  NO_INFORMATION,
  NO_RELATIONSHIPS,
} from "./answer-composer.js";
export type { AnswerDependencies } from "./answer-composer.js";

export { answerQuestion, checkHealth } from "./hybrid-rag.js";
export type { QueryDependencies, HealthDependencies } from "./hybrid-rag.js";

export { createHybridRag } from "./container.js";
export type { HybridRag, HybridRagOverrides } from "./container.js";
