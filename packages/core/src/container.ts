import type { AppConfig, DocumentRef, HealthStatus, IngestionReport, QueryResponse } from "@hybridrag/types";
import { createChunker, type IChunker } from "@hybridrag/chunker";
import { CohereEmbeddingProvider, type IEmbeddingProvider } from "@hybridrag/embeddings";
import { createRelationExtractor, type IRelationExtractor } from "@hybridrag/extractor";
import { createTextGenerator, type ITextGenerator } from "@hybridrag/generator";
import { createChildLogger, type Logger } from "@hybridrag/logger";
import { createSemanticIndex, type ISemanticIndex } from "@hybridrag/semantic-index";
import { createRelationshipIndex, type IRelationshipIndex } from "@hybridrag/relationship-index";
import { FileDocumentSource, type IDocumentSource } from "./document-source.js";
import { createQueryRouter, type IQueryRouter } from "./query-router.js";
import { ingest, type IngestionHooks } from "./ingestion-orchestrator.js";
import { answerQuestion, checkHealth } from "./hybrid-rag.js";

export interface HybridRag {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly documents: IDocumentSource;
  readonly chunker: IChunker;
  readonly extractor: IRelationExtractor;
  readonly router: IQueryRouter;
  readonly generator: ITextGenerator | null;
  readonly embeddings: IEmbeddingProvider | null;
  readonly semanticIndex: ISemanticIndex;
  readonly relationshipIndex: IRelationshipIndex;

  ingest(ref: DocumentRef): Promise<IngestionReport>;
  answer(question: string): Promise<QueryResponse>;
  health(): Promise<HealthStatus>;
  close(): Promise<void>;
}

/** Replacement backends, plus hooks passed to every ingestion run. */
export interface HybridRagOverrides extends IngestionHooks {
  documents?: IDocumentSource;
  generator?: ITextGenerator | null;
  semanticIndex?: ISemanticIndex;
  relationshipIndex?: IRelationshipIndex;
}

/** Builds every collaborator once from config and initialises the semantic index. */
export async function createHybridRag(
  config: AppConfig,
  logger: Logger,
  overrides: HybridRagOverrides = {},
): Promise<HybridRag> {
  const generator =
    overrides.generator !== undefined
      ? overrides.generator
      : createTextGenerator(config.cohere, createChildLogger(logger, { component: "generator" }));

  const embeddings =
    config.cohere.apiKey.length > 0
      ? new CohereEmbeddingProvider({ apiKey: config.cohere.apiKey, model: config.cohere.embedModel })
      : null;

  const semanticIndex =
    overrides.semanticIndex ??
    createSemanticIndex(config.semanticIndex, {
      embeddings,
      logger: createChildLogger(logger, { component: "semantic-index" }),
    });
  const relationshipIndex =
    overrides.relationshipIndex ??
    createRelationshipIndex(
      config.relationshipIndex,
      createChildLogger(logger, { component: "relationship-index" }),
    );

  const chunker = createChunker(config.chunking);
  const extractor = createRelationExtractor(config.extraction.strategy, {
    generator,
    logger: createChildLogger(logger, { component: "extractor" }),
  });
  const router = createQueryRouter(config.routing.strategy, {
    generator,
    logger: createChildLogger(logger, { component: "router" }),
  });
  const documents = overrides.documents ?? new FileDocumentSource();

  try {
    await semanticIndex.initialize();
  } catch (error: unknown) {
    await relationshipIndex.close();
    throw error;
  }

  logger.info(
    {
      semanticIndex: semanticIndex.backend,
      relationshipIndex: relationshipIndex.backend,
      generator: generator?.name ?? null,
      extraction: extractor.strategy,
      routing: router.strategy,
    },
    "hybrid rag ready",
  );

  const ingestionLogger = createChildLogger(logger, { component: "ingestion" });
  const queryLogger = createChildLogger(logger, { component: "query" });

  return {
    config,
    logger,
    documents,
    chunker,
    extractor,
    router,
    generator,
    embeddings,
    semanticIndex,
    relationshipIndex,

    ingest: (ref) =>
      ingest(ref, {
        documents,
        chunker,
        extractor,
        semanticIndex,
        relationshipIndex,
        logger: ingestionLogger,
        onChunked: overrides.onChunked,
        onStored: overrides.onStored,
      }),

    answer: (question) =>
      answerQuestion(question, {
        router,
        semanticIndex,
        relationshipIndex,
        generator,
        topK: config.answering.topK,
        factLimit: config.answering.factLimit,
        logger: queryLogger,
      }),

    health: () => checkHealth({ semanticIndex, relationshipIndex, generator, logger }),

    close: () => relationshipIndex.close(),
  };
}
