import type { HealthStatus, QueryResponse, RelationshipIndexStats } from "@hybridrag/types";
import { errorMessage } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { ISemanticIndex } from "@hybridrag/semantic-index";
import type { IRelationshipIndex } from "@hybridrag/relationship-index";
import type { IQueryRouter } from "./query-router.js";
import { composeAnswer, type AnswerDependencies } from "./answer-composer.js";

export interface QueryDependencies extends AnswerDependencies {
  router: IQueryRouter;
}

/**
 * Routes, retrieves and answers. Never rejects: failures come back as an
 * error envelope.
 */
export async function answerQuestion(question: string, deps: QueryDependencies): Promise<QueryResponse> {
  const logger = deps.logger ?? createSilentLogger();

  if (question.trim().length === 0) {
    return { status: "error", message: "Question must not be empty" };
  }

  try {
    const searchMethod = await deps.router.route(question);
    logger.info({ searchMethod, router: deps.router.strategy }, "routed query");

    const { text, evidence } = await composeAnswer(question, searchMethod, deps);
    return { status: "success", answer: text, searchMethod, sources: evidence };
  } catch (error: unknown) {
    logger.error({ err: error }, "query failed");
    return { status: "error", message: `Failed to process query: ${errorMessage(error)}` };
  }
}

export interface HealthDependencies {
  semanticIndex: ISemanticIndex;
  relationshipIndex: IRelationshipIndex;
  generator: ITextGenerator | null;
  logger?: Logger;
}

async function generatorHealth(generator: ITextGenerator | null): Promise<HealthStatus["components"]["generator"]> {
  if (!generator) return "not_configured";
  return (await generator.healthCheck()) ? "loaded" : "unreachable";
}

export async function checkHealth(deps: HealthDependencies): Promise<HealthStatus> {
  const [semanticUp, relationshipUp, generator] = await Promise.all([
    deps.semanticIndex.healthCheck(),
    deps.relationshipIndex.healthCheck(),
    generatorHealth(deps.generator),
  ]);

  let relationshipIndexStats: RelationshipIndexStats | undefined;
  if (relationshipUp) {
    try {
      relationshipIndexStats = await deps.relationshipIndex.stats();
    } catch (error: unknown) {
      (deps.logger ?? createSilentLogger()).warn(
        { err: errorMessage(error) },
        "could not read relationship index stats",
      );
    }
  }

  return {
    status: semanticUp && relationshipUp ? "healthy" : "degraded",
    components: {
      semanticIndex: semanticUp ? "connected" : "disconnected",
      relationshipIndex: relationshipUp ? "connected" : "disconnected",
      generator,
    },
    ...(relationshipIndexStats ? { relationshipIndexStats } : {}),
  };
}
