import type { ComposedAnswer, Evidence, RoutingDecision } from "@hybridrag/types";
import { errorMessage } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { ISemanticIndex } from "@hybridrag/semantic-index";
import type { IRelationshipIndex } from "@hybridrag/relationship-index";
import { retrieveRelational, retrieveSemantic } from "./retrieval.js";
import { assembleFacts, assemblePassages } from "./context-assembler.js";

export const NO_INFORMATION = "No relevant information found";
export const NO_RELATIONSHIPS = "No relevant relationships found";

const FALLBACK_CONTEXT_CHARS = 200;

export interface AnswerDependencies {
  semanticIndex: ISemanticIndex;
  relationshipIndex: IRelationshipIndex;
  generator: ITextGenerator | null;
  topK: number;
  factLimit: number;
  logger?: Logger;
}

export function buildSemanticPrompt(context: string, question: string): string {
  return `Based on the following context, answer the question concisely and accurately:

Context:
${context}

Question: ${question}

Answer:
`;
}

export function buildRelationalPrompt(facts: string, question: string): string {
  return `Based on the following relationships, answer the question:

Relationships:
${facts}

Question: ${question}

Provide a clear, concise answer based on these relationships:
`;
}

/**
 * Generator output, or `fallback` when there is no generator or the call fails.
 */
async function generateOr(
  prompt: string,
  fallback: string,
  deps: AnswerDependencies,
  logger: Logger,
): Promise<string> {
  if (!deps.generator) return fallback;

  let output: string;
  try {
    output = await deps.generator.generate(prompt);
  } catch (error: unknown) {
    logger.warn(
      { err: errorMessage(error), generator: deps.generator.name },
      "generation failed, answering from retrieved context",
    );
    return fallback;
  }

  if (output.trim().length === 0) {
    logger.warn(
      { generator: deps.generator.name },
      "generator returned an empty answer, answering from retrieved context",
    );
    return fallback;
  }
  return output;
}

async function composeSemantic(
  question: string,
  deps: AnswerDependencies,
  logger: Logger,
): Promise<ComposedAnswer> {
  const results = await retrieveSemantic(question, deps.semanticIndex, deps.topK);
  if (results.length === 0) {
    return { text: NO_INFORMATION, evidence: [] };
  }

  const context = assemblePassages(results);
  const chunkIds: string[] = [];
  const documents: string[] = [];
  for (const { source } of results) {
    if (source.store !== "semantic") continue;
    chunkIds.push(source.chunkId);
    if (!documents.includes(source.documentSource)) documents.push(source.documentSource);
  }

  const text = await generateOr(
    buildSemanticPrompt(context, question),
    `Based on the available information: ${context.slice(0, FALLBACK_CONTEXT_CHARS)}...`,
    deps,
    logger,
  );
  const evidence: Evidence[] = [{ store: "semantic", chunkIds, documents }];
  return { text, evidence };
}

async function composeRelational(
  question: string,
  deps: AnswerDependencies,
  logger: Logger,
): Promise<ComposedAnswer> {
  const results = await retrieveRelational(question, deps.relationshipIndex);
  if (results.length === 0) {
    return { text: NO_RELATIONSHIPS, evidence: [] };
  }

  const facts = assembleFacts(results, deps.factLimit);
  const text = await generateOr(
    buildRelationalPrompt(facts, question),
    `Based on the relationships:\n${facts}`,
    deps,
    logger,
  );
  const evidence: Evidence[] = [{ store: "relational", matchCount: results.length }];
  return { text, evidence };
}

/**
 * Retrieves from the store chosen by `route` and answers from that evidence.
 * Store read failures propagate; generator failures do not.
 */
export async function composeAnswer(
  question: string,
  route: RoutingDecision,
  deps: AnswerDependencies,
): Promise<ComposedAnswer> {
  const logger = deps.logger ?? createSilentLogger();

  switch (route) {
    case "semantic":
      return composeSemantic(question, deps, logger);
    case "relational":
      return composeRelational(question, deps, logger);
    default: {
      const unreachable: never = route;
      throw new Error(`Unknown route: ${String(unreachable)}`);
    }
  }
}
