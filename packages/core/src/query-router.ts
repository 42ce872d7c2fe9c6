import type { RoutingDecision, RoutingStrategy } from "@hybridrag/types";
import { GeneratorUnavailableError, errorMessage } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import { createSilentLogger, type Logger } from "@hybridrag/logger";

export interface IQueryRouter {
  readonly strategy: RoutingStrategy;

  /** Never rejects; anything undecidable routes to "semantic". */
  route(question: string): Promise<RoutingDecision>;
}

export const DEFAULT_RELATIONAL_INDICATORS: readonly string[] = [
  "how does",
  "relate",
  "relationship",
  "connection",
  "connected",
  "links",
  "associated",
  "depends",
  "uses",
  "has",
  "includes",
];

export const DEFAULT_SEMANTIC_INDICATORS: readonly string[] = [
  "what is",
  "define",
  "explain",
  "describe",
  "meaning",
  "overview",
  "summary",
  "about",
];

export interface KeywordRouterOptions {
  relationalIndicators?: readonly string[];
  semanticIndicators?: readonly string[];
}

/**
 * Substring match on the lower-cased question. Relational indicators are
 * checked first, so a question matching both lists routes relational.
 */
export class KeywordQueryRouter implements IQueryRouter {
  readonly strategy = "keyword";
  private readonly relational: readonly string[];
  private readonly semantic: readonly string[];

  constructor(options: KeywordRouterOptions = {}) {
    this.relational = options.relationalIndicators ?? DEFAULT_RELATIONAL_INDICATORS;
    this.semantic = options.semanticIndicators ?? DEFAULT_SEMANTIC_INDICATORS;
  }

  async route(question: string): Promise<RoutingDecision> {
    return this.decide(question);
  }

  decide(question: string): RoutingDecision {
    const lower = question.toLowerCase();

    if (this.relational.some((indicator) => lower.includes(indicator))) {
      return "relational";
    }
    if (this.semantic.some((indicator) => lower.includes(indicator))) {
      return "semantic";
    }
    return "semantic";
  }
}

const SEMANTIC_OPTION = "Semantic Search";
const RELATIONAL_OPTION = "Relationship Query";

export function buildRoutingPrompt(question: string): string {
  return `Given the user's question, determine if it is better answered by:
(A) ${SEMANTIC_OPTION}: For questions about definitions, explanations, or 'what is' questions.
(B) ${RELATIONAL_OPTION}: For questions about relationships, connections, or 'how does X relate to Y' questions.

Question: '${question}'

Best method is:
`;
}

/** Reads the option letter or name from a routing reply; A is checked before B. */
export function parseRoutingReply(reply: string): RoutingDecision {
  const lower = reply.toLowerCase();

  if (reply.includes("(A)") || lower.includes(SEMANTIC_OPTION.toLowerCase())) {
    return "semantic";
  }
  if (reply.includes("(B)") || lower.includes(RELATIONAL_OPTION.toLowerCase())) {
    return "relational";
  }
  return "semantic";
}

export interface GenerativeRouterOptions {
  generator: ITextGenerator;
  logger?: Logger;
}

export class GenerativeQueryRouter implements IQueryRouter {
  readonly strategy = "generative";
  private readonly generator: ITextGenerator;
  private readonly logger: Logger;

  constructor(options: GenerativeRouterOptions) {
    this.generator = options.generator;
    this.logger = options.logger ?? createSilentLogger();
  }

  async route(question: string): Promise<RoutingDecision> {
    try {
      const reply = await this.generator.generate(buildRoutingPrompt(question));
      return parseRoutingReply(reply);
    } catch (error: unknown) {
      this.logger.warn({ err: errorMessage(error) }, "routing failed, using semantic search");
      return "semantic";
    }
  }
}

export interface RouterFactoryOptions {
  generator: ITextGenerator | null;
  keyword?: KeywordRouterOptions;
  logger?: Logger;
}

export function createQueryRouter(strategy: RoutingStrategy, options: RouterFactoryOptions): IQueryRouter {
  switch (strategy) {
    case "keyword":
      return new KeywordQueryRouter(options.keyword);
    case "generative":
      if (!options.generator) {
        throw new GeneratorUnavailableError("A text generator is required for generative routing");
      }
      return new GenerativeQueryRouter({ generator: options.generator, logger: options.logger });
    default:
      throw new Error(`Unknown routing strategy: ${String(strategy)}`);
  }
}
