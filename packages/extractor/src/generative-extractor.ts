import type { Triple } from "@hybridrag/types";
import { errorMessage } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { IRelationExtractor } from "./extractor.interface.js";
import { normalizeTriple } from "./normalize.js";

const TRIPLE_LINE = /\(([^,]+),\s*([^,]+),\s*([^)]+)\)/;

export function buildExtractionPrompt(text: string): string {
  return `From the text below, extract relationships as triples (HEAD, RELATION, TAIL).
Examples: (FastAPI, HAS_COMPONENT, routers), (routers, ENABLES, organization), (Pydantic, PROVIDES, validation).

Text: '${text}'

Extract only clear, factual relationships. Format each as: (entity1, relationship, entity2)

Triples:
`;
}

/**
 * Reads one triple per line of model output; lines without a bracketed
 * 3-tuple are skipped.
 */
export function parseTripleLines(output: string): Triple[] {
  const triples: Triple[] = [];

  for (const line of output.split("\n")) {
    const match = TRIPLE_LINE.exec(line);
    if (!match) continue;

    const [, subject = "", predicate = "", object = ""] = match;
    const triple = normalizeTriple(subject, predicate, object);
    if (triple) triples.push(triple);
  }

  return triples;
}

export interface GenerativeExtractorOptions {
  generator: ITextGenerator;
  logger?: Logger;
}

export class GenerativeRelationExtractor implements IRelationExtractor {
  readonly strategy = "generative";
  private readonly generator: ITextGenerator;
  private readonly logger: Logger;

  constructor(options: GenerativeExtractorOptions) {
    this.generator = options.generator;
    this.logger = options.logger ?? createSilentLogger();
  }

  async extract(text: string): Promise<Triple[]> {
    try {
      const output = await this.generator.generate(buildExtractionPrompt(text));
      return parseTripleLines(output);
    } catch (error: unknown) {
      this.logger.warn(
        { err: errorMessage(error), generator: this.generator.name },
        "generative extraction failed for chunk",
      );
      return [];
    }
  }
}
