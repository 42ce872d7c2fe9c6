import type { CanonicalPredicate, Triple } from "@hybridrag/types";
import { errorMessage } from "@hybridrag/errors";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { IRelationExtractor } from "./extractor.interface.js";
import { normalizeTriple } from "./normalize.js";

const MIN_ENTITY_LENGTH = 3;

const VERB_PREDICATES: Readonly<Record<string, CanonicalPredicate>> = {
  is: "IS_A",
  are: "IS_A",
  has: "HAS",
  have: "HAS",
  uses: "USES",
  use: "USES",
  provides: "PROVIDES",
  provide: "PROVIDES",
  includes: "INCLUDES",
  include: "INCLUDES",
  supports: "SUPPORTS",
  support: "SUPPORTS",
};

/**
 * Templates are applied in this order. Each captures (subject, verb, object);
 * "is/are" additionally skips a leading article on the object.
 */
const TEMPLATES: readonly RegExp[] = [
  /(\w+)\s+(is|are)\s+(?:(?:a|an|the)\s+)?(\w+)/gi,
  /(\w+)\s+(has|have)\s+(\w+)/gi,
  /(\w+)\s+(uses|use)\s+(\w+)/gi,
  /(\w+)\s+(provides|provide)\s+(\w+)/gi,
  /(\w+)\s+(includes|include)\s+(\w+)/gi,
  /(\w+)\s+(supports|support)\s+(\w+)/gi,
];

export function predicateForVerb(verb: string): CanonicalPredicate {
  return VERB_PREDICATES[verb.toLowerCase()] ?? "RELATES_TO";
}

export interface PatternExtractorOptions {
  logger?: Logger;
}

/**
 * Regex templates over common verb phrases. Cheap and deterministic; used when
 * no generator is configured.
 */
export class PatternRelationExtractor implements IRelationExtractor {
  readonly strategy = "pattern";
  private readonly logger: Logger;

  constructor(options: PatternExtractorOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  async extract(text: string): Promise<Triple[]> {
    try {
      return this.match(text);
    } catch (error: unknown) {
      this.logger.warn({ err: errorMessage(error) }, "pattern extraction failed for chunk");
      return [];
    }
  }

  private match(text: string): Triple[] {
    const triples: Triple[] = [];

    for (const template of TEMPLATES) {
      for (const match of text.matchAll(template)) {
        const [, subject = "", verb = "", object = ""] = match;
        if (subject.length < MIN_ENTITY_LENGTH || object.length < MIN_ENTITY_LENGTH) continue;

        const triple = normalizeTriple(subject, predicateForVerb(verb), object);
        if (triple) triples.push(triple);
      }
    }

    return triples;
  }
}
