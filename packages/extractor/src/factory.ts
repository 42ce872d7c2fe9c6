import type { ExtractionStrategy } from "@hybridrag/types";
import { GeneratorUnavailableError } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import type { Logger } from "@hybridrag/logger";
import type { IRelationExtractor } from "./extractor.interface.js";
import { PatternRelationExtractor } from "./pattern-extractor.js";
import { GenerativeRelationExtractor } from "./generative-extractor.js";

export interface ExtractorFactoryOptions {
  generator: ITextGenerator | null;
  logger?: Logger;
}

export function createRelationExtractor(
  strategy: ExtractionStrategy,
  options: ExtractorFactoryOptions,
): IRelationExtractor {
  switch (strategy) {
    case "pattern":
      return new PatternRelationExtractor({ logger: options.logger });
    case "generative":
      if (!options.generator) {
        throw new GeneratorUnavailableError("A text generator is required for generative extraction");
      }
      return new GenerativeRelationExtractor({
        generator: options.generator,
        logger: options.logger,
      });
    default:
      throw new Error(`Unknown extraction strategy: ${String(strategy)}`);
  }
}
