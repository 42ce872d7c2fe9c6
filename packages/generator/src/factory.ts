import type { CohereConfig } from "@hybridrag/types";
import type { Logger } from "@hybridrag/logger";
import type { ITextGenerator } from "./generator.interface.js";
import { CohereTextGenerator } from "./cohere-generator.js";

/**
 * Returns null when no API key is configured; callers then answer from
 * retrieved context without a model.
 */
export function createTextGenerator(config: CohereConfig, logger?: Logger): ITextGenerator | null {
  if (config.apiKey.length === 0) {
    return null;
  }

  return new CohereTextGenerator({
    apiKey: config.apiKey,
    model: config.chatModel,
    maxRetries: config.maxRetries,
    logger,
  });
}
