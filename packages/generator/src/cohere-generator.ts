import { CohereClient, CohereError } from "cohere-ai";
import { ExternalServiceError, errorMessage, withRetry } from "@hybridrag/errors";
import type { Logger } from "@hybridrag/logger";
import type { ITextGenerator } from "./generator.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";
const DEFAULT_MAX_TOKENS = 256;
const DEFAULT_TEMPERATURE = 0.1;

export interface CohereGeneratorConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
}

/**
 * Upstream client errors keep their status so withRetry does not repeat them;
 * rate limits and everything else count as retryable gateway failures.
 */
function toServiceError(error: unknown): ExternalServiceError {
  if (error instanceof CohereError) {
    const status = error.statusCode;
    const isClientError = status !== undefined && status >= 400 && status < 500 && status !== 429;
    return new ExternalServiceError(error.message, "cohere", {
      statusCode: isClientError ? status : 502,
      cause: error,
    });
  }
  return new ExternalServiceError(errorMessage(error), "cohere", { cause: error });
}

export class CohereTextGenerator implements ITextGenerator {
  readonly name = "cohere";
  private client: CohereClient;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private maxRetries: number | undefined;
  private retryBaseDelayMs: number | undefined;
  private logger: Logger | undefined;

  constructor(config: CohereGeneratorConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.maxRetries = config.maxRetries;
    this.retryBaseDelayMs = config.retryBaseDelayMs;
    this.logger = config.logger;
  }

  async generate(prompt: string): Promise<string> {
    return withRetry(() => this.chat(prompt), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.retryBaseDelayMs,
      onRetry: ({ attempt, maxRetries, delayMs, error }) => {
        this.logger?.warn(
          { attempt, maxRetries, delayMs, err: errorMessage(error) },
          "cohere chat failed, retrying",
        );
      },
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.chat("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async chat(prompt: string): Promise<string> {
    try {
      const response = await this.client.v2.chat({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        maxTokens: this.maxTokens,
        temperature: this.temperature,
      });

      const parts: string[] = [];
      for (const item of response.message.content ?? []) {
        if (item.type === "text") {
          parts.push(item.text);
        }
      }
      return parts.join("");
    } catch (error: unknown) {
      throw toServiceError(error);
    }
  }
}
