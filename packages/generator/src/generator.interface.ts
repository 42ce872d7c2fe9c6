/**
 * Text-in, text-out model used for answer generation, routing and relation extraction.
 */
export interface ITextGenerator {
  readonly name: string;

  /** Rejects when the model is unreachable or refuses the request. */
  generate(prompt: string): Promise<string>;
  healthCheck(): Promise<boolean>;
}
