export type { ITextGenerator } from "./generator.interface.js";
export { CohereTextGenerator } from "./cohere-generator.js";
export type { CohereGeneratorConfig } from "./cohere-generator.js";
export { createTextGenerator } from "./factory.js";
