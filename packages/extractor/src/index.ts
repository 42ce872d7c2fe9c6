export type { IRelationExtractor } from "./extractor.interface.js";
export { normalizeTriple } from "./normalize.js";
export { PatternRelationExtractor, predicateForVerb } from "./pattern-extractor.js";
export type { PatternExtractorOptions } from "./pattern-extractor.js";
export {
  GenerativeRelationExtractor,
  buildExtractionPrompt,
  parseTripleLines,
} from "./generative-extractor.js";
export type { GenerativeExtractorOptions } from "./generative-extractor.js";
export { createRelationExtractor } from "./factory.js";
export type { ExtractorFactoryOptions } from "./factory.js";
