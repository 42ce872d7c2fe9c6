export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export type { RecursiveChunkerOptions } from "./recursive-chunker.js";
export { ParagraphChunker, DEFAULT_MIN_LENGTH, DEFAULT_MAX_LENGTH } from "./paragraph-chunker.js";
export type { ParagraphChunkerOptions } from "./paragraph-chunker.js";
export { createChunker } from "./factory.js";
export { tokenize } from "./tokenize.js";
