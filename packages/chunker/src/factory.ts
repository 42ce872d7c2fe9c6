import type { ChunkingConfig } from "@hybridrag/types";
import type { IChunker } from "./chunker.interface.js";
import { RecursiveChunker } from "./recursive-chunker.js";
import { ParagraphChunker } from "./paragraph-chunker.js";

export function createChunker(config: ChunkingConfig): IChunker {
  switch (config.strategy) {
    case "recursive":
      return new RecursiveChunker({
        chunkSize: config.chunkSize,
        chunkOverlap: config.chunkOverlap,
        separators: config.separators,
      });
    case "paragraph":
      return new ParagraphChunker({ minLength: config.minLength, maxLength: config.maxLength });
    default: {
      const unknown: never = config;
      throw new Error(`Unknown chunking strategy: ${JSON.stringify(unknown)}`);
    }
  }
}
