import type { ChunkResult, ChunkStrategy } from "@hybridrag/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string): ChunkResult[];
}
