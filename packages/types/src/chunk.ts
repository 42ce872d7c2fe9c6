export type ChunkStrategy = "recursive" | "paragraph";

export interface Chunk {
  readonly id: string;
  readonly text: string;
  readonly metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  readonly source: string;
  readonly sequenceIndex: number;
  readonly startChar: number;
  readonly endChar: number;
}

/** A passage produced by a chunker, before it is given an id and a source. */
export interface ChunkResult {
  content: string;
  index: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}

export interface RecursiveChunkingConfig {
  strategy: "recursive";
  chunkSize: number;
  chunkOverlap: number;
  separators?: string[];
}

export interface ParagraphChunkingConfig {
  strategy: "paragraph";
  minLength: number;
  maxLength: number;
}

export type ChunkingConfig = RecursiveChunkingConfig | ParagraphChunkingConfig;
