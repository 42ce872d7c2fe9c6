import type { Triple } from "./triple.js";

export type RoutingDecision = "semantic" | "relational";

export type RoutingStrategy = "keyword" | "generative";

export interface SemanticSource {
  store: "semantic";
  chunkId: string;
  documentSource: string;
  sequenceIndex: number;
  score: number;
}

export interface RelationalSource {
  store: "relational";
  triple: Triple;
}

export type SourceDescriptor = SemanticSource | RelationalSource;

/**
 * Uniform envelope for a single piece of evidence, whichever store it came from.
 * `rank` starts at 1 for the most relevant result.
 */
export interface RetrievalResult {
  content: string;
  source: SourceDescriptor;
  rank: number;
}

export interface SemanticEvidence {
  store: "semantic";
  chunkIds: string[];
  documents: string[];
}

export interface RelationalEvidence {
  store: "relational";
  matchCount: number;
}

export type Evidence = SemanticEvidence | RelationalEvidence;

export interface ComposedAnswer {
  text: string;
  evidence: Evidence[];
}

export interface QuerySuccess {
  status: "success";
  answer: string;
  searchMethod: RoutingDecision;
  sources: Evidence[];
}

export interface QueryFailure {
  status: "error";
  message: string;
}

export type QueryResponse = QuerySuccess | QueryFailure;
