import type { RetrievalResult } from "@hybridrag/types";
import { tokenize } from "@hybridrag/chunker";
import type { ISemanticIndex } from "@hybridrag/semantic-index";
import type { IRelationshipIndex } from "@hybridrag/relationship-index";
import { formatFact } from "./context-assembler.js";

/** Nearest passages for the question, rank 1 first. */
export async function retrieveSemantic(
  question: string,
  semanticIndex: ISemanticIndex,
  topK: number,
): Promise<RetrievalResult[]> {
  const hits = await semanticIndex.query(question, topK);

  return hits.map((hit, i): RetrievalResult => ({
    content: hit.text,
    rank: i + 1,
    source: {
      store: "semantic",
      chunkId: hit.id,
      documentSource: hit.metadata.source,
      sequenceIndex: hit.metadata.sequenceIndex,
      score: hit.score,
    },
  }));
}

/**
 * Facts whose subject or object shares a token with the question. The content
 * of each result is the formatted bullet.
 */
export async function retrieveRelational(
  question: string,
  relationshipIndex: IRelationshipIndex,
): Promise<RetrievalResult[]> {
  const keywords = [...new Set(tokenize(question))];
  const triples = await relationshipIndex.match(keywords);

  return triples.map((triple, i): RetrievalResult => ({
    content: formatFact(triple),
    rank: i + 1,
    source: { store: "relational", triple },
  }));
}
