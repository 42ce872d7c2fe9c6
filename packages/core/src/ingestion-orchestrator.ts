import { randomUUID } from "node:crypto";
import type { Chunk, DocumentRef, IngestionReport, Triple } from "@hybridrag/types";
import type { IChunker } from "@hybridrag/chunker";
import type { IRelationExtractor } from "@hybridrag/extractor";
import { errorMessage } from "@hybridrag/errors";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { ISemanticIndex } from "@hybridrag/semantic-index";
import type { IRelationshipIndex } from "@hybridrag/relationship-index";
import type { IDocumentSource } from "./document-source.js";

export const INGESTION_SUCCESS_MESSAGE =
  "Data successfully ingested into both semantic index and relationship index";

export interface IngestionHooks {
  onChunked?: (chunks: readonly Chunk[]) => Promise<void>;
  onStored?: (report: IngestionReport) => Promise<void>;
}

export interface IngestionDependencies extends IngestionHooks {
  documents: IDocumentSource;
  chunker: IChunker;
  extractor: IRelationExtractor;
  semanticIndex: ISemanticIndex;
  relationshipIndex: IRelationshipIndex;
  logger?: Logger;
}

/**
 * Ingestion: Read -> Chunk -> Index passages + Extract -> Merge graph
 *
 * Not transactional. A store failure stops the run with the semantic index
 * possibly ahead of the relationship index; the report says how far it got.
 */
export async function ingest(ref: DocumentRef, deps: IngestionDependencies): Promise<IngestionReport> {
  const logger = deps.logger ?? createSilentLogger();
  let chunksProcessed = 0;
  const triples: Triple[] = [];

  try {
    const document = await deps.documents.read(ref);

    const chunks: Chunk[] = deps.chunker.chunk(document.text).map((piece, sequenceIndex) => ({
      id: randomUUID(),
      text: piece.content,
      metadata: {
        source: document.source,
        sequenceIndex,
        startChar: piece.metadata.startChar,
        endChar: piece.metadata.endChar,
      },
    }));
    if (deps.onChunked) await deps.onChunked(chunks);
    logger.debug({ source: document.source, chunks: chunks.length }, "document chunked");

    for (const chunk of chunks) {
      await deps.semanticIndex.add(chunk.id, chunk.text, {
        source: chunk.metadata.source,
        sequenceIndex: chunk.metadata.sequenceIndex,
      });
      chunksProcessed++;
      triples.push(...(await deps.extractor.extract(chunk.text)));
    }

    // mergeEdge merges both endpoint nodes
    for (const { subject, predicate, object } of triples) {
      await deps.relationshipIndex.mergeEdge(subject, predicate, object);
    }

    const report: IngestionReport = {
      status: "success",
      chunksProcessed,
      triplesExtracted: triples.length,
      message: INGESTION_SUCCESS_MESSAGE,
    };
    if (deps.onStored) await deps.onStored(report);

    logger.info(
      { source: ref.source, chunksProcessed, triplesExtracted: triples.length },
      "ingestion complete",
    );
    return report;
  } catch (error: unknown) {
    const message = `Failed to ingest data: ${errorMessage(error)}`;
    logger.error({ source: ref.source, chunksProcessed, err: error }, "ingestion failed");

    return {
      status: "error",
      chunksProcessed,
      triplesExtracted: triples.length,
      message,
    };
  }
}
