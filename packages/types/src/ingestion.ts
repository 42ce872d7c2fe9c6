export interface DocumentRef {
  /** File path or name the document is read from. */
  source: string;
}

export interface LoadedDocument {
  readonly source: string;
  readonly text: string;
}

export type IngestionStatus = "success" | "error";

export interface IngestionReport {
  status: IngestionStatus;
  chunksProcessed: number;
  triplesExtracted: number;
  message: string;
}
