/** Payload stored beside each passage. */
export interface PassageMetadata {
  source: string;
  sequenceIndex: number;
}

export interface SemanticHit {
  id: string;
  text: string;
  metadata: PassageMetadata;
  /** Higher is more similar. */
  score: number;
}

export interface ISemanticIndex {
  readonly backend: string;

  /** Creates the collection when missing. Call once before `add` or `query`. */
  initialize(): Promise<void>;
  add(id: string, text: string, metadata: PassageMetadata): Promise<void>;
  /** At most `k` hits, most similar first. */
  query(text: string, k: number): Promise<SemanticHit[]>;
  healthCheck(): Promise<boolean>;
}
