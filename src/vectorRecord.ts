/**
 * Open metadata map attached to every stored record.
 * `source` and `type` are the conventional keys; callers may add their own tags.
 */
export type RecordMetadata = {
  source?: string;
  type?: string;
  [key: string]: unknown;
};

/** The unit stored in and searched from an index. */
export interface VectorRecord {
  /** Opaque id, unique within one Vector Store. Joins the local and remote backends. */
  id: string;
  /** Embedding; its length always equals the index dimension. */
  vector: number[];
  /** Original chunk content, returned with search results. */
  text: string;
  metadata: RecordMetadata;
}

/** One ranked hit. `score` is cosine similarity in [-1, 1], higher is better. */
export interface SearchResult {
  text: string;
  score: number;
  metadata: RecordMetadata;
}

/** Id and score pair as returned by an index that does not hold the text. */
export interface ScoredId {
  id: string;
  score: number;
}
