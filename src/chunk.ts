/**
 * A contiguous slice of a source document, stored and embedded as one unit.
 */
export interface Chunk {
  /** Trimmed text content; never empty. */
  text: string;
  /** Position of the chunk within its parent document, starting at 0. */
  index: number;
}
