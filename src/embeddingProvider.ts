/**
 * Maps text to fixed-length vectors. Implementations must be deterministic for
 * a fixed model version and are the only source of the index dimension.
 */
export interface EmbeddingProvider {
  embedOne(text: string): Promise<number[]>;
  embedMany(texts: readonly string[]): Promise<number[][]>;
  /** Length of every vector this provider returns. */
  dimension(): Promise<number>;
}
