/**
 * Options controlling how the Chunker splits long documents.
 */
export interface ChunkingOptions {
  /** Maximum window size in characters. */
  size: number;
  /** Number of characters shared between consecutive windows. Must be smaller than `size`. */
  overlap: number;
  /** Documents longer than this many characters are split; shorter ones stay whole. */
  threshold: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  size: 1000,
  overlap: 100,
  threshold: 5000,
};
