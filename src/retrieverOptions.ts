import type { AnswerGenerator } from "./answerGenerator.js";
import type { EmbeddingProvider } from "./embeddingProvider.js";
import type { VectorStoreOptions } from "./vectorStoreOptions.js";

/**
 * Collaborators and settings for {@link Retriever}.
 * The index dimension is not configured here: it comes from the embedding provider.
 */
export interface RetrieverOptions extends Omit<VectorStoreOptions, "dimension"> {
  embeddings: EmbeddingProvider;
  /** Answer model. Without one the Retriever answers in retrieval-only mode. */
  generator?: AnswerGenerator;
  /** Default number of passages returned by `query` and used by `answer`. */
  topK?: number;
}
