import type { AnswerGenerator } from "./answerGenerator.js";
import type { EmbeddingProvider } from "./embeddingProvider.js";
import { ConfigurationError, ProviderError, describeError } from "./errors.js";
import type { RetrieverOptions } from "./retrieverOptions.js";
import type { RecordMetadata, SearchResult } from "./vectorRecord.js";
import { type BackendInfo, type BackendState, VectorStore, type VectorStoreStats } from "./vectorStore.js";

export const INSUFFICIENT_INFORMATION_MESSAGE =
    "I don't have enough information to answer that yet. Try adding some knowledge first.";

const FALLBACK_HEADER = "Based on what I know, here's the relevant information:";
const CONTEXT_CHARS_PER_RESULT = 2000;

export interface Answer {
    /** The user-visible response. */
    text: string;
    /** Passages the response is based on, best first. */
    results: SearchResult[];
    /** True when `text` came from the answer model rather than the fallback format. */
    generated: boolean;
}

/** Context bundle handed to the answer model, one labelled block per result. */
export function buildContext(results: readonly SearchResult[]): string {
    return results
        .map((result, i) => {
            const source = typeof result.metadata.source === "string" ? result.metadata.source : "Unknown";
            return `[Source ${i + 1}: ${source}]\n${result.text.slice(0, CONTEXT_CHARS_PER_RESULT)}`;
        })
        .join("\n\n");
}

/** Deterministic retrieval-only response listing each passage with its score. */
export function formatFallbackAnswer(results: readonly SearchResult[]): string {
    const blocks = results.map((result, i) => `${i + 1}. [Relevance: ${result.score.toFixed(2)}]\n   ${result.text}`);
    return [FALLBACK_HEADER, ...blocks].join("\n\n");
}

/**
 * Entry point of the retrieval engine: embeds knowledge and queries, delegates
 * storage and ranking to the {@link VectorStore} and assembles answers.
 */
export class Retriever {
    private constructor(
        private readonly embeddings: EmbeddingProvider,
        private readonly store: VectorStore,
        private readonly generator: AnswerGenerator | undefined,
        private readonly topK: number
    ) {}

    /**
     * Asks the embedding provider for its dimension once and builds the
     * Vector Store around it.
     */
    static async create(options: RetrieverOptions): Promise<Retriever> {
        const topK = options.topK ?? 3;
        if (!Number.isInteger(topK) || topK <= 0) {
            throw new ConfigurationError(`top_k must be a positive integer, got ${topK}.`);
        }

        const dimension = await options.embeddings.dimension();
        const store = await VectorStore.create({
            dimension,
            indexName: options.indexName,
            remote: options.remote,
            quantization: options.quantization,
            remoteInsertRetry: options.remoteInsertRetry,
        });

        console.log(`Retriever ready (dimension ${dimension}, ${options.generator ? "answer model attached" : "retrieval-only"}).`);
        return new Retriever(options.embeddings, store, options.generator, topK);
    }

    /**
     * Embeds and stores texts. Chunking long documents is the caller's job.
     * Nothing is stored when embedding fails. The same text may be added twice;
     * both copies become searchable.
     * @param metadatas Optional metadata, one entry per text.
     * @returns The ids assigned to the stored texts.
     */
    async addKnowledge(texts: readonly string[], metadatas?: readonly RecordMetadata[]): Promise<string[]> {
        if (metadatas && metadatas.length !== texts.length) {
            throw new ConfigurationError(`Got ${metadatas.length} metadata entries for ${texts.length} texts.`);
        }
        const emptyAt = texts.findIndex((text) => text.trim().length === 0);
        if (emptyAt >= 0) {
            throw new ConfigurationError(`Text ${emptyAt} is empty.`);
        }
        if (texts.length === 0) {
            return [];
        }

        console.log(`Adding ${texts.length} pieces of knowledge...`);
        const vectors = await this.embeddings.embedMany(texts);
        if (vectors.length !== texts.length) {
            throw new ProviderError(`Expected ${texts.length} embeddings, got ${vectors.length}.`);
        }

        return this.store.insertMany(texts.map((text, i) => ({
            text,
            vector: vectors[i] ?? [],
            metadata: metadatas?.[i],
        })));
    }

    /** Returns the best-matching passages for `text`, best first. */
    async query(text: string, topK: number = this.topK): Promise<SearchResult[]> {
        const vector = await this.embeddings.embedOne(text);
        const results = await this.store.search(vector, topK);
        console.log(results.length > 0
            ? `Found ${results.length} relevant result(s).`
            : "No results found.");
        return results;
    }

    /**
     * Answers a question from stored knowledge. With no matching passages the
     * fixed {@link INSUFFICIENT_INFORMATION_MESSAGE} is returned. Without an
     * answer model, or when it fails, the passages are listed with their scores.
     */
    async answer(text: string, topK: number = this.topK): Promise<Answer> {
        const results = await this.query(text, topK);
        if (results.length === 0) {
            return { text: INSUFFICIENT_INFORMATION_MESSAGE, results, generated: false };
        }

        if (this.generator) {
            try {
                const generated = await this.generator.generate(text, buildContext(results));
                return { text: generated, results, generated: true };
            } catch (error) {
                console.warn(`Answer generation failed, listing retrieved passages instead: ${describeError(error)}`);
            }
        }

        return { text: formatFallbackAnswer(results), results, generated: false };
    }

    stats(): VectorStoreStats {
        return this.store.stats();
    }

    backendInfo(): Promise<BackendInfo> {
        return this.store.backendInfo();
    }

    /** Forgets all stored knowledge. */
    async clearKnowledge(): Promise<void> {
        await this.store.clear();
    }

    /** Re-probes the remote backend after it was given up on. */
    reconnect(): Promise<BackendState> {
        return this.store.reconnect();
    }
}
