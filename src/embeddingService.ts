import { type EmbeddingModel, embed, embedMany } from "ai";
import type { EmbeddingProvider } from "./embeddingProvider.js";
import { ConfigurationError, ProviderError, describeError } from "./errors.js";
import { retry } from "./retry.js";
import type { RetryOptions } from "./retryOptions.js";

const DIMENSION_PROBE_TEXT = "dimension probe";

/**
 * Embedding provider backed by an AI SDK embedding model.
 * Handles batching, delays between batches, retries and dimension checks.
 * Every failure that survives the retries is reported as {@link ProviderError}.
 */
export class EmbeddingService implements EmbeddingProvider {
    private knownDimension?: number;

    /**
     * @param embeddingModel The AI SDK embedding model instance.
     * @param batchSize The number of texts to embed in a single API call.
     * @param apiDelayMs Delay in milliseconds between consecutive batch API calls.
     * @param retryOptions Configuration for retrying failed API calls.
     * @param dimensions Expected vector length. When omitted it is probed on first use.
     */
    constructor(
        private embeddingModel: EmbeddingModel<string>,
        private batchSize: number = 96,
        private apiDelayMs: number = 0,
        private retryOptions: Partial<RetryOptions> = { maxRetries: 3, initialDelay: 1000 },
        dimensions?: number
    ) {
        if (!Number.isInteger(batchSize) || batchSize <= 0) {
            throw new ConfigurationError(`Embedding batch size must be a positive integer, got ${batchSize}.`);
        }
        if (dimensions !== undefined) {
            if (!Number.isInteger(dimensions) || dimensions <= 0) {
                throw new ConfigurationError(`Embedding dimensions must be a positive integer, got ${dimensions}.`);
            }
            this.knownDimension = dimensions;
        }
    }

    /**
     * Returns the model's vector length, embedding a probe text the first time
     * when no dimension was configured.
     */
    async dimension(): Promise<number> {
        if (this.knownDimension === undefined) {
            const probe = await this.embedOne(DIMENSION_PROBE_TEXT);
            this.knownDimension = probe.length;
            console.log(`Embedding model produces ${probe.length}-dimensional vectors.`);
        }
        return this.knownDimension;
    }

    async embedOne(text: string): Promise<number[]> {
        try {
            const vector = await retry(async () => {
                const { embedding } = await embed({ model: this.embeddingModel, value: text, maxRetries: 0 });
                return embedding;
            }, {
                ...this.retryOptions,
                onRetry: (error, attempt) => {
                    console.warn(`Retry attempt ${attempt} for embed: ${error.message}`);
                }
            });
            this.checkDimension(vector, 0);
            return vector;
        } catch (error) {
            throw this.providerError("Embedding failed", error);
        }
    }

    /**
     * Generates embeddings for an array of texts, in batches.
     * @returns One vector per input text, in input order.
     */
    async embedMany(texts: readonly string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        console.log(`Embedding ${texts.length} texts in batches of ${this.batchSize} (Delay: ${this.apiDelayMs}ms)...`);
        const allEmbeddings: number[][] = [];
        const totalBatches = Math.ceil(texts.length / this.batchSize);

        for (let i = 0; i < texts.length; i += this.batchSize) {
            const batchTexts = texts.slice(i, i + this.batchSize);
            const batchNumber = Math.floor(i / this.batchSize) + 1;

            try {
                const batchEmbeddings = await retry(async () => {
                    const { embeddings } = await embedMany({
                        model: this.embeddingModel,
                        values: batchTexts,
                        maxRetries: 0,
                    });

                    if (embeddings.length !== batchTexts.length) {
                        throw new Error(`Embedding count mismatch in batch: expected ${batchTexts.length}, got ${embeddings.length}`);
                    }
                    return embeddings;
                }, {
                    ...this.retryOptions,
                    onRetry: (error, attempt) => {
                        console.warn(`Retry attempt ${attempt} for embedMany batch ${batchNumber}/${totalBatches} (size ${batchTexts.length}): ${error.message}`);
                    }
                });

                batchEmbeddings.forEach((vector, offset) => this.checkDimension(vector, i + offset));
                allEmbeddings.push(...batchEmbeddings);
            } catch (error) {
                console.error(`Embedding batch ${batchNumber}/${totalBatches} (index ${i}) failed: ${describeError(error)}`);
                throw this.providerError(`Embedding batch ${batchNumber}/${totalBatches} failed`, error);
            }

            if (this.apiDelayMs > 0 && i + this.batchSize < texts.length) {
                await new Promise(resolve => setTimeout(resolve, this.apiDelayMs));
            }
        }

        console.log(`Generated ${allEmbeddings.length} embeddings.`);
        return allEmbeddings;
    }

    /** Fixes the dimension from the first vector seen and rejects any other length. */
    private checkDimension(vector: number[], position: number): void {
        if (vector.length === 0) {
            throw new ProviderError(`Embedding model returned an empty vector for text ${position}.`);
        }
        if (this.knownDimension === undefined) {
            this.knownDimension = vector.length;
        } else if (vector.length !== this.knownDimension) {
            throw new ProviderError(
                `Embedding for text ${position} has dimension ${vector.length}, expected ${this.knownDimension}.`
            );
        }
    }

    private providerError(message: string, error: unknown): ProviderError {
        return error instanceof ProviderError
            ? error
            : new ProviderError(`${message}: ${describeError(error)}`, { cause: error });
    }
}
