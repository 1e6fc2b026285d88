import type { EmbeddingModel } from "ai";
import { type Mock, describe, expect, it, vi } from "vitest";
import { EmbeddingService } from "./embeddingService.js";
import { ConfigurationError, ProviderError } from "./errors.js";

type EmbedFn = (values: string[]) => Promise<number[][]>;

const lengthEmbedding: EmbedFn = async (values) => values.map((value) => [value.length, 1]);

/** Embedding model whose vectors are [length of text, 1] unless told otherwise. */
function fakeModel(doEmbed: Mock<EmbedFn> = vi.fn<EmbedFn>(lengthEmbedding)) {
    const model: EmbeddingModel<string> = {
        specificationVersion: "v1",
        provider: "test",
        modelId: "fake-embedding",
        maxEmbeddingsPerCall: undefined,
        supportsParallelCalls: true,
        doEmbed: async ({ values }) => ({ embeddings: await doEmbed(values) }),
    };
    return { model, doEmbed };
}

const noRetry = { maxRetries: 1, initialDelay: 0 };

describe("EmbeddingService", () => {
    it("embeds a single text", async () => {
        const { model } = fakeModel();
        const service = new EmbeddingService(model, 96, 0, noRetry);

        expect(await service.embedOne("hello")).toEqual([5, 1]);
    });

    it("embeds in batches and keeps input order", async () => {
        const { model, doEmbed } = fakeModel();
        const service = new EmbeddingService(model, 2, 0, noRetry);

        const vectors = await service.embedMany(["a", "bb", "ccc", "dddd", "eeeee"]);

        expect(vectors).toEqual([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1]]);
        expect(doEmbed.mock.calls.map(([values]) => values)).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
    });

    it("returns nothing for no texts without calling the model", async () => {
        const { model, doEmbed } = fakeModel();
        const service = new EmbeddingService(model, 96, 0, noRetry);

        expect(await service.embedMany([])).toEqual([]);
        expect(doEmbed).not.toHaveBeenCalled();
    });

    it("uses the configured dimension without probing", async () => {
        const { model, doEmbed } = fakeModel();
        const service = new EmbeddingService(model, 96, 0, noRetry, 2);

        expect(await service.dimension()).toBe(2);
        expect(doEmbed).not.toHaveBeenCalled();
    });

    it("probes the dimension once when none is configured", async () => {
        const { model, doEmbed } = fakeModel(vi.fn<EmbedFn>(async (values) => values.map(() => [0.1, 0.2, 0.3])));
        const service = new EmbeddingService(model, 96, 0, noRetry);

        expect(await service.dimension()).toBe(3);
        expect(await service.dimension()).toBe(3);
        expect(doEmbed).toHaveBeenCalledTimes(1);
    });

    it("rejects vectors whose length differs from the dimension", async () => {
        const { model } = fakeModel();
        const service = new EmbeddingService(model, 96, 0, noRetry, 3);

        await expect(service.embedMany(["a"])).rejects.toThrow(ProviderError);
        await expect(service.embedOne("a")).rejects.toThrow(ProviderError);
    });

    it("retries a failing batch and then succeeds", async () => {
        const doEmbed = vi.fn<EmbedFn>(lengthEmbedding);
        doEmbed.mockRejectedValueOnce(new Error("rate limited"));
        const { model } = fakeModel(doEmbed);
        const service = new EmbeddingService(model, 96, 0, { maxRetries: 2, initialDelay: 0 });

        expect(await service.embedMany(["abc"])).toEqual([[3, 1]]);
        expect(doEmbed).toHaveBeenCalledTimes(2);
    });

    it("reports a persistent failure as a ProviderError", async () => {
        const { model } = fakeModel(vi.fn<EmbedFn>(async () => {
            throw new Error("model offline");
        }));
        const service = new EmbeddingService(model, 96, 0, noRetry);

        await expect(service.embedMany(["a"])).rejects.toThrow(ProviderError);
        await expect(service.embedOne("a")).rejects.toThrow(/model offline/);
    });

    it("rejects invalid construction options", () => {
        const { model } = fakeModel();
        expect(() => new EmbeddingService(model, 0)).toThrow(ConfigurationError);
        expect(() => new EmbeddingService(model, 10, 0, noRetry, -1)).toThrow(ConfigurationError);
    });
});
