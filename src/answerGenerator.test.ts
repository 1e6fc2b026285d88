import type { LanguageModel } from "ai";
import { describe, expect, it, vi } from "vitest";
import { LanguageModelAnswerGenerator, buildAnswerPrompt } from "./answerGenerator.js";

type GenerateOptions = Parameters<LanguageModel["doGenerate"]>[0];

function fakeLanguageModel(reply: string) {
    const doGenerate = vi.fn(async (_options: GenerateOptions) => ({
        text: reply,
        finishReason: "stop" as const,
        usage: { promptTokens: 10, completionTokens: 5 },
        rawCall: { rawPrompt: null, rawSettings: {} },
    }));
    const model: LanguageModel = {
        specificationVersion: "v1",
        provider: "test",
        modelId: "fake-chat",
        defaultObjectGenerationMode: undefined,
        doGenerate,
        doStream: async () => {
            throw new Error("streaming is not used");
        },
    };
    return { model, doGenerate };
}

describe("buildAnswerPrompt", () => {
    it("passes a bare question through when there is no context", () => {
        expect(buildAnswerPrompt("What is a monad?")).toBe("What is a monad?");
    });

    it("frames the question with the retrieved context", () => {
        expect(buildAnswerPrompt("What is a monad?", "[Source 1: fp.md]\nA monad is a monoid.")).toBe(
            "CONTEXT FROM DOCUMENTS:\n[Source 1: fp.md]\nA monad is a monoid.\n\nUSER QUESTION: What is a monad?\n\nANSWER:"
        );
    });
});

describe("LanguageModelAnswerGenerator", () => {
    it("returns the trimmed model reply", async () => {
        const { model, doGenerate } = fakeLanguageModel("  A monoid in the category of endofunctors.  ");
        const generator = new LanguageModelAnswerGenerator(model, { maxTokens: 200, temperature: 0.2 });

        const answer = await generator.generate("What is a monad?", "[Source 1: fp.md]\nA monad is a monoid.");

        expect(answer).toBe("A monoid in the category of endofunctors.");
        expect(doGenerate).toHaveBeenCalledTimes(1);
        const options = doGenerate.mock.calls[0]?.[0];
        expect(options?.maxTokens).toBe(200);
        expect(options?.temperature).toBe(0.2);
        expect(options?.prompt[0]).toMatchObject({ role: "system" });
    });

    it("sends no system prompt without context", async () => {
        const { model, doGenerate } = fakeLanguageModel("Hello.");
        const generator = new LanguageModelAnswerGenerator(model);

        await generator.generate("Say hello");

        expect(doGenerate.mock.calls[0]?.[0].prompt.map((message) => message.role)).toEqual(["user"]);
    });
});
