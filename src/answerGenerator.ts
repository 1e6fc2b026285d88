import { type LanguageModel, generateText } from "ai";
import { retry } from "./retry.js";
import type { RetryOptions } from "./retryOptions.js";

/**
 * Produces a natural-language answer for a question, optionally grounded in
 * retrieved context.
 */
export interface AnswerGenerator {
    generate(prompt: string, context?: string): Promise<string>;
}

export interface AnswerGenerationOptions {
    maxTokens: number;
    temperature: number;
    retryOptions?: Partial<RetryOptions>;
}

export const DEFAULT_ANSWER_OPTIONS: AnswerGenerationOptions = {
    maxTokens: 500,
    temperature: 0.7,
};

const SYSTEM_PROMPT = `You are a helpful study assistant. Use the provided context information to answer the user's question accurately.
- Answer ONLY using information from the context.
- If the context contains relevant information, give a detailed answer and reference the source document.
- If the context lacks the information, say clearly: "The uploaded documents don't contain information about this."`;

/** Builds the user message sent to the model. */
export function buildAnswerPrompt(question: string, context?: string): string {
    if (!context) {
        return question;
    }
    return `CONTEXT FROM DOCUMENTS:\n${context}\n\nUSER QUESTION: ${question}\n\nANSWER:`;
}

/**
 * {@link AnswerGenerator} on top of an AI SDK language model.
 */
export class LanguageModelAnswerGenerator implements AnswerGenerator {
    private readonly options: AnswerGenerationOptions;

    constructor(private readonly model: LanguageModel, options: Partial<AnswerGenerationOptions> = {}) {
        this.options = { ...DEFAULT_ANSWER_OPTIONS, ...options };
    }

    async generate(prompt: string, context?: string): Promise<string> {
        const { text } = await retry(() => generateText({
            model: this.model,
            system: context ? SYSTEM_PROMPT : undefined,
            prompt: buildAnswerPrompt(prompt, context),
            maxTokens: this.options.maxTokens,
            temperature: this.options.temperature,
            maxRetries: 0,
        }), {
            maxRetries: 2,
            ...this.options.retryOptions,
            onRetry: (error, attempt) => {
                console.warn(`Retry attempt ${attempt} for answer generation: ${error.message}`);
            },
        });
        return text.trim();
    }
}
