#!/usr/bin/env node
import dotenv from "dotenv";
import { readFile } from "fs/promises";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { LanguageModelAnswerGenerator } from "./answerGenerator.js";
import { Chunker } from "./chunker.js";
import { loadConfig } from "./config.js";
import { EmbeddingService } from "./embeddingService.js";
import { RemoteIndexClient } from "./remoteIndexClient.js";
import { Retriever } from "./retriever.js";

dotenv.config();

const USAGE = "Usage: study-assistant <question> [file ...]";

/**
 * Main application entry point.
 * Loads configuration, builds the retrieval engine, ingests the given text
 * files and prints an answer to the question.
 */
async function main(argv: string[]) {
  try {
    const [question, ...files] = argv;
    if (!question || question.trim() === "") {
      throw new Error(USAGE);
    }

    // --- Configuration Loading & Validation ---
    console.log("Loading configuration from environment variables...");
    const config = loadConfig();
    const chunker = new Chunker(config.chunking);
    console.log("Configuration loaded successfully.");

    // --- Service Initialization ---
    console.log("Initializing services...");

    const embeddingProvider = createOpenAICompatible({
      name: config.embedding.providerName,
      baseURL: config.embedding.baseUrl,
      apiKey: config.embedding.apiKey,
    });
    const embeddingService = new EmbeddingService(
      embeddingProvider.textEmbeddingModel(config.embedding.model),
      config.embedding.batchSize,
      config.embedding.apiDelayMs,
      undefined,
      config.embedding.dimensions
    );

    let generator: LanguageModelAnswerGenerator | undefined;
    if (config.answer) {
      const answerProvider = createOpenAICompatible({
        name: "answer",
        baseURL: config.answer.baseUrl,
        apiKey: config.answer.apiKey,
      });
      generator = new LanguageModelAnswerGenerator(answerProvider.chatModel(config.answer.model), {
        maxTokens: config.answer.maxTokens,
        temperature: config.answer.temperature,
      });
    } else {
      console.log("No answer model configured; answers will list retrieved passages.");
    }

    const remote = config.vectorDb
      ? new RemoteIndexClient({
          baseUrl: config.vectorDb.url,
          authToken: config.vectorDb.authToken,
          timeouts: config.vectorDb.timeouts,
        })
      : undefined;

    const retriever = await Retriever.create({
      embeddings: embeddingService,
      generator,
      remote,
      indexName: config.vectorDb?.indexName ?? "study_assistant",
      quantization: config.vectorDb?.quantization,
      remoteInsertRetry: { maxRetries: config.vectorDb?.insertAttempts ?? 1 },
      topK: config.topK,
    });
    console.log("Services initialized.");

    // --- Ingest ---
    for (const file of files) {
      const text = await readFile(file, "utf-8");
      const chunks = chunker.prepare(text);
      if (chunks.length === 0) {
        console.warn(`No text found in ${file}; skipping.`);
        continue;
      }
      await retriever.addKnowledge(
        chunks.map((chunk) => chunk.text),
        chunks.map((chunk) => ({ source: file, type: "file", chunkIndex: chunk.index }))
      );
    }

    // --- Answer ---
    const answer = await retriever.answer(question);
    console.log(`\n${answer.text}\n`);

    const stats = retriever.stats();
    console.log(`Knowledge chunks stored: ${stats.count} (dimension ${stats.dimension}, backend ${stats.backend}).`);
  } catch (error) {
    console.error("FATAL ERROR:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

await main(process.argv.slice(2));
