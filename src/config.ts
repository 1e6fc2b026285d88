import { type ChunkingOptions, DEFAULT_CHUNKING_OPTIONS } from "./chunkOptions.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_REMOTE_TIMEOUTS, type RemoteTimeouts } from "./remoteIndexClientOptions.js";

export interface EmbeddingConfig {
    providerName: string;
    baseUrl: string;
    apiKey?: string;
    model: string;
    dimensions?: number;
    batchSize: number;
    apiDelayMs: number;
}

export interface AnswerConfig {
    baseUrl: string;
    apiKey?: string;
    model: string;
    maxTokens: number;
    temperature: number;
}

export interface VectorDbConfig {
    url: string;
    authToken?: string;
    indexName: string;
    quantization: string;
    insertAttempts: number;
    timeouts: RemoteTimeouts;
}

/**
 * Everything the entry point needs, read from environment variables.
 */
export interface AppConfig {
    embedding: EmbeddingConfig;
    /** Absent when no answer model is configured: the assistant runs retrieval-only. */
    answer?: AnswerConfig;
    /** Absent when the remote vector service is disabled. */
    vectorDb?: VectorDbConfig;
    chunking: ChunkingOptions;
    topK: number;
}

const REQUIRED_ENV_VARS = [
    "EMBEDDING_PROVIDER_NAME",
    "EMBEDDING_PROVIDER_BASE_URL",
    "EMBEDDING_MODEL",
];

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const value = parseInt(raw, 10);
    if (isNaN(value) || value < min || String(value) !== raw.trim()) {
        throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}".`);
    }
    return value;
}

function readFloat(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a non-negative number, got "${raw}".`);
    }
    return value;
}

function readRequired(env: NodeJS.ProcessEnv, name: string): string {
    const value = env[name];
    if (!value) {
        throw new ConfigurationError(`Missing required environment variable: ${name}`);
    }
    return value;
}

/**
 * Reads and validates configuration.
 * @throws {ConfigurationError} On a missing required variable or a malformed value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    for (const name of REQUIRED_ENV_VARS) {
        readRequired(env, name);
    }

    const dimensionsRaw = env.EMBEDDING_DIMENSIONS;
    const embedding: EmbeddingConfig = {
        providerName: readRequired(env, "EMBEDDING_PROVIDER_NAME"),
        baseUrl: readRequired(env, "EMBEDDING_PROVIDER_BASE_URL"),
        apiKey: env.EMBEDDING_PROVIDER_API_KEY || undefined,
        model: readRequired(env, "EMBEDDING_MODEL"),
        dimensions: dimensionsRaw ? readInt(env, "EMBEDDING_DIMENSIONS", 0, 1) : undefined,
        batchSize: readInt(env, "EMBEDDING_BATCH_SIZE", 96, 1),
        apiDelayMs: readInt(env, "EMBEDDING_API_DELAY_MS", 0, 0),
    };

    const answer: AnswerConfig | undefined = env.ANSWER_PROVIDER_BASE_URL && env.ANSWER_MODEL
        ? {
            baseUrl: env.ANSWER_PROVIDER_BASE_URL,
            apiKey: env.ANSWER_PROVIDER_API_KEY || undefined,
            model: env.ANSWER_MODEL,
            maxTokens: readInt(env, "ANSWER_MAX_TOKENS", 500, 1),
            temperature: readFloat(env, "ANSWER_TEMPERATURE", 0.7),
        }
        : undefined;

    const vectorDbEnabled = (env.VECTOR_DB_ENABLED ?? "true").toLowerCase() !== "false";
    const vectorDb: VectorDbConfig | undefined = vectorDbEnabled
        ? {
            url: env.VECTOR_DB_URL || "http://localhost:8080/api/v1",
            authToken: env.VECTOR_DB_AUTH_TOKEN || undefined,
            indexName: env.VECTOR_DB_INDEX_NAME || "study_assistant",
            quantization: env.VECTOR_DB_QUANTIZATION || "FLOAT32",
            insertAttempts: readInt(env, "VECTOR_DB_INSERT_ATTEMPTS", 1, 1),
            timeouts: {
                ...DEFAULT_REMOTE_TIMEOUTS,
                health: readInt(env, "VECTOR_DB_HEALTH_TIMEOUT_MS", DEFAULT_REMOTE_TIMEOUTS.health, 1),
                create: readInt(env, "VECTOR_DB_CREATE_TIMEOUT_MS", DEFAULT_REMOTE_TIMEOUTS.create, 1),
                insert: readInt(env, "VECTOR_DB_INSERT_TIMEOUT_MS", DEFAULT_REMOTE_TIMEOUTS.insert, 1),
                search: readInt(env, "VECTOR_DB_SEARCH_TIMEOUT_MS", DEFAULT_REMOTE_TIMEOUTS.search, 1),
            },
        }
        : undefined;

    const chunking: ChunkingOptions = {
        size: readInt(env, "CHUNK_SIZE", DEFAULT_CHUNKING_OPTIONS.size, 1),
        overlap: readInt(env, "CHUNK_OVERLAP", DEFAULT_CHUNKING_OPTIONS.overlap, 0),
        threshold: readInt(env, "CHUNK_THRESHOLD", DEFAULT_CHUNKING_OPTIONS.threshold, 0),
    };
    if (chunking.overlap >= chunking.size) {
        throw new ConfigurationError(`CHUNK_OVERLAP (${chunking.overlap}) must be smaller than CHUNK_SIZE (${chunking.size}).`);
    }

    return {
        embedding,
        answer,
        vectorDb,
        chunking,
        topK: readInt(env, "TOP_K", 3, 1),
    };
}
