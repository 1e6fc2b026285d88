import { createHash } from "crypto";
import pLimit from "p-limit";
import { ConfigurationError, describeError } from "./errors.js";
import { type BackendKind, type IndexBackend, LocalBackend, RemoteBackend } from "./indexBackend.js";
import { LocalIndex } from "./localIndex.js";
import { retry } from "./retry.js";
import type { RetryOptions } from "./retryOptions.js";
import { normalize } from "./vectorMath.js";
import type { RecordMetadata, SearchResult, VectorRecord } from "./vectorRecord.js";
import type { VectorStoreOptions } from "./vectorStoreOptions.js";

export type BackendState = "connected" | "unavailable";

/** A record to be stored; the Vector Store assigns its id. */
export interface NewRecord {
    text: string;
    vector: number[];
    metadata?: RecordMetadata;
}

export interface VectorStoreStats {
    count: number;
    dimension: number;
    backend: BackendKind;
}

export interface BackendInfo extends VectorStoreStats {
    connected: boolean;
    indexName: string;
    persistent: boolean;
    remoteStats?: Record<string, unknown>;
}

const REPLAY_BATCH_SIZE = 256;

/**
 * Presents one insert/search contract over two backends: the in-process
 * {@link LocalIndex}, which always accepts writes and is the source of truth
 * for id-to-text hydration, and the remote vector service, which is used
 * best-effort while it stays healthy.
 *
 * The first remote failure switches the store to local-only until it is
 * rebuilt or {@link VectorStore.reconnect} is called.
 */
export class VectorStore {
    private readonly local: LocalIndex;
    private readonly localBackend: LocalBackend;
    private readonly remoteBackend?: RemoteBackend;
    private readonly remoteInsertRetry: Partial<RetryOptions>;
    /** Keeps remote writes in the same order as local ones. */
    private readonly remoteWrites = pLimit(1);
    private backendState: BackendState = "unavailable";
    private idCounter = 0;

    private constructor(private readonly options: VectorStoreOptions) {
        this.local = new LocalIndex(options.dimension);
        this.localBackend = new LocalBackend(this.local);
        if (options.remote) {
            this.remoteBackend = new RemoteBackend(options.remote, options.indexName, this.local);
        }
        this.remoteInsertRetry = {
            maxRetries: 1,
            onRetry: (error, attempt) => {
                console.warn(`Retrying remote insert (attempt ${attempt}): ${error.message}`);
            },
            ...options.remoteInsertRetry,
        };
    }

    /**
     * Builds a store and probes the remote backend once. An unreachable remote
     * leaves the store usable in local-only mode.
     */
    static async create(options: VectorStoreOptions): Promise<VectorStore> {
        const store = new VectorStore(options);
        store.backendState = (await store.connectRemote()) ? "connected" : "unavailable";

        if (store.backendState === "connected") {
            console.log(`Vector store using remote index "${options.indexName}" at ${options.remote?.url} (mirrored in memory).`);
        } else {
            console.log("Vector store using in-memory index only.");
        }
        return store;
    }

    get state(): BackendState {
        return this.backendState;
    }

    get dimension(): number {
        return this.local.dimension;
    }

    /** Number of records held locally. */
    count(): number {
        return this.local.size;
    }

    /** Stores one record. @returns Its generated id. */
    async insert(text: string, vector: number[], metadata?: RecordMetadata): Promise<string> {
        const [id] = await this.insertMany([{ text, vector, metadata }]);
        if (id === undefined) {
            throw new Error("Vector store did not return an id for the inserted record.");
        }
        return id;
    }

    /**
     * Writes records to the local index, then to the remote one while connected.
     * A remote failure degrades the store but does not fail the call: the
     * records are already stored locally.
     * @returns Generated ids, in input order.
     * @throws {ConfigurationError} On a dimension mismatch or zero vector; nothing is stored.
     */
    async insertMany(entries: readonly NewRecord[]): Promise<string[]> {
        if (entries.length === 0) {
            return [];
        }

        const records: VectorRecord[] = entries.map((entry) => ({
            id: this.nextId(entry.text),
            vector: entry.vector,
            text: entry.text,
            metadata: entry.metadata ?? {},
        }));

        this.local.insertMany(records);

        // Queued even while unavailable so a write made during a reconnect
        // reaches the remote once the replay has finished.
        if (this.remoteBackend) {
            await this.remoteWrites(() => this.writeRemote(records));
        }

        console.log(`Added ${records.length} records (${this.activeBackend().kind}). Total in store: ${this.local.size}.`);
        return records.map((record) => record.id);
    }

    /**
     * Returns the `k` best matches for `query`. Uses the remote backend while
     * connected and falls back to the local index, within the same call, when
     * the remote fails or yields no usable hits.
     * @throws {ConfigurationError} On an invalid `k`, a dimension mismatch or a zero query.
     */
    async search(query: readonly number[], k: number): Promise<SearchResult[]> {
        if (!Number.isInteger(k) || k <= 0) {
            throw new ConfigurationError(`top_k must be a positive integer, got ${k}.`);
        }
        if (query.length !== this.dimension) {
            throw new ConfigurationError(
                `Query vector has dimension ${query.length}, but the index dimension is ${this.dimension}.`
            );
        }
        normalize(query);

        if (this.local.size === 0) {
            console.warn("Vector store is empty; nothing to search.");
            return [];
        }

        const backend = this.activeBackend();
        if (backend.kind === "remote") {
            try {
                const results = await backend.search(query, k);
                if (results.length > 0) {
                    return results;
                }
                console.warn("Remote search returned no usable results; using in-memory index.");
            } catch (error) {
                this.degrade("search", error);
            }
        }

        return this.localBackend.search(query, k);
    }

    /**
     * Removes every record. While connected the remote index is dropped and
     * recreated; a failure there degrades the store.
     */
    async clear(): Promise<void> {
        this.local.clear();
        this.idCounter = 0;

        if (this.remoteBackend) {
            await this.remoteWrites(async () => {
                if (this.backendState !== "connected") {
                    return;
                }
                try {
                    await this.resetRemoteIndex();
                } catch (error) {
                    this.degrade("clear", error);
                }
            });
        }
        console.log(`Vector store cleared (${this.activeBackend().kind}).`);
    }

    /**
     * Re-probes the remote backend after a degrade. On success the remote
     * index is rebuilt from the local records and the store is connected
     * again. Never called automatically.
     */
    async reconnect(): Promise<BackendState> {
        const client = this.options.remote;
        if (!client || this.backendState === "connected") {
            return this.backendState;
        }

        await this.remoteWrites(async () => {
            if (this.backendState === "connected") {
                return;
            }
            // Records inserted after this snapshot queue their own write behind this task.
            const records = this.local.records();
            if (!(await client.healthCheck())) {
                console.warn(`Vector service at ${client.url} is still not responding.`);
                return;
            }
            try {
                await this.resetRemoteIndex();
                for (let i = 0; i < records.length; i += REPLAY_BATCH_SIZE) {
                    await client.insert(this.options.indexName, records.slice(i, i + REPLAY_BATCH_SIZE));
                }
                this.backendState = "connected";
                console.log(`Reconnected to vector service; replayed ${records.length} records.`);
            } catch (error) {
                console.warn(`Reconnect to vector service failed: ${describeError(error)}`);
            }
        });
        return this.backendState;
    }

    stats(): VectorStoreStats {
        return {
            count: this.local.size,
            dimension: this.dimension,
            backend: this.activeBackend().kind,
        };
    }

    /** Stats plus connection details and, while connected, the service's own stats. */
    async backendInfo(): Promise<BackendInfo> {
        const connected = this.backendState === "connected";
        const info: BackendInfo = {
            ...this.stats(),
            connected,
            indexName: this.options.indexName,
            persistent: connected,
        };

        if (connected && this.options.remote) {
            const remoteStats = await this.options.remote.stats();
            if (remoteStats) {
                info.remoteStats = remoteStats;
            }
        }
        return info;
    }

    private activeBackend(): IndexBackend {
        return this.backendState === "connected" && this.remoteBackend ? this.remoteBackend : this.localBackend;
    }

    private async connectRemote(): Promise<boolean> {
        const client = this.options.remote;
        if (!client) {
            return false;
        }

        try {
            if (!(await client.healthCheck())) {
                console.warn(`Vector service not responding at ${client.url}.`);
                return false;
            }
            await client.createIndex(this.options.indexName, this.dimension, this.options.quantization);
            return true;
        } catch (error) {
            console.warn(`Could not connect to vector service: ${describeError(error)}`);
            return false;
        }
    }

    private async resetRemoteIndex(): Promise<void> {
        const client = this.options.remote;
        if (!client) {
            return;
        }
        try {
            await client.deleteIndex(this.options.indexName);
        } catch (error) {
            console.warn(`Could not delete remote index "${this.options.indexName}": ${describeError(error)}`);
        }
        await client.createIndex(this.options.indexName, this.dimension, this.options.quantization);
    }

    private async writeRemote(records: readonly VectorRecord[]): Promise<void> {
        // An earlier queued write may have degraded the store already.
        if (this.backendState !== "connected" || !this.remoteBackend) {
            return;
        }
        const backend = this.remoteBackend;
        try {
            await retry(() => backend.insertMany(records), this.remoteInsertRetry);
        } catch (error) {
            this.degrade("insert", error);
        }
    }

    private degrade(operation: string, error: unknown): void {
        if (this.backendState === "unavailable") {
            return;
        }
        this.backendState = "unavailable";
        console.warn(
            `Vector service ${operation} failed: ${describeError(error)}. Using in-memory index for the rest of this session.`
        );
    }

    private nextId(text: string): string {
        let id: string;
        do {
            id = createHash("md5").update(`${text}_${this.idCounter}`).digest("hex").slice(0, 16);
            this.idCounter += 1;
        } while (this.local.has(id));
        return id;
    }
}
