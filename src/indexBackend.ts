import type { LocalIndex } from "./localIndex.js";
import type { RemoteIndexClient } from "./remoteIndexClient.js";
import type { SearchResult, VectorRecord } from "./vectorRecord.js";

export type BackendKind = "remote" | "local";

/**
 * Storage capability shared by the two index backends. The Vector Store
 * picks one per call from its current connection state.
 */
export interface IndexBackend {
    readonly kind: BackendKind;
    insertMany(records: readonly VectorRecord[]): Promise<void>;
    search(query: readonly number[], k: number): Promise<SearchResult[]>;
}

/** Serves the in-process {@link LocalIndex}. */
export class LocalBackend implements IndexBackend {
    readonly kind = "local";

    constructor(private readonly index: LocalIndex) {}

    async insertMany(records: readonly VectorRecord[]): Promise<void> {
        this.index.insertMany(records);
    }

    async search(query: readonly number[], k: number): Promise<SearchResult[]> {
        return this.index.search(query, k);
    }
}

/**
 * Proxies to the remote vector service. The service only knows ids and
 * vectors, so hits are hydrated with text and metadata from the local index.
 */
export class RemoteBackend implements IndexBackend {
    readonly kind = "remote";

    constructor(
        private readonly client: RemoteIndexClient,
        private readonly indexName: string,
        private readonly hydrateFrom: LocalIndex
    ) {}

    async insertMany(records: readonly VectorRecord[]): Promise<void> {
        await this.client.insert(this.indexName, records);
    }

    /**
     * @returns Hydrated hits in the service's order. Ids without a local record
     *          (stale remote entries) are skipped.
     */
    async search(query: readonly number[], k: number): Promise<SearchResult[]> {
        const hits = await this.client.search(this.indexName, query, k);
        const results: SearchResult[] = [];

        for (const hit of hits.slice(0, k)) {
            const record = this.hydrateFrom.get(hit.id);
            if (!record) {
                console.warn(`Remote result "${hit.id}" has no local record; skipping.`);
                continue;
            }
            results.push({ text: record.text, score: hit.score, metadata: { ...record.metadata } });
        }
        return results;
    }
}

