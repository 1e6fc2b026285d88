import { ConfigurationError } from "./errors.js";
import { dot, normalize } from "./vectorMath.js";
import type { SearchResult, VectorRecord } from "./vectorRecord.js";

interface StoredEntry {
    record: VectorRecord;
    /** L2-normalized copy of `record.vector`, computed once at insert time. */
    unit: number[];
}

/**
 * Exact in-memory vector index with cosine-similarity search.
 * Records are kept in insertion order; a parallel id map gives O(1) lookups
 * for hydrating results that come back from the remote backend.
 *
 * Every method runs to completion without yielding, so on the event loop an
 * insert can never interleave with a scan.
 */
export class LocalIndex {
    private entries: StoredEntry[] = [];
    private positions = new Map<string, number>();

    /**
     * @param dimension Fixed vector length for every record in this index.
     */
    constructor(public readonly dimension: number) {
        if (!Number.isInteger(dimension) || dimension <= 0) {
            throw new ConfigurationError(`Index dimension must be a positive integer, got ${dimension}.`);
        }
    }

    /** Number of stored records. */
    get size(): number {
        return this.entries.length;
    }

    insert(record: VectorRecord): void {
        this.insertMany([record]);
    }

    /**
     * Appends records in order. The whole batch is validated first, so a bad
     * record leaves the index untouched.
     * @throws {ConfigurationError} On dimension mismatch, zero vectors or duplicate ids.
     */
    insertMany(records: readonly VectorRecord[]): void {
        const batchIds = new Set<string>();
        const prepared: StoredEntry[] = records.map((record) => {
            this.assertDimension(record.vector, `Record "${record.id}"`);
            if (this.positions.has(record.id) || batchIds.has(record.id)) {
                throw new ConfigurationError(`Duplicate record id "${record.id}".`);
            }
            batchIds.add(record.id);

            const vector = [...record.vector];
            return {
                record: { id: record.id, vector, text: record.text, metadata: { ...record.metadata } },
                unit: normalize(vector),
            };
        });

        for (const entry of prepared) {
            this.positions.set(entry.record.id, this.entries.length);
            this.entries.push(entry);
        }
    }

    /**
     * Ranks every record by cosine similarity to `query`, highest first.
     * Equal scores keep insertion order.
     * @returns At most `k` results; an empty array when the index is empty.
     */
    search(query: readonly number[], k: number): SearchResult[] {
        if (!Number.isInteger(k) || k <= 0) {
            throw new ConfigurationError(`top_k must be a positive integer, got ${k}.`);
        }
        this.assertDimension(query, "Query vector");
        if (this.entries.length === 0) {
            return [];
        }

        const unitQuery = normalize(query);
        return this.entries
            .map((entry, position) => ({ entry, position, score: dot(unitQuery, entry.unit) }))
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, k)
            .map(({ entry, score }) => ({
                text: entry.record.text,
                score,
                metadata: { ...entry.record.metadata },
            }));
    }

    has(id: string): boolean {
        return this.positions.has(id);
    }

    /** Looks up a record by id. */
    get(id: string): VectorRecord | undefined {
        const position = this.positions.get(id);
        return position === undefined ? undefined : this.entries[position]?.record;
    }

    /** All records in insertion order. */
    records(): VectorRecord[] {
        return this.entries.map((entry) => entry.record);
    }

    clear(): void {
        this.entries = [];
        this.positions = new Map();
    }

    private assertDimension(vector: readonly number[], label: string): void {
        if (vector.length !== this.dimension) {
            throw new ConfigurationError(
                `${label} has dimension ${vector.length}, but the index dimension is ${this.dimension}.`
            );
        }
    }
}
